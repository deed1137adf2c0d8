/**
 * Directory collaborators consumed by the pipelines.
 * Sessions are created by the commands, connected before a run and
 * closed after it; nothing holds a global connection.
 */

import type { AuthMethodDescriptor, CloudUser, DirectoryAccount } from "../types.js";

export interface DirectorySession {
  connect(): Promise<void>;
  close(): Promise<void>;
  testConnection(): Promise<{ success: boolean; error?: string }>;
}

export interface CloudDirectory {
  listAllUsers(): Promise<CloudUser[]>;
  listAuthMethods(principalName: string): Promise<AuthMethodDescriptor[]>;
}

export interface OnPremDirectory {
  /** Resolves to null when no account carries the principal name */
  findUserByPrincipalName(principalName: string): Promise<DirectoryAccount | null>;
  resolveManagerDisplayName(managerRef: string): Promise<string>;
}
