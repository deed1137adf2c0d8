/**
 * Microsoft Graph cloud directory
 * App-only (client credentials) access to users and their registered
 * authentication methods. Requires User.Read.All and
 * UserAuthenticationMethod.Read.All application permissions.
 */

import { ConfidentialClientApplication } from '@azure/msal-node';
import { Client } from '@microsoft/microsoft-graph-client';
import type { AuthProviderCallback } from '@microsoft/microsoft-graph-client';
import type { GraphCredentials } from '../config.js';
import { DirectoryError, errorMessage } from '../errors.js';
import type { AuthMethodDescriptor, CloudUser } from '../types.js';
import type { CloudDirectory, DirectorySession } from './types.js';

const GRAPH_SCOPES = ['https://graph.microsoft.com/.default'];
// Refresh five minutes before the token expires
const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;
const USERS_PAGE_SIZE = 999;

/** Minimal surface the directory needs; a path or an absolute @odata.nextLink */
export interface GraphRequester {
  get(pathOrUrl: string): Promise<unknown>;
}

export interface GraphPage {
  items: Record<string, unknown>[];
  nextLink?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a Graph collection response: { value: [...], @odata.nextLink? }
 */
export function parseGraphPage(body: unknown): GraphPage {
  if (!isRecord(body) || !Array.isArray(body.value)) {
    throw new Error('Unexpected Graph response: missing "value" array');
  }
  const items = body.value.filter(isRecord);
  const next = body['@odata.nextLink'];
  return typeof next === 'string' && next !== '' ? { items, nextLink: next } : { items };
}

export function toCloudUser(item: Record<string, unknown>): CloudUser | null {
  const upn = item.userPrincipalName;
  if (typeof upn !== 'string' || upn.trim() === '') return null;
  return { principalName: upn };
}

export function toAuthMethod(item: Record<string, unknown>): AuthMethodDescriptor {
  const type = item['@odata.type'];
  return { typeTag: typeof type === 'string' ? type : '' };
}

/**
 * Token source for app-only Graph calls. Caches the token until shortly
 * before expiry.
 */
export class GraphTokenProvider {
  private readonly msalClient: ConfidentialClientApplication;
  private accessToken?: string;
  private tokenExpiry?: number;

  constructor(credentials: GraphCredentials) {
    this.msalClient = new ConfidentialClientApplication({
      auth: {
        clientId: credentials.clientId,
        clientSecret: credentials.clientSecret,
        authority: `https://login.microsoftonline.com/${credentials.tenantId}`
      }
    });
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && this.tokenExpiry && Date.now() < this.tokenExpiry) {
      return this.accessToken;
    }

    const result = await this.msalClient.acquireTokenByClientCredential({ scopes: GRAPH_SCOPES });
    if (!result || !result.accessToken) {
      throw new Error('No access token returned for Microsoft Graph');
    }

    this.accessToken = result.accessToken;
    const expiresOn = result.expiresOn ? result.expiresOn.getTime() : Date.now() + 60 * 60 * 1000;
    this.tokenExpiry = expiresOn - TOKEN_EXPIRY_BUFFER_MS;
    return this.accessToken;
  }

  clear(): void {
    this.accessToken = undefined;
    this.tokenExpiry = undefined;
  }
}

export function createGraphRequester(tokens: GraphTokenProvider): GraphRequester {
  const client = Client.init({
    defaultVersion: 'v1.0',
    authProvider: (done: AuthProviderCallback) => {
      tokens.getAccessToken().then(
        (token) => done(null, token),
        (err: unknown) => done(err, null)
      );
    }
  });

  return {
    get: async (pathOrUrl: string): Promise<unknown> => client.api(pathOrUrl).get()
  };
}

export class GraphDirectory implements CloudDirectory, DirectorySession {
  private readonly requester: GraphRequester;
  private readonly tokens?: GraphTokenProvider;

  constructor(source: GraphCredentials | { requester: GraphRequester }) {
    if ('requester' in source) {
      this.requester = source.requester;
    } else {
      this.tokens = new GraphTokenProvider(source);
      this.requester = createGraphRequester(this.tokens);
    }
  }

  /** Fails fast on bad credentials before any report work starts */
  async connect(): Promise<void> {
    if (!this.tokens) return;
    try {
      await this.tokens.getAccessToken();
    } catch (err) {
      throw new DirectoryError(`Microsoft Graph authentication failed: ${errorMessage(err)}`, 'connect', undefined, err);
    }
  }

  async close(): Promise<void> {
    this.tokens?.clear();
  }

  async testConnection(): Promise<{ success: boolean; error?: string }> {
    try {
      parseGraphPage(await this.requester.get('/organization?$select=id&$top=1'));
      return { success: true };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  /**
   * Follow @odata.nextLink until the collection is exhausted
   */
  private async getAllPages(firstPath: string): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let next: string | undefined = firstPath;

    while (next) {
      const page = parseGraphPage(await this.requester.get(next));
      items.push(...page.items);
      next = page.nextLink;
    }

    return items;
  }

  async listAllUsers(): Promise<CloudUser[]> {
    const items = await this.getAllPages(`/users?$select=userPrincipalName&$top=${USERS_PAGE_SIZE}`);
    const users: CloudUser[] = [];
    for (const item of items) {
      const user = toCloudUser(item);
      if (user) users.push(user);
    }
    return users;
  }

  async listAuthMethods(principalName: string): Promise<AuthMethodDescriptor[]> {
    const items = await this.getAllPages(`/users/${encodeURIComponent(principalName)}/authentication/methods`);
    return items.map(toAuthMethod);
  }
}
