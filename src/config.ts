/**
 * Settings resolution for the report commands.
 * A command-line value wins over the environment (.env is loaded by the
 * commands through dotenv); required settings that are missing raise
 * ConfigError naming both spellings.
 */

import path from "node:path";
import { ConfigError } from "./errors.js";
import { isBlank } from "./report/values.js";

export type Env = Record<string, string | undefined>;

export interface GraphCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface LdapSettings {
  url: string;
  bindDN: string;
  bindPassword: string;
  baseDN: string;
  timeout: number;
  connectTimeout: number;
}

export const DEFAULT_MFA_REPORT = "mfa-report.csv";
export const DEFAULT_AD_REPORT = "mfa-ad-report.csv";

function requireSetting(value: string | undefined, envName: string, flag: string, env: Env): string {
  const resolved = !isBlank(value) ? value : env[envName];
  if (resolved === undefined || isBlank(resolved)) {
    throw new ConfigError(`Missing required setting: pass ${flag} or set ${envName}`, envName);
  }
  return resolved.trim();
}

function parsePositiveInt(value: string | undefined, envName: string, fallback: number): number {
  if (value === undefined || isBlank(value)) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${envName} must be a positive integer, got "${value}"`, envName);
  }
  return parsed;
}

export function loadGraphCredentials(
  opts: { tenantId?: string; clientId?: string; clientSecret?: string },
  env: Env = process.env
): GraphCredentials {
  return {
    tenantId: requireSetting(opts.tenantId, "AZURE_TENANT_ID", "--tenant-id", env),
    clientId: requireSetting(opts.clientId, "AZURE_CLIENT_ID", "--client-id", env),
    clientSecret: requireSetting(opts.clientSecret, "AZURE_CLIENT_SECRET", "--client-secret", env)
  };
}

export function loadLdapSettings(
  opts: { ldapUrl?: string; bindDn?: string; bindPassword?: string; baseDn?: string },
  env: Env = process.env
): LdapSettings {
  return {
    url: requireSetting(opts.ldapUrl, "LDAP_URL", "--ldap-url", env),
    bindDN: requireSetting(opts.bindDn, "LDAP_BIND_DN", "--bind-dn", env),
    bindPassword: requireSetting(opts.bindPassword, "LDAP_BIND_PASSWORD", "--bind-password", env),
    baseDN: requireSetting(opts.baseDn, "LDAP_BASE_DN", "--base-dn", env),
    timeout: parsePositiveInt(env.LDAP_TIMEOUT_MS, "LDAP_TIMEOUT_MS", 30000),
    connectTimeout: parsePositiveInt(env.LDAP_CONNECT_TIMEOUT_MS, "LDAP_CONNECT_TIMEOUT_MS", 10000)
  };
}

/**
 * Report locations: explicit value, then the environment, then a file
 * in the working directory. Always absolute.
 */
export function resolveReportPath(
  value: string | undefined,
  envName: string,
  fallback: string,
  env: Env = process.env
): string {
  const envValue = env[envName];
  if (value !== undefined && !isBlank(value)) return path.resolve(value);
  if (envValue !== undefined && !isBlank(envValue)) return path.resolve(envValue);
  return path.resolve(fallback);
}
