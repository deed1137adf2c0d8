export const AUTH_METHOD_KINDS = [
  "email",
  "fido2",
  "app",
  "password",
  "phone",
  "softwareoath",
  "tempaccess",
  "hellobusiness"
] as const;

export type AuthMethodKind = (typeof AUTH_METHOD_KINDS)[number];

export type MfaStatus = "Enabled" | "Disabled";

export type AuthMethodFlags = Record<AuthMethodKind, boolean>;

export type UserMFARecord = AuthMethodFlags & {
  principalName: string;
  mfaStatus: MfaStatus;
};

export type EnrichedRecord = UserMFARecord & {
  found: boolean;
  enabled: boolean;
  // "blank" when empty in AD, "Invalid" when normalization failed, "N/A" when the lookup failed
  mobileRaw: string;
  // Only set by the normalizing pipeline
  mobileNormalized?: string;
  manager: string;
  mail: string;
  title: string;
  company: string;
  department: string;
  description: string;
  generationQualifier: string;
  lastLogon: string;
  pwdLastSet: string;
  lastLogonTimestamp: string;
  whenCreated: string;
  distinguishedName: string;
};

export const NOT_AVAILABLE = "N/A";
export const NEVER = "Never";
export const BLANK_MOBILE = "blank";
export const INVALID_MOBILE = "Invalid";

/** A user as returned by the cloud directory enumeration */
export type CloudUser = {
  principalName: string;
};

/** One registered authentication method; typeTag is the directory's type discriminator */
export type AuthMethodDescriptor = {
  typeTag: string;
};

/**
 * An on-premises account. Timestamp values are raw directory values:
 * FILETIME ticks for lastLogon/pwdLastSet/lastLogonTimestamp and
 * generalized time for whenCreated.
 */
export type DirectoryAccount = {
  enabled: boolean;
  distinguishedName: string;
  mobile?: string;
  generationQualifier?: string;
  managerRef?: string;
  mail?: string;
  title?: string;
  company?: string;
  department?: string;
  description?: string;
  lastLogon?: string;
  pwdLastSet?: string;
  lastLogonTimestamp?: string;
  whenCreated?: string;
};

export type FailureRecord = {
  recordNumber: number;
  principalName: string;
  operation: "listAuthMethods" | "findUserByPrincipalName" | "resolveManagerDisplayName";
  errorMessage: string;
  timestamp: string;
};

export type CollectSummary = {
  totalUsers: number;
  collected: number;
  skipped: number;
  mfaEnabled: number;
  mfaDisabled: number;
  startedAt: number;
  endedAt: number;
};

export type EnrichSummary = {
  total: number;
  found: number;
  notFound: number;
  lookupErrors: number;
  invalidMobiles: number;
  startedAt: number;
  endedAt: number;
};

export function createMfaRecord(principalName: string): UserMFARecord {
  return {
    principalName,
    mfaStatus: "Disabled",
    email: false,
    fido2: false,
    app: false,
    password: false,
    phone: false,
    softwareoath: false,
    tempaccess: false,
    hellobusiness: false
  };
}

/**
 * Copy of an MFA record with every directory attribute at its default.
 * mobileNormalized is only present when the normalizing pipeline runs.
 */
export function createEnrichedRecord(record: UserMFARecord, normalizeMobile: boolean): EnrichedRecord {
  const enriched: EnrichedRecord = {
    ...record,
    found: false,
    enabled: false,
    mobileRaw: NOT_AVAILABLE,
    manager: NOT_AVAILABLE,
    mail: NOT_AVAILABLE,
    title: NOT_AVAILABLE,
    company: NOT_AVAILABLE,
    department: NOT_AVAILABLE,
    description: NOT_AVAILABLE,
    generationQualifier: NOT_AVAILABLE,
    lastLogon: NOT_AVAILABLE,
    pwdLastSet: NOT_AVAILABLE,
    lastLogonTimestamp: NOT_AVAILABLE,
    whenCreated: NOT_AVAILABLE,
    distinguishedName: NOT_AVAILABLE
  };
  if (normalizeMobile) {
    enriched.mobileNormalized = NOT_AVAILABLE;
  }
  return enriched;
}
