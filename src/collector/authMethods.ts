/**
 * Microsoft Graph authentication method types and their report flags
 */

import type { AuthMethodDescriptor, AuthMethodKind, UserMFARecord } from "../types.js";
import { createMfaRecord } from "../types.js";

export const AUTH_METHOD_TAGS: Readonly<Record<string, AuthMethodKind>> = {
  "#microsoft.graph.emailAuthenticationMethod": "email",
  "#microsoft.graph.fido2AuthenticationMethod": "fido2",
  "#microsoft.graph.microsoftAuthenticatorAuthenticationMethod": "app",
  "#microsoft.graph.passwordAuthenticationMethod": "password",
  "#microsoft.graph.phoneAuthenticationMethod": "phone",
  "#microsoft.graph.softwareOathAuthenticationMethod": "softwareoath",
  "#microsoft.graph.temporaryAccessPassAuthenticationMethod": "tempaccess",
  "#microsoft.graph.windowsHelloForBusinessAuthenticationMethod": "hellobusiness"
};

/**
 * Returns undefined for tags not in AUTH_METHOD_TAGS. Graph keeps adding
 * method types (platform credentials, QR codes...), and an unknown tag
 * must not set a flag or change the MFA status.
 */
export function resolveAuthMethodKind(typeTag: string): AuthMethodKind | undefined {
  if (!Object.hasOwn(AUTH_METHOD_TAGS, typeTag)) return undefined;
  return AUTH_METHOD_TAGS[typeTag];
}

export function buildMfaRecord(principalName: string, methods: AuthMethodDescriptor[]): UserMFARecord {
  const record = createMfaRecord(principalName);

  for (const method of methods) {
    const kind = resolveAuthMethodKind(method.typeTag);
    if (kind === undefined) continue;

    record[kind] = true;
    if (kind !== "password") {
      record.mfaStatus = "Enabled";
    }
  }

  return record;
}
