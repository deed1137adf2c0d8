/**
 * Active Directory timestamp formatting
 *
 * lastLogon, pwdLastSet and lastLogonTimestamp are FILETIME values
 * (100-nanosecond intervals since January 1, 1601 UTC); whenCreated is
 * LDAP generalized time. Both are rendered as "YYYY-MM-DD HH:mm:ss" in UTC.
 */

import { NEVER, NOT_AVAILABLE } from "../types.js";

const EPOCH_DIFFERENCE = 116444736000000000n;
const TICKS_PER_MS = 10000n;
// Int64 max: AD's "never" marker
const FILETIME_NEVER = 9223372036854775807n;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatUtc(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function fileTimeToDate(raw: string | undefined): Date | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const ticks = BigInt(trimmed);
  if (ticks === 0n || ticks >= FILETIME_NEVER) return null;

  const ms = Number((ticks - EPOCH_DIFFERENCE) / TICKS_PER_MS);
  return new Date(ms);
}

export function formatFileTime(raw: string | undefined): string {
  const date = fileTimeToDate(raw);
  return date ? formatUtc(date) : NEVER;
}

/**
 * Parse "YYYYMMDDHHmmss[.f]Z". Returns the input unchanged when it does
 * not look like generalized time.
 */
export function formatGeneralizedTime(raw: string | undefined): string {
  if (raw === undefined || raw.trim() === "") return NOT_AVAILABLE;

  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})/.exec(raw.trim());
  if (!match) return raw;

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return formatUtc(date);
}
