import type { Logger } from "../logger.js";

/**
 * Normalize a phone number to 10 digits.
 * Non-digits are stripped; an 11-digit number starting with the US
 * country code 1 loses it. Anything that does not end up as exactly
 * 10 digits is reported and yields null.
 */
export function normalizePhoneNumber(raw: string, logger?: Pick<Logger, "warn">): string | null {
  let digits = raw.replace(/\D/g, "");

  if (digits.length === 11 && digits.startsWith("1")) {
    digits = digits.slice(1);
  }

  if (digits.length !== 10) {
    logger?.warn(`Could not normalize phone number "${raw}": expected 10 digits, got ${digits.length}`);
    return null;
  }

  return digits;
}
