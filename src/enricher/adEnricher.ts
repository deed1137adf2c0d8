/**
 * AD Enricher
 * Looks up every MFA report row in on-premises Active Directory by
 * principal name and copies the account attributes onto the row.
 * With normalizeMobile the mobile number is also reduced to 10 digits.
 */

import type { OnPremDirectory } from "../directory/types.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { isBlank, textOrDefault } from "../report/values.js";
import type { DirectoryAccount, EnrichedRecord, EnrichSummary, FailureRecord, UserMFARecord } from "../types.js";
import { BLANK_MOBILE, INVALID_MOBILE, NOT_AVAILABLE, createEnrichedRecord } from "../types.js";
import { normalizePhoneNumber } from "./phone.js";
import { formatFileTime, formatGeneralizedTime } from "./timestamps.js";

export interface EnrichOptions {
  normalizeMobile?: boolean;
  logger?: Logger;
  onProgress?: (processed: number, total: number) => void;
}

export interface EnrichResult {
  records: EnrichedRecord[];
  failures: FailureRecord[];
  summary: EnrichSummary;
}

type LookupOutcome =
  | { kind: "found"; record: EnrichedRecord; invalidMobile: boolean }
  | { kind: "not-found" }
  | { kind: "error"; failure: FailureRecord };

/**
 * Fill the directory attributes of a found account. Mobile handling:
 * basic pipeline copies the value or "blank"; normalizing pipeline turns
 * a value that cannot be normalized into "Invalid".
 */
export function applyAccount(
  base: EnrichedRecord,
  account: DirectoryAccount,
  managerName: string,
  normalizeMobile: boolean,
  logger?: Logger
): { record: EnrichedRecord; invalidMobile: boolean } {
  const record: EnrichedRecord = {
    ...base,
    found: true,
    enabled: account.enabled,
    manager: managerName,
    mail: textOrDefault(account.mail, NOT_AVAILABLE),
    title: textOrDefault(account.title, NOT_AVAILABLE),
    company: textOrDefault(account.company, NOT_AVAILABLE),
    department: textOrDefault(account.department, NOT_AVAILABLE),
    description: textOrDefault(account.description, NOT_AVAILABLE),
    generationQualifier: textOrDefault(account.generationQualifier, NOT_AVAILABLE),
    lastLogon: formatFileTime(account.lastLogon),
    pwdLastSet: formatFileTime(account.pwdLastSet),
    lastLogonTimestamp: formatFileTime(account.lastLogonTimestamp),
    whenCreated: formatGeneralizedTime(account.whenCreated),
    distinguishedName: account.distinguishedName,
    mobileRaw: account.mobile !== undefined && !isBlank(account.mobile) ? account.mobile : BLANK_MOBILE
  };

  if (!normalizeMobile || record.mobileRaw === BLANK_MOBILE) {
    return { record, invalidMobile: false };
  }

  const normalized = normalizePhoneNumber(record.mobileRaw, logger);
  if (normalized === null) {
    record.mobileRaw = INVALID_MOBILE;
    record.mobileNormalized = NOT_AVAILABLE;
    return { record, invalidMobile: true };
  }

  record.mobileNormalized = normalized;
  return { record, invalidMobile: false };
}

async function lookupRecord(
  directory: OnPremDirectory,
  base: EnrichedRecord,
  recordNumber: number,
  normalizeMobile: boolean,
  logger?: Logger
): Promise<LookupOutcome> {
  let operation: FailureRecord["operation"] = "findUserByPrincipalName";
  try {
    const account = await directory.findUserByPrincipalName(base.principalName);
    if (!account) return { kind: "not-found" };

    let managerName = NOT_AVAILABLE;
    if (account.managerRef !== undefined && !isBlank(account.managerRef)) {
      operation = "resolveManagerDisplayName";
      managerName = await directory.resolveManagerDisplayName(account.managerRef);
    }

    return { kind: "found", ...applyAccount(base, account, managerName, normalizeMobile, logger) };
  } catch (err) {
    return {
      kind: "error",
      failure: {
        recordNumber,
        principalName: base.principalName,
        operation,
        errorMessage: errorMessage(err),
        timestamp: new Date().toISOString()
      }
    };
  }
}

export async function enrichRecords(
  records: UserMFARecord[],
  directory: OnPremDirectory,
  options: EnrichOptions = {}
): Promise<EnrichResult> {
  const normalizeMobile = Boolean(options.normalizeMobile);
  const logger = options.logger;
  const startedAt = Date.now();

  const enriched: EnrichedRecord[] = [];
  const failures: FailureRecord[] = [];
  const summary: EnrichSummary = {
    total: records.length,
    found: 0,
    notFound: 0,
    lookupErrors: 0,
    invalidMobiles: 0,
    startedAt,
    endedAt: startedAt
  };

  for (const [index, input] of records.entries()) {
    const recordNumber = index + 1;
    const base = createEnrichedRecord(input, normalizeMobile);
    logger?.stepStart(recordNumber, input.principalName);

    const outcome = await lookupRecord(directory, base, recordNumber, normalizeMobile, logger);

    switch (outcome.kind) {
      case "found":
        enriched.push(outcome.record);
        summary.found++;
        if (outcome.invalidMobile) summary.invalidMobiles++;
        logger?.stepSuccess(recordNumber, "found in Active Directory");
        break;
      case "not-found":
        // Defaults already say found=false, mobileRaw="N/A"
        enriched.push(base);
        summary.notFound++;
        logger?.warn(`${input.principalName} not found in Active Directory`);
        break;
      case "error":
        enriched.push(base);
        failures.push(outcome.failure);
        summary.lookupErrors++;
        logger?.warn(
          `Lookup failed for ${input.principalName} (${outcome.failure.operation}): ${outcome.failure.errorMessage}`
        );
        logger?.stepFailure(recordNumber, input.principalName);
        break;
    }

    options.onProgress?.(recordNumber, records.length);
  }

  summary.endedAt = Date.now();
  return { records: enriched, failures, summary };
}
