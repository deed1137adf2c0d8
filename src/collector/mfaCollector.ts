/**
 * MFA Collector
 * Enumerates every cloud directory user and records which authentication
 * methods each one has registered.
 */

import type { CloudDirectory } from "../directory/types.js";
import { DirectoryError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CloudUser, CollectSummary, FailureRecord, UserMFARecord } from "../types.js";
import { buildMfaRecord } from "./authMethods.js";

/** What to do when one user's methods cannot be read */
export type MethodLookupErrorPolicy = "skip" | "abort";

export const METHOD_LOOKUP_POLICIES: readonly MethodLookupErrorPolicy[] = ["skip", "abort"];

export interface CollectOptions {
  onMethodLookupError?: MethodLookupErrorPolicy;
  logger?: Logger;
  onProgress?: (processed: number, total: number) => void;
}

export interface CollectResult {
  records: UserMFARecord[];
  failures: FailureRecord[];
  summary: CollectSummary;
}

export async function collectMfaRecords(
  directory: CloudDirectory,
  options: CollectOptions = {}
): Promise<CollectResult> {
  const policy = options.onMethodLookupError ?? "skip";
  const logger = options.logger;
  const startedAt = Date.now();

  // No partial report when the enumeration itself fails
  let users: CloudUser[];
  try {
    users = await directory.listAllUsers();
  } catch (err) {
    throw new DirectoryError(`Failed to list directory users: ${errorMessage(err)}`, "listAllUsers", undefined, err);
  }

  logger?.log(`Found ${users.length} users`);

  const records: UserMFARecord[] = [];
  const failures: FailureRecord[] = [];
  let mfaEnabled = 0;

  for (const [index, user] of users.entries()) {
    const recordNumber = index + 1;
    logger?.stepStart(recordNumber, user.principalName);

    try {
      const methods = await directory.listAuthMethods(user.principalName);
      const record = buildMfaRecord(user.principalName, methods);
      records.push(record);
      if (record.mfaStatus === "Enabled") mfaEnabled++;
      logger?.stepSuccess(recordNumber, `MFA ${record.mfaStatus}`);
    } catch (err) {
      if (policy === "abort") {
        throw new DirectoryError(
          `Failed to list authentication methods for ${user.principalName}: ${errorMessage(err)}`,
          "listAuthMethods",
          user.principalName,
          err
        );
      }
      failures.push({
        recordNumber,
        principalName: user.principalName,
        operation: "listAuthMethods",
        errorMessage: errorMessage(err),
        timestamp: new Date().toISOString()
      });
      logger?.warn(`Skipping ${user.principalName}: could not list authentication methods (${errorMessage(err)})`);
      logger?.stepFailure(recordNumber, user.principalName);
    }

    options.onProgress?.(recordNumber, users.length);
  }

  return {
    records,
    failures,
    summary: {
      totalUsers: users.length,
      collected: records.length,
      skipped: failures.length,
      mfaEnabled,
      mfaDisabled: records.length - mfaEnabled,
      startedAt,
      endedAt: Date.now()
    }
  };
}
