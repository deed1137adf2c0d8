/**
 * Report files
 *
 * Both pipelines hand off through CSV: a header row plus one row per user.
 * Values are written as plain strings (booleans as true/false) so that
 * reading a report back yields exactly what was written.
 */

import { createReadStream, createWriteStream, existsSync } from "node:fs";
import { parse } from "csv-parse";
import { stringify } from "csv-stringify";
import { ReportFormatError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { UserMFARecord } from "../types.js";
import { AUTH_METHOD_KINDS, createMfaRecord } from "../types.js";
import { formatCell, isBlank, parseBooleanLike } from "./values.js";

export type ReportRow = Record<string, string>;

export const MFA_COLUMNS = ["principalName", "mfaStatus", ...AUTH_METHOD_KINDS] as const;

const DIRECTORY_COLUMNS_BEFORE_MOBILE = ["found", "enabled", "mobileRaw"] as const;
const DIRECTORY_COLUMNS_AFTER_MOBILE = [
  "manager",
  "mail",
  "title",
  "company",
  "department",
  "description",
  "generationQualifier",
  "lastLogon",
  "pwdLastSet",
  "lastLogonTimestamp",
  "whenCreated",
  "distinguishedName"
] as const;

export const ENRICHED_COLUMNS: readonly string[] = [
  ...MFA_COLUMNS,
  ...DIRECTORY_COLUMNS_BEFORE_MOBILE,
  ...DIRECTORY_COLUMNS_AFTER_MOBILE
];

export const NORMALIZED_ENRICHED_COLUMNS: readonly string[] = [
  ...MFA_COLUMNS,
  ...DIRECTORY_COLUMNS_BEFORE_MOBILE,
  "mobileNormalized",
  ...DIRECTORY_COLUMNS_AFTER_MOBILE
];

/**
 * Write records in column order. Missing properties become empty cells.
 */
export async function writeReport<T extends object>(
  outputPath: string,
  records: readonly T[],
  columns: readonly string[]
): Promise<void> {
  return new Promise((resolve, reject) => {
    const outputStream = createWriteStream(outputPath, { encoding: "utf8" });
    const stringifier = stringify({
      header: true,
      columns: [...columns]
    });

    stringifier.on("error", reject);
    stringifier
      .pipe(outputStream)
      .on("finish", () => resolve())
      .on("error", reject);

    for (const record of records) {
      const values = new Map<string, unknown>(Object.entries(record));
      const row: ReportRow = {};
      for (const column of columns) {
        row[column] = formatCell(values.get(column));
      }
      stringifier.write(row);
    }
    stringifier.end();
  });
}

/**
 * Read a report into string rows keyed by header name
 */
export async function readReportRows(inputPath: string): Promise<{ headers: string[]; rows: ReportRow[] }> {
  if (!existsSync(inputPath)) {
    throw new ReportFormatError(`Report file not found: ${inputPath}`, inputPath);
  }

  return new Promise((resolve, reject) => {
    const rows: ReportRow[] = [];
    let headers: string[] = [];

    const parser = parse({
      columns: (header: string[]) => {
        headers = header.map((h) => h.trim());
        return headers;
      },
      skip_empty_lines: true,
      bom: true
    });

    createReadStream(inputPath)
      .on("error", reject)
      .pipe(parser)
      .on("data", (row: ReportRow) => {
        rows.push(row);
      })
      .on("end", () => resolve({ headers, rows }))
      .on("error", (err: Error) => {
        reject(new ReportFormatError(`Invalid CSV in ${inputPath}: ${err.message}`, inputPath));
      });
  });
}

/**
 * Read the collector's output back into MFA records for enrichment
 */
export async function readMfaReport(inputPath: string, logger?: Logger): Promise<UserMFARecord[]> {
  const { headers, rows } = await readReportRows(inputPath);

  const missing = ["principalName", "mfaStatus"].filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new ReportFormatError(
      `MFA report must have ${missing.map((c) => `'${c}'`).join(" and ")} column(s). ` +
        `Found columns: ${headers.join(", ")}`,
      inputPath
    );
  }

  const records: UserMFARecord[] = [];
  rows.forEach((row, index) => {
    const principalName = row.principalName?.trim() ?? "";
    if (isBlank(principalName)) {
      logger?.warn(`Row ${index + 2}: missing principalName, skipped`);
      return;
    }

    const record = createMfaRecord(principalName);
    record.mfaStatus = row.mfaStatus?.trim() === "Enabled" ? "Enabled" : "Disabled";
    for (const kind of AUTH_METHOD_KINDS) {
      record[kind] = parseBooleanLike(row[kind]) ?? false;
    }
    records.push(record);
  });

  return records;
}
