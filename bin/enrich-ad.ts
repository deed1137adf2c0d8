#!/usr/bin/env node
/**
 * Enrich an MFA report with on-premises Active Directory attributes
 *
 * Reads the CSV written by collect-mfa, looks each principal name up in
 * AD and appends account state, manager, contact details and logon
 * timestamps. With --normalize-mobile an extra mobileNormalized column
 * holds the mobile number reduced to 10 digits.
 *
 * Usage:
 *   npx tsx bin/enrich-ad.ts --input mfa-report.csv --output mfa-ad-report.csv
 *
 *   LDAP_URL=ldaps://dc01.corp.example:636 LDAP_BIND_DN=... LDAP_BIND_PASSWORD=... \
 *   LDAP_BASE_DN=DC=corp,DC=example npx tsx bin/enrich-ad.ts --normalize-mobile
 */
import "dotenv/config";
import { Command } from "commander";
import { DEFAULT_AD_REPORT, DEFAULT_MFA_REPORT, loadLdapSettings, resolveReportPath } from "../src/config.js";
import { LdapDirectory } from "../src/directory/ldapDirectory.js";
import { enrichRecords } from "../src/enricher/adEnricher.js";
import { ConfigError, ReportFormatError, errorMessage } from "../src/errors.js";
import { writeErrorsOut } from "../src/errorsOut.js";
import { createLogger, withoutSteps } from "../src/logger.js";
import { ENRICHED_COLUMNS, NORMALIZED_ENRICHED_COLUMNS, readMfaReport, writeReport } from "../src/report/csv.js";
import { computeEnrichStatus, enrichSummaryLines, renderSummaryBox } from "../src/summary.js";
import { ProgressUI } from "../src/ui/progressUI.js";

const program = new Command();

program
  .name("enrich-ad")
  .description("Add Active Directory attributes to an MFA report")
  .option("--input <path>", `MFA report to enrich (default: $MFA_REPORT_PATH or ${DEFAULT_MFA_REPORT})`)
  .option("--output <path>", `Enriched CSV path (default: $AD_REPORT_PATH or ${DEFAULT_AD_REPORT})`)
  .option("--ldap-url <url>", "LDAP server URL, e.g. ldaps://dc01:636 (default: $LDAP_URL)")
  .option("--bind-dn <dn>", "Bind account DN (default: $LDAP_BIND_DN)")
  .option("--bind-password <password>", "Bind account password (default: $LDAP_BIND_PASSWORD)")
  .option("--base-dn <dn>", "Search base (default: $LDAP_BASE_DN)")
  .option("--normalize-mobile", "Add a mobileNormalized column with 10-digit numbers", false)
  .option("--errors-out <path>", "Write per-user lookup failures to a CSV or JSON file")
  .option("--quiet", "Suppress per-user output", false)
  .parse(process.argv);

async function main(): Promise<number> {
  const opts = program.opts<{
    input?: string;
    output?: string;
    ldapUrl?: string;
    bindDn?: string;
    bindPassword?: string;
    baseDn?: string;
    normalizeMobile: boolean;
    errorsOut?: string;
    quiet?: boolean;
  }>();

  const logger = createLogger({ quiet: opts.quiet });

  let directory: LdapDirectory;
  let inputPath: string;
  let outputPath: string;
  try {
    directory = new LdapDirectory(loadLdapSettings(opts));
    inputPath = resolveReportPath(opts.input, "MFA_REPORT_PATH", DEFAULT_MFA_REPORT);
    outputPath = resolveReportPath(opts.output, "AD_REPORT_PATH", DEFAULT_AD_REPORT);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const progress = new ProgressUI("Lookups", opts.quiet);
  try {
    logger.log(`Input: ${inputPath}`);
    logger.log(`Output: ${outputPath}`);
    const records = await readMfaReport(inputPath, logger);
    logger.log(`Loaded ${records.length} users from the MFA report`);

    logger.log("Connecting to Active Directory...");
    await directory.connect();
    const connection = await directory.testConnection();
    if (!connection.success) {
      logger.error("Active Directory connection failed:");
      logger.error(`  - ${connection.error ?? "unknown error"}`);
      return 1;
    }
    logger.log("✓ Active Directory connection successful\n");

    progress.start(records.length);
    const result = await enrichRecords(records, directory, {
      normalizeMobile: opts.normalizeMobile,
      logger: progress.interactive ? withoutSteps(logger) : logger,
      onProgress: (processed, total) => progress.update(processed, total)
    });
    progress.stop();

    const columns = opts.normalizeMobile ? NORMALIZED_ENRICHED_COLUMNS : ENRICHED_COLUMNS;
    await writeReport(outputPath, result.records, columns);

    if (opts.errorsOut && (await writeErrorsOut(opts.errorsOut, result.failures))) {
      logger.log(`Failures written to ${opts.errorsOut}`);
    }

    const status = computeEnrichStatus(result.summary);
    // eslint-disable-next-line no-console
    console.log(renderSummaryBox(status, enrichSummaryLines(result.summary, opts.normalizeMobile)));
    logger.log(`\nReport: ${outputPath}`);

    return status === "Failed" ? 1 : 0;
  } catch (err) {
    progress.stop();
    if (err instanceof ReportFormatError) {
      logger.error(`Error: ${err.message}`);
      return 2;
    }
    logger.error(`\nFatal error: ${errorMessage(err)}`);
    if (err instanceof Error && err.stack && !opts.quiet) {
      logger.error("\nStack trace:");
      logger.error(err.stack);
    }
    return 1;
  } finally {
    await directory.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Unhandled error:", err);
    process.exit(1);
  }
);
