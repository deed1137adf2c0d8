#!/usr/bin/env node
/**
 * Collect MFA registration status for every Microsoft Entra ID user
 *
 * Lists all users through Microsoft Graph, reads each user's registered
 * authentication methods and writes one CSV row per user with a flag per
 * method type and an overall MFA status (Enabled when any method other
 * than password is registered).
 *
 * The app registration needs the User.Read.All and
 * UserAuthenticationMethod.Read.All application permissions.
 *
 * Usage:
 *   npx tsx bin/collect-mfa.ts --output mfa-report.csv
 *
 *   AZURE_TENANT_ID=... AZURE_CLIENT_ID=... AZURE_CLIENT_SECRET=... \
 *     npx tsx bin/collect-mfa.ts --on-method-error abort
 */
import "dotenv/config";
import { Command, Option } from "commander";
import { collectMfaRecords, METHOD_LOOKUP_POLICIES } from "../src/collector/mfaCollector.js";
import type { MethodLookupErrorPolicy } from "../src/collector/mfaCollector.js";
import { DEFAULT_MFA_REPORT, loadGraphCredentials, resolveReportPath } from "../src/config.js";
import { GraphDirectory } from "../src/directory/graphDirectory.js";
import { ConfigError, errorMessage } from "../src/errors.js";
import { writeErrorsOut } from "../src/errorsOut.js";
import { createLogger, withoutSteps } from "../src/logger.js";
import { MFA_COLUMNS, writeReport } from "../src/report/csv.js";
import { collectSummaryLines, computeCollectStatus, renderSummaryBox } from "../src/summary.js";
import { ProgressUI } from "../src/ui/progressUI.js";

const program = new Command();

program
  .name("collect-mfa")
  .description("Report the MFA methods registered by every Microsoft Entra ID user")
  .option("--output <path>", `Output CSV path (default: $MFA_REPORT_PATH or ${DEFAULT_MFA_REPORT})`)
  .option("--tenant-id <id>", "Directory (tenant) ID (default: $AZURE_TENANT_ID)")
  .option("--client-id <id>", "App registration client ID (default: $AZURE_CLIENT_ID)")
  .option("--client-secret <secret>", "App registration client secret (default: $AZURE_CLIENT_SECRET)")
  .addOption(
    new Option("--on-method-error <policy>", "When a user's methods cannot be read: skip the user or abort the run")
      .choices(METHOD_LOOKUP_POLICIES)
      .default("skip")
  )
  .option("--errors-out <path>", "Write per-user failures to a CSV or JSON file")
  .option("--quiet", "Suppress per-user output", false)
  .parse(process.argv);

async function main(): Promise<number> {
  const opts = program.opts<{
    output?: string;
    tenantId?: string;
    clientId?: string;
    clientSecret?: string;
    onMethodError: MethodLookupErrorPolicy;
    errorsOut?: string;
    quiet?: boolean;
  }>();

  const logger = createLogger({ quiet: opts.quiet });

  let directory: GraphDirectory;
  let outputPath: string;
  try {
    directory = new GraphDirectory(loadGraphCredentials(opts));
    outputPath = resolveReportPath(opts.output, "MFA_REPORT_PATH", DEFAULT_MFA_REPORT);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const progress = new ProgressUI("Users", opts.quiet);
  try {
    logger.log(`Output: ${outputPath}`);
    logger.log("Connecting to Microsoft Graph...");
    await directory.connect();

    const connection = await directory.testConnection();
    if (!connection.success) {
      logger.error("Microsoft Graph connection failed:");
      logger.error(`  - ${connection.error ?? "unknown error"}`);
      return 1;
    }
    logger.log("✓ Microsoft Graph connection successful\n");

    let progressStarted = false;
    const result = await collectMfaRecords(directory, {
      onMethodLookupError: opts.onMethodError,
      logger: progress.interactive ? withoutSteps(logger) : logger,
      onProgress: (processed, total) => {
        if (!progressStarted) {
          progress.start(total);
          progressStarted = true;
        }
        progress.update(processed, total);
      }
    });
    progress.stop();

    await writeReport(outputPath, result.records, MFA_COLUMNS);

    if (opts.errorsOut && (await writeErrorsOut(opts.errorsOut, result.failures))) {
      logger.log(`Failures written to ${opts.errorsOut}`);
    }

    const status = computeCollectStatus(result.summary);
    // eslint-disable-next-line no-console
    console.log(renderSummaryBox(status, collectSummaryLines(result.summary)));
    logger.log(`\nReport: ${outputPath}`);
    logger.log("Next step:");
    logger.log(`  npx tsx bin/enrich-ad.ts --input ${outputPath}`);

    return status === "Failed" ? 1 : 0;
  } catch (err) {
    progress.stop();
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
