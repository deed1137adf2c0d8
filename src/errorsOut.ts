import fs from "node:fs";
import path from "node:path";
import { writeReport } from "./report/csv.js";
import type { FailureRecord } from "./types.js";

const FAILURE_COLUMNS = ["recordNumber", "principalName", "operation", "errorMessage", "timestamp"] as const;

/**
 * Per-user diagnostics go to their own file, never into report rows.
 * Written as CSV for a .csv path and as JSON otherwise.
 */
export async function writeErrorsOut(outPath: string, failures: FailureRecord[]): Promise<boolean> {
  if (failures.length === 0) return false;
  const ext = path.extname(outPath).toLowerCase();
  if (ext === ".csv") {
    await writeReport(outPath, failures, FAILURE_COLUMNS);
  } else {
    await fs.promises.writeFile(outPath, JSON.stringify(failures, null, 2), "utf8");
  }
  return true;
}
