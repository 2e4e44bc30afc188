// Interview Session Client - Report Store
// Writes downloaded interview reports to disk for the Node host.
//
// Output layout:
//   {baseDir}/interview_report_{first 8 chars of session id}.pdf

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ReportSink } from "./types.js";

/**
 * File name the report is saved under: `interview_report_{id[0..8]}.pdf`.
 */
export function reportFileName(sessionId: string): string {
  return `interview_report_${sessionId.slice(0, 8)}.pdf`;
}

export class ReportStore implements ReportSink {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /**
   * Saves a report, creating the base directory if needed.
   * An existing report for the same session prefix is overwritten.
   *
   * @returns The path that was written.
   */
  async save(sessionId: string, report: Uint8Array): Promise<string> {
    if (sessionId.trim() === "") {
      throw new Error("Cannot save a report without a session id");
    }
    await mkdir(this.baseDir, { recursive: true });

    const reportPath = join(this.baseDir, reportFileName(sessionId));
    await writeFile(reportPath, report);
    return reportPath;
  }
}
