import fse from "fs-extra";

import { formatZodIssues } from "./error-format.js";
import { RecordUnreadableError } from "./errors.js";
import type { PathsContext } from "./paths.js";
import { jobDir, jobErrorPath, jobReportPath } from "./paths.js";
import { JobReportSchema, type JobReport } from "./report.js";
import { isMissingFileError, writeFileAtomic } from "./utils.js";

export type DurableJobRecord =
  | { status: "completed"; report: JobReport; reportPath: string }
  | { status: "failed"; error: string; errorPath: string };

/**
 * Durable per-job records under <home>/jobs/<id>/. Reads never depend on the
 * in-memory registry, so a restarted process can answer polls from disk.
 */
export class ReportStore {
  constructor(private readonly paths: PathsContext) {}

  reportPath(jobId: string): string {
    return jobReportPath(this.paths, jobId);
  }

  errorPath(jobId: string): string {
    return jobErrorPath(this.paths, jobId);
  }

  async saveReport(report: JobReport): Promise<string> {
    const parsed = JobReportSchema.safeParse(report);
    if (!parsed.success) {
      throw new Error(
        `Refusing to persist invalid report for ${report.job_id}:\n${formatZodIssues(parsed.error.issues)}`,
      );
    }

    const target = this.reportPath(report.job_id);
    await writeFileAtomic(target, JSON.stringify(parsed.data, null, 2) + "\n");
    return target;
  }

  async loadReport(jobId: string): Promise<JobReport | null> {
    const raw = await readOptional(this.reportPath(jobId));
    if (raw === null) return null;

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err) {
      throw new RecordUnreadableError(`Report for job ${jobId} is not valid JSON`, err);
    }

    const parsed = JobReportSchema.safeParse(doc);
    if (!parsed.success) {
      throw new RecordUnreadableError(
        `Invalid report for job ${jobId}:\n${formatZodIssues(parsed.error.issues)}`,
      );
    }
    return parsed.data;
  }

  async saveError(jobId: string, trace: string): Promise<string> {
    const target = this.errorPath(jobId);
    await writeFileAtomic(target, trace);
    return target;
  }

  async loadError(jobId: string): Promise<string | null> {
    return readOptional(this.errorPath(jobId));
  }

  async lookup(jobId: string): Promise<DurableJobRecord | null> {
    const report = await this.loadReport(jobId);
    if (report) {
      return { status: "completed", report, reportPath: this.reportPath(jobId) };
    }

    const error = await this.loadError(jobId);
    if (error !== null) {
      return { status: "failed", error, errorPath: this.errorPath(jobId) };
    }

    return null;
  }

  // Stale records from an earlier run of the same id must not leak into polls.
  async clearRecords(jobId: string): Promise<void> {
    await fse.remove(this.reportPath(jobId));
    await fse.remove(this.errorPath(jobId));
  }

  async removeJob(jobId: string): Promise<void> {
    await fse.remove(jobDir(this.paths, jobId));
  }
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fse.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}
