import type pino from "pino";
import { ReportFailedError, ReportTimeoutError } from "../errors.js";
import { wait } from "../http.js";
import type { ReportJob } from "../types.js";

export interface ReportStatusSource {
  getReportStatus(jobId: string): Promise<ReportJob>;
}

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function pollReportUntilReady(
  client: ReportStatusSource,
  jobId: string,
  options: PollOptions,
  logger: pino.Logger,
): Promise<ReportJob> {
  const { intervalMs, maxAttempts, sleep = wait } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const job = await client.getReportStatus(jobId);

    if (job.status === "done") {
      logger.info({ reportId: jobId, attempt }, "Report is ready");
      return job;
    }
    if (job.status === "error") {
      throw new ReportFailedError(jobId);
    }

    logger.info({ reportId: jobId, status: job.rawStatus, attempt, maxAttempts }, "Report still generating");
    if (attempt < maxAttempts) {
      await sleep(intervalMs);
    }
  }

  throw new ReportTimeoutError(jobId, maxAttempts, intervalMs);
}
