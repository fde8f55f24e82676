import path from "node:path";
import type pino from "pino";
import type { ReportConfig } from "../config.js";
import { UserInputError } from "../errors.js";
import { countCsvRows, extractReportCsv } from "../reports/archive.js";
import { calculateDateRange } from "../reports/date-range.js";
import { pollReportUntilReady } from "../reports/poll.js";
import {
  filterTemplatesByService,
  formatTemplateList,
  promptForTemplate,
  type Prompt,
} from "../reports/templates.js";
import type { ReportJob, ReportRequest, ReportTemplate } from "../types.js";

export interface ReportsApi {
  listTemplates(): Promise<ReportTemplate[]>;
  requestReport(request: ReportRequest): Promise<string>;
  getReportStatus(jobId: string): Promise<ReportJob>;
  downloadReport(jobId: string, downloadUrl?: string): Promise<Buffer>;
}

export interface ReportFlowDeps {
  config: Pick<
    ReportConfig,
    "siteUrl" | "daysBack" | "services" | "pollIntervalMs" | "maxPollAttempts" | "promptAttempts" | "outputDir"
  >;
  authenticate: () => Promise<string>;
  client: ReportsApi;
  logger: pino.Logger;
  prompt: Prompt;
  print: (line: string) => void;
  writeFile: (filePath: string, data: Buffer) => Promise<void>;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export type ReportFlowResult =
  | { outcome: "no-templates" }
  | { outcome: "downloaded"; job: ReportJob; filePath: string; rowCount: number };

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function reportFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `webex_report_${date}_${time}.csv`;
}

export function formatReportDetails(job: ReportJob): string[] {
  const divider = "=".repeat(70);
  return [
    divider,
    "REPORT DETAILS",
    divider,
    "",
    `Title:         ${job.title ?? "N/A"}`,
    `Service:       ${job.service ?? "N/A"}`,
    `Status:        ${job.rawStatus || "N/A"}`,
    `Date Range:    ${job.startDate ?? "N/A"} to ${job.endDate ?? "N/A"}`,
    `Site:          ${job.siteList ?? "N/A"}`,
    `Report ID:     ${job.id}`,
    `Download URL:  ${job.downloadUrl ?? "N/A"}`,
    "",
    divider,
  ];
}

export async function runReportFlow(deps: ReportFlowDeps): Promise<ReportFlowResult> {
  const { config, client, logger, print } = deps;
  const now = deps.now ?? (() => new Date());

  await deps.authenticate();

  const templates = await client.listTemplates();
  if (templates.length === 0) {
    print("No report templates available.");
    return { outcome: "no-templates" };
  }

  const offered = filterTemplatesByService(templates, config.services);
  if (offered.length === 0) {
    throw new UserInputError(
      `None of the ${templates.length} report templates belong to: ${config.services.join(", ")}`,
    );
  }

  formatTemplateList(offered).forEach((line) => print(line));
  const templateId = await promptForTemplate(offered, deps.prompt, print, config.promptAttempts);

  const window = calculateDateRange(config.daysBack, now());
  logger.info({ templateId, ...window, siteList: config.siteUrl }, "Requesting report");
  const jobId = await client.requestReport({
    templateId,
    startDate: window.startDate,
    endDate: window.endDate,
    siteList: config.siteUrl,
  });
  print(`Report created (ID: ${jobId}). Waiting for it to be generated...`);

  const job = await pollReportUntilReady(
    client,
    jobId,
    { intervalMs: config.pollIntervalMs, maxAttempts: config.maxPollAttempts, sleep: deps.sleep },
    logger,
  );
  formatReportDetails(job).forEach((line) => print(line));

  const content = await client.downloadReport(job.id, job.downloadUrl);
  const { csv, entryName } = await extractReportCsv(content);
  if (entryName) {
    logger.debug({ entryName }, "Extracted CSV from report archive");
  }

  const filePath = path.join(config.outputDir, reportFileName(now()));
  await deps.writeFile(filePath, csv);

  const rowCount = countCsvRows(csv);
  print(`Report saved as: ${filePath} (${rowCount} rows)`);
  return { outcome: "downloaded", job, filePath, rowCount };
}
