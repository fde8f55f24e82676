import type pino from "pino";
import { z } from "zod";
import { ProtocolError } from "../errors.js";
import { DEFAULT_TIMEOUT_MS, requestBytes, requestJson } from "../http.js";
import type {
  MeetingRecord,
  MeetingSpec,
  ReportJob,
  ReportRequest,
  ReportStatus,
  ReportTemplate,
} from "../types.js";

const IdSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const TemplateSchema = z.object({
  Id: z.coerce.number().int(),
  title: z.string().default("N/A"),
  service: z.string().default(""),
  maxDays: z.coerce.number().optional(),
});

const TemplateListSchema = z.object({
  items: z.array(z.unknown()).default([]),
});

const CreatedReportSchema = z.object({
  items: z.object({
    Id: IdSchema,
  }),
});

const ReportDetailsSchema = z.object({
  Id: IdSchema,
  title: z.string().optional(),
  service: z.string().optional(),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  siteList: z.string().optional(),
  status: z.string().default(""),
  downloadURL: z.string().optional(),
});

const ReportDetailsListSchema = z.object({
  items: z.array(ReportDetailsSchema),
});

const MeetingSchema = z.object({
  id: z.string(),
  meetingNumber: IdSchema,
  webLink: z.string().min(1),
  password: z.string().optional(),
  title: z.string().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  timezone: z.string().optional(),
  hostEmail: z.string().optional(),
  siteUrl: z.string().optional(),
  sipAddress: z.string().optional(),
});

export interface WebexMeetingPayload {
  title: string;
  start: string;
  end: string;
  timezone: string;
  scheduledType: "meeting";
  hostEmail: string;
  siteUrl: string;
}

export function toReportStatus(raw: string): ReportStatus {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "done") {
    return "done";
  }
  if (normalized === "failed" || normalized === "error") {
    return "error";
  }
  return "pending";
}

export function toMeetingPayload(spec: MeetingSpec): WebexMeetingPayload {
  return {
    title: spec.title,
    start: spec.start,
    end: spec.end,
    timezone: spec.timezone,
    scheduledType: "meeting",
    hostEmail: spec.hostEmail,
    siteUrl: spec.siteUrl,
  };
}

function decode<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Unexpected ${what} response: ${detail}`, body);
  }
  return parsed.data;
}

export class WebexClient {
  constructor(
    private readonly getAccessToken: () => Promise<string>,
    private readonly logger: pino.Logger,
    private readonly apiBase: string,
    private readonly timeoutMs = DEFAULT_TIMEOUT_MS,
  ) {}

  async listTemplates(): Promise<ReportTemplate[]> {
    const body = await this.request(`${this.apiBase}/report/templates`, "GET");
    const { items } = decode(TemplateListSchema, body, "report template list");

    const templates: ReportTemplate[] = [];
    for (const item of items) {
      const parsed = TemplateSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.debug({ item }, "Skipping malformed report template");
        continue;
      }
      templates.push({
        id: parsed.data.Id,
        title: parsed.data.title,
        service: parsed.data.service,
        maxDays: parsed.data.maxDays,
      });
    }

    this.logger.debug(
      { count: templates.length, skipped: items.length - templates.length },
      "Fetched report templates",
    );
    return templates;
  }

  async requestReport(request: ReportRequest): Promise<string> {
    const body = await this.request(`${this.apiBase}/reports`, "POST", {
      templateId: request.templateId,
      startDate: request.startDate,
      endDate: request.endDate,
      siteList: request.siteList,
    });
    const created = decode(CreatedReportSchema, body, "report creation");

    this.logger.info({ reportId: created.items.Id, templateId: request.templateId }, "Report requested");
    return created.items.Id;
  }

  async getReportStatus(jobId: string): Promise<ReportJob> {
    const body = await this.request(`${this.apiBase}/reports/${encodeURIComponent(jobId)}`, "GET");
    const { items } = decode(ReportDetailsListSchema, body, "report details");

    const [report] = items;
    if (!report) {
      throw new ProtocolError(`No details returned for report ${jobId}`, body);
    }

    return {
      id: report.Id,
      status: toReportStatus(report.status),
      rawStatus: report.status,
      title: report.title,
      service: report.service,
      startDate: report.startDate,
      endDate: report.endDate,
      siteList: report.siteList,
      downloadUrl: report.downloadURL || undefined,
    };
  }

  async downloadReport(jobId: string, downloadUrl?: string): Promise<Buffer> {
    const url = downloadUrl ?? (await this.getReportStatus(jobId)).downloadUrl;
    if (!url) {
      throw new ProtocolError(`Report ${jobId} has no download URL`);
    }

    const token = await this.getAccessToken();
    const content = await requestBytes(
      url,
      {
        headers: {
          Authorization: `Bearer ${token}`,
        },
      },
      this.timeoutMs,
    );

    this.logger.info({ reportId: jobId, bytes: content.length }, "Report downloaded");
    return content;
  }

  async createMeeting(spec: MeetingSpec): Promise<MeetingRecord> {
    const body = await this.request(`${this.apiBase}/meetings`, "POST", toMeetingPayload(spec));
    const meeting = decode(MeetingSchema, body, "meeting creation");

    this.logger.info({ meetingId: meeting.id }, "Meeting created");
    return meeting;
  }

  private async request(url: string, method: "GET" | "POST", body?: unknown): Promise<unknown> {
    const token = await this.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    return requestJson(
      url,
      {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      },
      this.timeoutMs,
    );
  }
}
