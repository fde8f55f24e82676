import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { Credentials, MeetingSpec } from "./types.js";

dotenv.config();

export const DEFAULT_API_BASE = "https://webexapis.com/v1";

type Env = Record<string, string | undefined>;

// Offset is mandatory: Webex rejects bare local times.
const ISO_WITH_OFFSET_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

const BaseConfigSchema = z.object({
  WEBEX_CLIENT_ID: z.string().min(1),
  WEBEX_CLIENT_SECRET: z.string().min(1),
  WEBEX_REFRESH_TOKEN: z.string().min(1),
  WEBEX_API_BASE: z.string().url().default(DEFAULT_API_BASE),
  WEBEX_SITE_URL: z.string().min(1),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

const ReportConfigSchema = z.object({
  REPORT_DAYS_BACK: z.coerce.number().int().positive().default(30),
  REPORT_SERVICES: z.string().min(1).default("Webex Meetings"),
  REPORT_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(5),
  REPORT_MAX_POLL_ATTEMPTS: z.coerce.number().int().positive().default(60),
  REPORT_PROMPT_ATTEMPTS: z.coerce.number().int().positive().default(3),
  REPORT_OUTPUT_DIR: z.string().min(1).default("."),
});

const MeetingConfigSchema = z.object({
  MEETING_TITLE: z.string().min(1),
  MEETING_START: z.string().regex(ISO_WITH_OFFSET_REGEX, "expected ISO 8601 with a timezone offset"),
  MEETING_END: z.string().regex(ISO_WITH_OFFSET_REGEX, "expected ISO 8601 with a timezone offset"),
  MEETING_TIMEZONE: z.string().min(1),
  MEETING_HOST_EMAIL: z.string().email(),
});

export interface BaseConfig {
  credentials: Credentials;
  apiBase: string;
  siteUrl: string;
  httpTimeoutMs: number;
  logLevel: string;
}

export interface ReportConfig extends BaseConfig {
  daysBack: number;
  services: string[];
  pollIntervalMs: number;
  maxPollAttempts: number;
  promptAttempts: number;
  outputDir: string;
}

export interface MeetingConfig extends BaseConfig {
  meeting: MeetingSpec;
}

function parseWith<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

function emptyToUndefined(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    cleaned[key] = trimmed ? trimmed : undefined;
  }
  return cleaned;
}

export function parseServiceList(value: string): string[] {
  return value
    .split(",")
    .map((service) => service.trim())
    .filter(Boolean);
}

export function loadBaseConfig(env: Env = process.env): BaseConfig {
  const parsed = parseWith(BaseConfigSchema, emptyToUndefined(env));

  return {
    credentials: {
      clientId: parsed.WEBEX_CLIENT_ID,
      clientSecret: parsed.WEBEX_CLIENT_SECRET,
      refreshToken: parsed.WEBEX_REFRESH_TOKEN,
    },
    apiBase: parsed.WEBEX_API_BASE.replace(/\/+$/, ""),
    siteUrl: parsed.WEBEX_SITE_URL,
    httpTimeoutMs: parsed.HTTP_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}

export function loadReportConfig(env: Env = process.env): ReportConfig {
  const base = loadBaseConfig(env);
  const parsed = parseWith(ReportConfigSchema, emptyToUndefined(env));

  const services = parseServiceList(parsed.REPORT_SERVICES);
  if (services.length === 0) {
    throw new Error("Invalid configuration: REPORT_SERVICES must name at least one service");
  }

  return {
    ...base,
    daysBack: parsed.REPORT_DAYS_BACK,
    services,
    pollIntervalMs: parsed.REPORT_POLL_INTERVAL_SECONDS * 1000,
    maxPollAttempts: parsed.REPORT_MAX_POLL_ATTEMPTS,
    promptAttempts: parsed.REPORT_PROMPT_ATTEMPTS,
    outputDir: path.resolve(parsed.REPORT_OUTPUT_DIR),
  };
}

export function loadMeetingConfig(env: Env = process.env): MeetingConfig {
  const base = loadBaseConfig(env);
  const parsed = parseWith(MeetingConfigSchema, emptyToUndefined(env));

  return {
    ...base,
    meeting: {
      title: parsed.MEETING_TITLE,
      start: parsed.MEETING_START,
      end: parsed.MEETING_END,
      timezone: parsed.MEETING_TIMEZONE,
      hostEmail: parsed.MEETING_HOST_EMAIL,
      siteUrl: base.siteUrl,
    },
  };
}
