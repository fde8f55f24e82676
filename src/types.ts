export interface Credentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AccessToken {
  value: string;
  expiresAt: number;
}

export interface ReportTemplate {
  id: number;
  title: string;
  service: string;
  maxDays?: number;
}

export interface ReportRequest {
  templateId: number;
  startDate: string;
  endDate: string;
  siteList: string;
}

export type ReportStatus = "pending" | "done" | "error";

export interface ReportJob {
  id: string;
  status: ReportStatus;
  rawStatus: string;
  title?: string;
  service?: string;
  startDate?: string;
  endDate?: string;
  siteList?: string;
  downloadUrl?: string;
}

export interface MeetingSpec {
  title: string;
  start: string;
  end: string;
  timezone: string;
  hostEmail: string;
  siteUrl: string;
}

export interface MeetingRecord {
  id: string;
  meetingNumber: string;
  webLink: string;
  password?: string;
  title?: string;
  start?: string;
  end?: string;
  timezone?: string;
  hostEmail?: string;
  siteUrl?: string;
  sipAddress?: string;
}

export interface DateWindow {
  startDate: string;
  endDate: string;
}
