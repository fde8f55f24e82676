import type pino from "pino";
import type { MeetingRecord, MeetingSpec } from "../types.js";

export interface MeetingsApi {
  createMeeting(spec: MeetingSpec): Promise<MeetingRecord>;
}

export interface MeetingFlowDeps {
  meeting: MeetingSpec;
  authenticate: () => Promise<string>;
  client: MeetingsApi;
  logger: pino.Logger;
  print: (line: string) => void;
}

export function formatMeetingRequest(spec: MeetingSpec): string[] {
  return [
    "Creating Webex meeting...",
    `   Title: ${spec.title}`,
    `   Start: ${spec.start}`,
    `   End: ${spec.end}`,
    `   Timezone: ${spec.timezone}`,
    `   Host: ${spec.hostEmail}`,
    `   Site: ${spec.siteUrl}`,
  ];
}

export function formatMeetingDetails(meeting: MeetingRecord): string[] {
  const divider = "=".repeat(70);
  const field = (value: string | undefined) => value || "N/A";

  return [
    divider,
    "MEETING DETAILS",
    divider,
    "",
    `Title:          ${field(meeting.title)}`,
    `Meeting ID:     ${field(meeting.id)}`,
    `Meeting Number: ${field(meeting.meetingNumber)}`,
    `Password:       ${field(meeting.password)}`,
    `Start Time:     ${field(meeting.start)}`,
    `End Time:       ${field(meeting.end)}`,
    `Timezone:       ${field(meeting.timezone)}`,
    `Host Email:     ${field(meeting.hostEmail)}`,
    `Site URL:       ${field(meeting.siteUrl)}`,
    `Web Link:       ${field(meeting.webLink)}`,
    `SIP Address:    ${field(meeting.sipAddress)}`,
    "",
    divider,
  ];
}

export async function runMeetingFlow(deps: MeetingFlowDeps): Promise<MeetingRecord> {
  const { meeting, client, logger, print } = deps;

  await deps.authenticate();

  formatMeetingRequest(meeting).forEach((line) => print(line));
  logger.info({ hostEmail: meeting.hostEmail, siteUrl: meeting.siteUrl }, "Creating meeting");

  const record = await client.createMeeting(meeting);
  formatMeetingDetails(record).forEach((line) => print(line));
  return record;
}
