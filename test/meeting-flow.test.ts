import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { ApiError } from "../src/errors.js";
import { formatMeetingDetails, runMeetingFlow } from "../src/flows/meeting.js";
import type { MeetingRecord, MeetingSpec } from "../src/types.js";

const logger = pino({ level: "silent" });

const meeting: MeetingSpec = {
  title: "Quarterly Review",
  start: "2026-03-01T12:30:00+03:00",
  end: "2026-03-01T13:00:00+03:00",
  timezone: "Asia/Riyadh",
  hostEmail: "host@example.com",
  siteUrl: "example.webex.com",
};

const record: MeetingRecord = {
  id: "mtg-1",
  meetingNumber: "25501234567",
  password: "test-pass",
  webLink: "https://example.webex.com/join/25501234567",
  title: "Quarterly Review",
};

describe("formatMeetingDetails", () => {
  it("prints N/A for fields the API left out", () => {
    const lines = formatMeetingDetails(record);

    expect(lines).toContain("Meeting Number: 25501234567");
    expect(lines).toContain("Password:       test-pass");
    expect(lines).toContain("Web Link:       https://example.webex.com/join/25501234567");
    expect(lines).toContain("SIP Address:    N/A");
  });
});

describe("runMeetingFlow", () => {
  it("authenticates, creates the meeting and prints it", async () => {
    const authenticate = vi.fn(async () => "test-token");
    const createMeeting = vi.fn(async (_spec: MeetingSpec) => record);
    const print = vi.fn<(line: string) => void>();

    const result = await runMeetingFlow({ meeting, authenticate, client: { createMeeting }, logger, print });

    expect(result).toBe(record);
    expect(authenticate).toHaveBeenCalledTimes(1);
    expect(createMeeting).toHaveBeenCalledWith(meeting);
    const printed = print.mock.calls.map(([line]) => line);
    expect(printed).toContain("   Title: Quarterly Review");
    expect(printed).toContain("Meeting Number: 25501234567");
  });

  it("propagates API rejections without printing details", async () => {
    const rejection = new ApiError("Request failed with status 400", 400, { message: "bad end" }, new Headers());
    const createMeeting = vi.fn(async (_spec: MeetingSpec): Promise<MeetingRecord> => {
      throw rejection;
    });
    const print = vi.fn<(line: string) => void>();

    await expect(
      runMeetingFlow({ meeting, authenticate: async () => "test-token", client: { createMeeting }, logger, print }),
    ).rejects.toBe(rejection);
    expect(print.mock.calls.map(([line]) => line)).not.toContain("MEETING DETAILS");
  });
});
