import { describe, expect, it, vi } from "vitest";
import { UserInputError } from "../src/errors.js";
import {
  filterTemplatesByService,
  formatTemplateList,
  parseTemplateSelection,
  promptForTemplate,
} from "../src/reports/templates.js";
import type { ReportTemplate } from "../src/types.js";

const templates: ReportTemplate[] = [
  { id: 130, title: "Meeting Usage Report", service: "Webex Meetings", maxDays: 31 },
  { id: 205, title: "Attendee Report", service: "Webex Meetings" },
  { id: 310, title: "Call Quality", service: "Webex Calling", maxDays: 7 },
];

function scriptedPrompt(...answers: Array<string | null>) {
  const prompt = vi.fn<(question: string) => Promise<string | null>>();
  for (const answer of answers) {
    prompt.mockResolvedValueOnce(answer);
  }
  return prompt;
}

describe("filterTemplatesByService", () => {
  it("keeps only templates for the configured services", () => {
    expect(filterTemplatesByService(templates, ["Webex Meetings"]).map((t) => t.id)).toEqual([130, 205]);
    expect(filterTemplatesByService(templates, ["Webex Events"])).toEqual([]);
  });
});

describe("formatTemplateList", () => {
  it("renders id, title, service and max days", () => {
    const divider = "=".repeat(70);
    expect(formatTemplateList(templates.slice(0, 2))).toEqual([
      divider,
      "AVAILABLE REPORTS",
      divider,
      "",
      "[130] Meeting Usage Report",
      "    Service: Webex Meetings | Max Days: 31",
      "",
      "[205] Attendee Report",
      "    Service: Webex Meetings | Max Days: N/A",
      "",
      divider,
    ]);
  });
});

describe("parseTemplateSelection", () => {
  it("accepts an offered id", () => {
    expect(parseTemplateSelection(" 205 ", templates)).toEqual({ ok: true, templateId: 205 });
  });

  it("rejects input that is not a number", () => {
    expect(parseTemplateSelection("usage", templates)).toEqual({
      ok: false,
      reason: "Please enter a valid number.",
    });
  });

  it("rejects ids that were not offered", () => {
    expect(parseTemplateSelection("999", templates)).toEqual({
      ok: false,
      reason: "Invalid selection. Please choose from the list above.",
    });
  });
});

describe("promptForTemplate", () => {
  it("asks again after invalid answers", async () => {
    const prompt = scriptedPrompt("abc", "999", "130");
    const print = vi.fn<(line: string) => void>();

    await expect(promptForTemplate(templates, prompt, print, 3)).resolves.toBe(130);
    expect(prompt).toHaveBeenCalledWith("Enter the report number to generate: ");
    expect(print.mock.calls).toEqual([
      ["Please enter a valid number."],
      ["Invalid selection. Please choose from the list above."],
    ]);
  });

  it("fails with UserInputError once attempts run out", async () => {
    const prompt = scriptedPrompt("abc", "999");

    await expect(promptForTemplate(templates, prompt, () => {}, 2)).rejects.toThrow(
      "No valid report selected after 2 attempts",
    );
  });

  it("fails with UserInputError when input is closed", async () => {
    const prompt = scriptedPrompt(null);

    await expect(promptForTemplate(templates, prompt, () => {}, 3)).rejects.toBeInstanceOf(UserInputError);
    expect(prompt).toHaveBeenCalledTimes(1);
  });
});
