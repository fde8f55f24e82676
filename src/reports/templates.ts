import { UserInputError } from "../errors.js";
import type { ReportTemplate } from "../types.js";

export type Prompt = (question: string) => Promise<string | null>;

export function filterTemplatesByService(
  templates: ReportTemplate[],
  services: string[],
): ReportTemplate[] {
  const wanted = new Set(services);
  return templates.filter((template) => wanted.has(template.service));
}

export function formatTemplateList(templates: ReportTemplate[]): string[] {
  const divider = "=".repeat(70);
  const lines = [divider, "AVAILABLE REPORTS", divider];

  for (const template of templates) {
    lines.push("");
    lines.push(`[${template.id}] ${template.title}`);
    lines.push(`    Service: ${template.service || "N/A"} | Max Days: ${template.maxDays ?? "N/A"}`);
  }

  lines.push("", divider);
  return lines;
}

export type SelectionResult =
  | { ok: true; templateId: number }
  | { ok: false; reason: string };

export function parseTemplateSelection(input: string, templates: ReportTemplate[]): SelectionResult {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { ok: false, reason: "Please enter a valid number." };
  }

  const templateId = Number(trimmed);
  if (!templates.some((template) => template.id === templateId)) {
    return { ok: false, reason: "Invalid selection. Please choose from the list above." };
  }

  return { ok: true, templateId };
}

export async function promptForTemplate(
  templates: ReportTemplate[],
  prompt: Prompt,
  print: (line: string) => void,
  maxAttempts: number,
): Promise<number> {
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const answer = await prompt("Enter the report number to generate: ");
    if (answer === null) {
      throw new UserInputError("No report selected: input closed");
    }

    const selection = parseTemplateSelection(answer, templates);
    if (selection.ok) {
      return selection.templateId;
    }
    print(selection.reason);
  }

  throw new UserInputError(`No valid report selected after ${maxAttempts} attempts`);
}
