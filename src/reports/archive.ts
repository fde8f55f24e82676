import unzipper from "unzipper";
import { ProtocolError } from "../errors.js";

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function isZipArchive(content: Buffer): boolean {
  return content.length >= ZIP_SIGNATURE.length && content.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE);
}

/** Webex usually ships reports as a ZIP holding one CSV; plain CSV passes through. */
export async function extractReportCsv(content: Buffer): Promise<{ csv: Buffer; entryName?: string }> {
  if (content.length === 0) {
    throw new ProtocolError("Report download was empty");
  }

  if (!isZipArchive(content)) {
    return { csv: content };
  }

  const directory = await unzipper.Open.buffer(content);
  const entry = directory.files.find(
    (file) => file.type === "File" && file.path.toLowerCase().endsWith(".csv"),
  );
  if (!entry) {
    throw new ProtocolError(
      `No CSV file found in report archive (entries: ${directory.files.map((file) => file.path).join(", ") || "none"})`,
    );
  }

  return { csv: await entry.buffer(), entryName: entry.path };
}

// Counts non-blank lines after the header; quoted line breaks are not expected in Webex exports.
export function countCsvRows(csv: Buffer): number {
  const text = csv.toString("utf8").replace(/^\uFEFF/, "");
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return Math.max(lines.length - 1, 0);
}
