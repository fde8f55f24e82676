#!/usr/bin/env node

import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import type pino from "pino";
import { createTokenProvider } from "./auth/webex.js";
import { WebexClient } from "./clients/webex.js";
import { loadMeetingConfig, loadReportConfig, type BaseConfig } from "./config.js";
import { reportCliError } from "./cli-errors.js";
import { createLinePrompt } from "./console-prompt.js";
import { runMeetingFlow } from "./flows/meeting.js";
import { runReportFlow } from "./flows/reports.js";
import { createLogger } from "./logger.js";

interface Runtime {
  logger: pino.Logger;
  authenticate: () => Promise<string>;
  client: WebexClient;
}

function createRuntime(config: BaseConfig): Runtime {
  const logger = createLogger(config.logLevel);
  const authenticate = createTokenProvider(config.credentials, {
    apiBase: config.apiBase,
    logger,
    timeoutMs: config.httpTimeoutMs,
  });
  const client = new WebexClient(authenticate, logger, config.apiBase, config.httpTimeoutMs);

  return { logger, authenticate, client };
}

function printBanner(title: string) {
  const divider = "=".repeat(70);
  console.log(`\n${divider}\n${title}\n${divider}\n`);
}

const program = new Command();
program
  .name("webex-tools")
  .description("Webex meeting usage reports and meeting scheduling")
  .version("0.1.0");

program
  .command("reports")
  .description("Pick a report template, generate the report and download it as CSV")
  .action(async () => {
    const config = loadReportConfig();
    const { logger, authenticate, client } = createRuntime(config);
    const consolePrompt = createLinePrompt(process.stdin, process.stdout);

    printBanner("WEBEX MEETING REPORTS GENERATOR");
    try {
      await runReportFlow({
        config,
        authenticate,
        client,
        logger,
        prompt: consolePrompt.prompt,
        print: (line) => console.log(line),
        writeFile: (filePath, data) => writeFile(filePath, data),
      });
    } finally {
      consolePrompt.close();
    }
  });

program
  .command("meeting")
  .description("Create the configured scheduled meeting and print its details")
  .action(async () => {
    const config = loadMeetingConfig();
    const { logger, authenticate, client } = createRuntime(config);

    printBanner("WEBEX MEETING CREATOR");
    await runMeetingFlow({
      meeting: config.meeting,
      authenticate,
      client,
      logger,
      print: (line) => console.log(line),
    });
  });

program.parseAsync(process.argv).catch((error) => {
  process.exitCode = reportCliError(error);
});
