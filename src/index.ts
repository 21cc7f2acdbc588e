#!/usr/bin/env node

import { Command } from "commander";
import * as dotenv from "dotenv";
import { DEFAULT_CONFIG_PATH, loadConfig, validateConfig } from "./config";
import { printMarked, resolveOutputPath, sendToSlack, writeMarkdownFile } from "./delivery";
import { ConfigurationError, errorMessage, isCancellation } from "./errors";
import { RestGitHubClient } from "./github-client";
import { MonitorService } from "./monitor-service";
import { buildReport, printResults } from "./report";
import type { Config } from "./types";

// Load environment variables
dotenv.config();

const program = new Command();

program
  .name("git-policy-monitor")
  .description(
    "Check merged pull requests for approvals and organizations for repositories that recently became public",
  )
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file", DEFAULT_CONFIG_PATH)
  .option("--no-markdown", "Print a console summary instead of writing a Markdown report")
  .option(
    "-o, --output <path>",
    `Path to write markdown results (default: $MARKDOWN_OUTPUT_PATH or markdown-result.md)`,
  )
  .option("--slack <url>", "Slack webhook URL to post results directly (overrides file output)")
  .option("--timeout <minutes>", "Abort the run after this many minutes")
  .parse();

const options = program.opts<{
  config: string;
  markdown: boolean;
  output?: string;
  slack?: string;
  timeout?: string;
}>();

function runSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

  if (options.timeout === undefined) {
    return controller.signal;
  }

  const minutes = parseFloat(options.timeout);
  if (isNaN(minutes) || minutes <= 0) {
    console.error("❌ Error: --timeout must be a positive number of minutes");
    process.exit(1);
  }
  setTimeout(
    () => controller.abort(new Error(`Run exceeded ${minutes} minute timeout`)),
    minutes * 60 * 1000,
  ).unref();
  return controller.signal;
}

async function deliver(content: string): Promise<void> {
  if (options.slack) {
    const sent = await sendToSlack(options.slack, content);
    if (!sent) {
      console.log("❌ Failed to send results to Slack");
      printMarked(content);
    }
    return;
  }

  writeMarkdownFile(resolveOutputPath(options.output), content);
}

async function main() {
  let config: Config;
  try {
    config = loadConfig(options.config);
    validateConfig(config);
  } catch (error) {
    const prefix = error instanceof ConfigurationError ? "Invalid configuration" : "Error loading configuration";
    console.error(`❌ ${prefix}: ${errorMessage(error)}`);
    process.exit(1);
  }

  const signal = runSignal();
  const client = new RestGitHubClient({ token: config.github.token });
  const service = new MonitorService(config, client);

  console.log(`📋 Using config file: ${options.config}`);

  const outcome = await service.run(signal);

  if (options.markdown) {
    const content = buildReport(outcome.prResults, outcome.findings, outcome.failedOrganizations);
    if (!options.slack) {
      console.log(`\n${content}`);
    }
    await deliver(content);
  } else if (config.monitors.prChecker.enabled) {
    printResults(outcome.prResults);
  }

  if (outcome.failed) {
    console.log("❌ One or more monitors encountered processing errors");
    process.exit(1);
  }

  if (!options.markdown && outcome.prResults.every((result) => result.unapprovedPRs.length === 0) && outcome.findings.length === 0) {
    console.log("✅ All monitors completed successfully");
  }
}

main().catch((error) => {
  if (isCancellation(error)) {
    console.error(`❌ Run cancelled: ${errorMessage(error)}`);
  } else {
    console.error("❌ Error during monitoring run:", error);
  }
  process.exit(1);
});
