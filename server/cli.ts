#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import { ZodError } from "zod";
import { diagnose, rankRecommendations, renderMarkdownReport, createLogger } from "./diagnosis";
import type { Locale } from "./diagnosis";
import { loadEnv } from "./env";

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

interface CliOptions {
  timeoutMs: number;
  tlsTimeoutMs: number;
  userAgent?: string;
  format: "json" | "markdown";
  lang: Locale;
  verbose?: boolean;
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
  }
  if (error instanceof Error) {
    return error.message || "Unknown error occurred";
  }
  return String(error);
}

export function buildProgram(run: typeof diagnose = diagnose): Command {
  const program = new Command();

  program
    .name("site-diagnosis")
    .description("Score a single web page for SEO, security, performance and accessibility")
    .version("1.0.0")
    .argument("<url>", "The page to diagnose (https:// is assumed when no scheme is given)")
    .option("--timeoutMs <number>", "Page fetch timeout in milliseconds", parsePositiveInt, 30000)
    .option("--tlsTimeoutMs <number>", "TLS certificate check timeout in milliseconds", parsePositiveInt, 10000)
    .option("--userAgent <string>", "User agent string")
    .addOption(new Option("--format <format>", "Output format").choices(["json", "markdown"]).default("json"))
    .addOption(new Option("--lang <lang>", "Report language").choices(["ja", "en"]).default("ja"))
    .option("--verbose", "Log progress to stderr")
    .action(async (url: string, options: CliOptions) => {
      const env = loadEnv();
      const logger = createLogger("diagnosis", options.verbose ? "debug" : env.DIAGNOSIS_LOG_LEVEL);

      try {
        const result = await run(url, {
          timeoutMs: options.timeoutMs,
          tlsTimeoutMs: options.tlsTimeoutMs,
          userAgent: options.userAgent,
          logger,
        });

        if (options.format === "markdown") {
          process.stdout.write(renderMarkdownReport(result, options.lang));
        } else {
          console.log(JSON.stringify({ result, recommendations: rankRecommendations(result) }, null, 2));
        }
        process.exitCode = 0;
      } catch (error) {
        console.error(JSON.stringify({ error: true, message: describeError(error) }, null, 2));
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(JSON.stringify({ error: true, message: describeError(error) }, null, 2));
      process.exitCode = 1;
    });
}
