import fs from "node:fs/promises";
import path from "node:path";
import { analyzeText } from "../analysis/analyzer.js";
import { parseExternalIssues } from "../analysis/external-issues.js";
import type { Issue } from "../analysis/types.js";
import { loadConfig, mergeConfig } from "../config/config-loader.js";
import { createLogger, type LogLevel, type Logger } from "../logging/logger.js";
import { buildJsonReport } from "../report/json-reporter.js";
import {
  renderMarkdownReport,
  type MarkdownRenderOptions,
} from "../report/markdown-reporter.js";
import type { ReviewReport } from "../report/types.js";
import { readStdin } from "./io.js";

export const STDIN_TARGET = "-";

export interface CheckOptions {
  readonly file: string;
  readonly format: "json" | "md";
  readonly out?: string;
  readonly configPath?: string;
  readonly disable?: readonly string[];
  readonly maxChars?: number;
  readonly mergePath?: string;
  readonly show?: "summary" | "issues" | "all";
  readonly maxIssues?: number;
  readonly showSuggestions?: boolean;
  readonly logLevel?: LogLevel;
  readonly logger?: Logger;
  readonly cwd?: string;
  readonly readInput?: () => Promise<string>;
}

export interface CheckResult {
  readonly report: ReviewReport;
  readonly output: string;
}

export async function runCheckCommand(
  options: CheckOptions,
  toolVersion: string,
): Promise<CheckResult> {
  const cwd = options.cwd ?? process.cwd();
  const fileConfig = await loadConfig({ configPath: options.configPath, cwd });
  const config = mergeConfig(fileConfig, {
    disable: options.disable,
    maxChars: options.maxChars,
    logLevel: options.logLevel,
  });
  const logger =
    options.logger ?? createLogger({ level: config.log_level, context: "docreview" });

  const text = await readDocument(options, cwd);
  logger.debug("Document loaded", { source: options.file, length: text.length });

  const externalIssues = options.mergePath
    ? await readExternalIssues(path.resolve(cwd, options.mergePath))
    : [];
  if (externalIssues.length > 0) {
    logger.info("Merging external issues", { count: externalIssues.length });
  }

  const analysis = analyzeText({
    text,
    title: documentTitle(options.file),
    disabledRules: config.disabled_rules,
    externalIssues,
    maxChars: config.max_chars,
    logger,
  });

  const report = buildJsonReport({
    toolVersion,
    source: options.file,
    analysis,
  });
  const output = buildOutput(report, options);

  if (options.out) {
    await fs.writeFile(path.resolve(cwd, options.out), output, "utf8");
    logger.info("Report written", { path: options.out });
  }

  return { report, output };
}

async function readDocument(options: CheckOptions, cwd: string): Promise<string> {
  if (options.file === STDIN_TARGET) {
    return await (options.readInput ?? readStdin)();
  }
  return await fs.readFile(path.resolve(cwd, options.file), "utf8");
}

async function readExternalIssues(issuesPath: string): Promise<Issue[]> {
  const raw = await fs.readFile(issuesPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid issues file ${issuesPath}: ${message}`);
  }
  return parseExternalIssues(parsed);
}

function documentTitle(file: string): string {
  return file === STDIN_TARGET ? "stdin" : path.basename(file);
}

function buildOutput(report: ReviewReport, options: CheckOptions): string {
  if (options.format === "json") {
    return JSON.stringify(report, null, 2);
  }
  return renderMarkdownReport(report, buildMarkdownOptions(options));
}

function buildMarkdownOptions(options: CheckOptions): MarkdownRenderOptions {
  const show = options.show ?? "all";
  return {
    showSummary: show === "summary" || show === "all",
    showIssues: show === "issues" || show === "all",
    maxIssues: options.maxIssues,
    showSuggestions: options.showSuggestions ?? false,
  };
}
