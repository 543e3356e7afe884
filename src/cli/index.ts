import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import type { LogLevel } from "../logging/logger.js";
import { runCheckCommand } from "./check-command.js";
import { writeError, writeStdout } from "./io.js";
import { runRulesCommand } from "./rules-command.js";

interface CheckFlags {
  format: string;
  out?: string;
  config?: string;
  disable: string[];
  maxChars?: string;
  merge?: string;
  threshold?: string;
  show: string;
  maxIssues?: string;
  showSuggestions?: boolean;
}

interface RulesFlags {
  config?: string;
  disable: string[];
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("docreview")
  .description("Deterministic quality checks for document text")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output");

program
  .command("check")
  .argument("<file>", "Text file to check, or - for stdin")
  .option("--format <format>", "Output format (json|md)", "md")
  .option("--out <file>", "Write report to file")
  .option("--config <path>", "Config file (default: ./docreview.yaml)")
  .option("--disable <ids>", "Comma-separated rule ids to skip", collectIds, [])
  .option("--max-chars <number>", "Character budget for analysis")
  .option("--merge <file>", "JSON file of external issues to merge")
  .option("--threshold <number>", "Exit with error if score is below threshold")
  .option("--show <section>", "Output sections (summary|issues|all)", "all")
  .option("--max-issues <number>", "Limit issues in output")
  .option("--show-suggestions", "Include suggested fixes")
  .action(async (file: string, options: CheckFlags) => {
    try {
      const threshold = parseOptionalNumber(options.threshold, "--threshold");
      const result = await runCheckCommand(
        {
          file,
          format: parseFormat(options.format),
          out: options.out,
          configPath: options.config,
          disable: options.disable,
          maxChars: parseOptionalNumber(options.maxChars, "--max-chars"),
          mergePath: options.merge,
          show: parseShow(options.show),
          maxIssues: parseOptionalNumber(options.maxIssues, "--max-issues"),
          showSuggestions: Boolean(options.showSuggestions),
          logLevel: globalLogLevel(),
        },
        toolVersion,
      );

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }

      if (threshold !== undefined && result.report.summary.overall < threshold) {
        process.exitCode = 2;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("rules")
  .description("List the built-in rules")
  .option("--config <path>", "Config file (default: ./docreview.yaml)")
  .option("--disable <ids>", "Comma-separated rule ids to skip", collectIds, [])
  .action(async (options: RulesFlags) => {
    try {
      const output = await runRulesCommand({
        configPath: options.config,
        disable: options.disable,
      });
      await writeStdout(output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function collectIds(value: string, previous: string[]): string[] {
  const ids = value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return [...previous, ...ids];
}

function globalLogLevel(): LogLevel | undefined {
  const options = program.opts<{ verbose?: boolean; quiet?: boolean }>();
  if (options.verbose) {
    return "debug";
  }
  if (options.quiet) {
    return "error";
  }
  return undefined;
}

function parseFormat(value: string): "json" | "md" {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseShow(value: string): "summary" | "issues" | "all" {
  if (value === "summary" || value === "issues" || value === "all") {
    return value;
  }
  throw new Error(`Unsupported section: ${value}`);
}

function parseOptionalNumber(
  value: string | undefined,
  flag: string,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number, got ${value}`);
  }
  return parsed;
}

await program.parseAsync(process.argv);
