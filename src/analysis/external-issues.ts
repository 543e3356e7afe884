import { createIssue } from "./issue-factory.js";
import {
  ISSUE_CATEGORIES,
  ISSUE_SEVERITIES,
  type Issue,
  type IssueCategory,
  type IssueSeverity,
} from "./types.js";

const ISSUE_KEYS = new Set([
  "category",
  "severity",
  "title",
  "description",
  "location",
  "context",
  "suggestion",
  "affects_score",
]);

const CATEGORY_SET = new Set<string>(ISSUE_CATEGORIES);
const SEVERITY_SET = new Set<string>(ISSUE_SEVERITIES);

/**
 * Validate externally produced issues (for example an LLM review exported
 * as JSON) and turn them into `external` issues. All problems are reported
 * in one error.
 */
export function parseExternalIssues(input: unknown): Issue[] {
  const errors: string[] = [];
  if (!Array.isArray(input)) {
    throw new Error("Invalid issues: expected an array");
  }

  const issues: Issue[] = [];
  input.forEach((item: unknown, position) => {
    const issue = parseIssue(item, `issues[${position}]`, errors);
    if (issue) {
      issues.push(issue);
    }
  });

  if (errors.length > 0) {
    throw new Error(`Invalid issues: ${errors.join("; ")}`);
  }
  return issues;
}

function parseIssue(
  input: unknown,
  label: string,
  errors: string[],
): Issue | null {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return null;
  }

  for (const key of Object.keys(input)) {
    if (!ISSUE_KEYS.has(key)) {
      errors.push(`${label}.${key} is not allowed`);
    }
  }

  const errorCount = errors.length;
  const category = readCategory(input.category, label, errors);
  const severity = readSeverity(input.severity, label, errors);
  const title = readRequiredString(input.title, `${label}.title`, errors);
  const description = readOptionalString(
    input.description,
    `${label}.description`,
    errors,
  );
  const location = readOptionalString(input.location, `${label}.location`, errors);
  const context = readOptionalString(input.context, `${label}.context`, errors);
  const suggestion = readOptionalString(
    input.suggestion,
    `${label}.suggestion`,
    errors,
  );
  const affectsScore = input.affects_score;
  if (affectsScore !== undefined && typeof affectsScore !== "boolean") {
    errors.push(`${label}.affects_score must be a boolean`);
  }

  if (
    errors.length > errorCount ||
    category === null ||
    severity === null ||
    title === null
  ) {
    return null;
  }

  return createIssue({
    source: "external",
    category,
    severity,
    title,
    description: description ?? "",
    location,
    context,
    suggestion,
    affects_score: typeof affectsScore === "boolean" ? affectsScore : undefined,
  });
}

function readCategory(
  value: unknown,
  label: string,
  errors: string[],
): IssueCategory | null {
  if (typeof value === "string" && isIssueCategory(value)) {
    return value;
  }
  errors.push(
    `${label}.category must be one of ${ISSUE_CATEGORIES.join(", ")}`,
  );
  return null;
}

function readSeverity(
  value: unknown,
  label: string,
  errors: string[],
): IssueSeverity | null {
  if (typeof value === "string" && isIssueSeverity(value)) {
    return value;
  }
  errors.push(
    `${label}.severity must be one of ${ISSUE_SEVERITIES.join(", ")}`,
  );
  return null;
}

function readRequiredString(
  value: unknown,
  label: string,
  errors: string[],
): string | null {
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  errors.push(`${label} must be a non-empty string`);
  return null;
}

function readOptionalString(
  value: unknown,
  label: string,
  errors: string[],
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  errors.push(`${label} must be a string`);
  return undefined;
}

export function isIssueCategory(value: string): value is IssueCategory {
  return CATEGORY_SET.has(value);
}

export function isIssueSeverity(value: string): value is IssueSeverity {
  return SEVERITY_SET.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
