export { analyzeText } from "./analyzer.js";
export { parseExternalIssues } from "./external-issues.js";
export {
  createIssue,
  createIssueId,
  defaultAffectsScore,
  matchToIssue,
} from "./issue-factory.js";
export { mergeIssues } from "./merge.js";
export { MAX_ANALYSIS_CHARS, truncateText } from "./truncate.js";
export type {
  AnalysisResult,
  AnalyzeInput,
  Issue,
  IssueCategory,
  IssueSeverity,
  IssueSource,
} from "./types.js";
export { ISSUE_CATEGORIES, ISSUE_SEVERITIES } from "./types.js";
