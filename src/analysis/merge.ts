import type { Issue } from "./types.js";

/**
 * Concatenate issue lists in argument order. An issue whose id was already
 * seen is dropped, so the earlier list wins.
 */
export function mergeIssues(...lists: ReadonlyArray<readonly Issue[]>): Issue[] {
  const merged: Issue[] = [];
  const seenIds = new Set<string>();

  for (const list of lists) {
    for (const issue of list) {
      if (seenIds.has(issue.id)) {
        continue;
      }
      seenIds.add(issue.id);
      merged.push(issue);
    }
  }

  return merged;
}
