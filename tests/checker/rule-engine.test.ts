import { describe, expect, expectTypeOf, it } from "vitest";
import { RULE_CATALOGUE, findRule } from "../../src/checker/catalogue.js";
import { enabledRules, runRules } from "../../src/checker/rule-engine.js";
import { toRuleRecord } from "../../src/checker/match-factory.js";
import type { RuleDefinition } from "../../src/checker/types.js";
import { Logger, type LogEntry } from "../../src/logging/logger.js";

const SAMPLE = "Hello  world the the (x";

describe("rule engine", () => {
  it("declares the catalogue in a fixed order with unique ids", () => {
    const ids = RULE_CATALOGUE.map((rule) => rule.id);
    expect(ids).toEqual([
      "double-spaces",
      "repeated-words",
      "missing-space-after-punct",
      "space-before-punct",
      "unclosed-brackets",
      "trailing-whitespace",
      "multiple-blank-lines",
      "inconsistent-quotes",
      "tab-characters",
      "double-hyphen-emdash",
      "hidden-characters",
      "straight-vs-curly-quotes",
    ]);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("returns no matches for empty text", () => {
    expect(runRules("")).toEqual([]);
  });

  it("runs every rule when nothing is disabled", () => {
    expect(runRules(SAMPLE).map((match) => match.rule_id)).toEqual([
      "double-spaces",
      "repeated-words",
      "unclosed-brackets",
    ]);
  });

  it("removes exactly the matches of a disabled rule", () => {
    const all = runRules(SAMPLE);
    const withoutRepeated = runRules(SAMPLE, new Set(["repeated-words"]));
    expect(withoutRepeated).toEqual(
      all.filter((match) => match.rule_id !== "repeated-words"),
    );
  });

  it("ignores unknown disabled ids", () => {
    expect(runRules(SAMPLE, ["no-such-rule"])).toEqual(runRules(SAMPLE));
  });

  it("keeps catalogue order regardless of match position", () => {
    const text = "\u200bstart. Then  end (";
    expect(runRules(text).map((match) => match.rule_id)).toEqual([
      "double-spaces",
      "unclosed-brackets",
      "hidden-characters",
    ]);
  });

  it("returns identical output for identical input", () => {
    const text = "one \n\n\n\ntwo  three\tfour -- five";
    expect(runRules(text, ["tab-characters"])).toEqual(
      runRules(text, ["tab-characters"]),
    );
  });

  it("handles control and zero-width characters without failing", () => {
    const text = "\u0000\u0007\u200d\ufeff\u2060\r\n\u{1F600} ";
    const matches = runRules(text);
    expect(matches.map((match) => match.rule_id)).toEqual([
      "trailing-whitespace",
      "hidden-characters",
    ]);
    expect(matches[1]?.context).toBe(
      "zero-width joiner: 1, byte order mark: 1, word joiner: 1",
    );
  });

  it("isolates a failing rule and logs a warning", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: "warn" }).addTransport((entry) =>
      entries.push(entry),
    );
    const brokenRule: RuleDefinition = {
      id: "broken",
      name: "Broken",
      category: "formatting",
      severity: "low",
      group: "low",
      description: "Always throws",
      check: () => {
        throw new Error("boom");
      },
    };
    const tabs = findRule("tab-characters");
    expect(tabs).toBeDefined();
    if (!tabs) {
      return;
    }

    const matches = runRules("a\tb", [], { rules: [brokenRule, tabs], logger });

    expect(matches.map((match) => match.rule_id)).toEqual(["tab-characters"]);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe("warn");
    expect(entries[0]?.data).toEqual({ rule_id: "broken", error: "boom" });
  });

  it("accepts disabled ids as a set or an array, never a bare string", () => {
    expect(runRules("a  b", new Set(["double-spaces"]))).toEqual([]);
    expect(runRules("a  b", ["double-spaces"])).toEqual([]);
    expectTypeOf<string>().not.toMatchTypeOf<Parameters<typeof runRules>[1]>();
  });

  it("lists enabled rules", () => {
    const ids = enabledRules(["double-spaces", "bogus"]).map((rule) => rule.id);
    expect(ids).toHaveLength(RULE_CATALOGUE.length - 1);
    expect(ids).not.toContain("double-spaces");
  });

  it("serializes matches with a rule source tag", () => {
    const [match] = runRules("the the");
    expect(match).toBeDefined();
    if (!match) {
      return;
    }
    expect(toRuleRecord(match)).toEqual({
      rule_id: "repeated-words",
      rule_name: "Repeated Word",
      category: "grammar",
      severity: "high",
      matched_text: "the the",
      suggestion: "Remove duplicate 'the'",
      location: "Line 1",
      context: "the the",
      source: "rule",
    });
  });
});
