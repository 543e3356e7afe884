import { RULE_CATALOGUE, isKnownRuleId } from "../checker/catalogue.js";
import { loadConfig, mergeConfig } from "../config/config-loader.js";
import { renderRulesTable } from "../report/rules-table.js";

export interface RulesOptions {
  readonly configPath?: string;
  readonly disable?: readonly string[];
  readonly cwd?: string;
}

export async function runRulesCommand(options: RulesOptions = {}): Promise<string> {
  const fileConfig = await loadConfig({
    configPath: options.configPath,
    cwd: options.cwd,
  });
  const config = mergeConfig(fileConfig, { disable: options.disable });
  const lines = [renderRulesTable(RULE_CATALOGUE, config.disabled_rules)];

  // Unknown ids are ignored by the engine; list them so typos are visible.
  const unknown = config.disabled_rules.filter((id) => !isKnownRuleId(id));
  if (unknown.length > 0) {
    lines.push("");
    lines.push(`Unknown rule ids (ignored): ${unknown.join(", ")}`);
  }
  return lines.join("\n");
}
