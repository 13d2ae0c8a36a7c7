import type { ViewEntry } from "../context/types.js";
import { toErrorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { LatestResults, Severity, ValidationResult, ValidatorPort, Violation } from "./types.js";

const log = createLogger("validation");

export type RuleOutcome = string | string[] | undefined;

export type ValidationRule = {
  name: string;
  severity: Severity;
  check(view: ViewEntry[], results: LatestResults): RuleOutcome | Promise<RuleOutcome>;
};

/** 1.0 minus 0.2 per error and 0.1 per warning, floored at zero. */
export function qualityScore(violations: Violation[]): number {
  const errors = violations.filter((v) => v.severity === "error").length;
  const warnings = violations.filter((v) => v.severity === "warning").length;
  return Math.max(0, Math.round((1 - errors * 0.2 - warnings * 0.1) * 100) / 100);
}

/**
 * Runs a fixed list of rules in order. Passes when no rule reports an
 * `error`; a rule that throws counts as an error under its own name.
 */
export class RuleValidator implements ValidatorPort {
  private rules: ValidationRule[];

  constructor(rules: ValidationRule[] = []) {
    this.rules = [...rules];
  }

  add(rule: ValidationRule): this {
    this.rules.push(rule);
    return this;
  }

  remove(name: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter((r) => r.name !== name);
    return this.rules.length < before;
  }

  names(): string[] {
    return this.rules.map((r) => r.name);
  }

  async validate(view: ViewEntry[], latestResults: LatestResults): Promise<ValidationResult> {
    const violations: Violation[] = [];

    for (const rule of this.rules) {
      let outcome: RuleOutcome;
      try {
        outcome = await rule.check(view, latestResults);
      } catch (err) {
        log.error(`Rule "${rule.name}" threw`, { error: toErrorMessage(err) });
        violations.push({ ruleName: rule.name, severity: "error", message: `Rule failed: ${toErrorMessage(err)}` });
        continue;
      }
      const messages = outcome === undefined ? [] : Array.isArray(outcome) ? outcome : [outcome];
      for (const message of messages) {
        violations.push({ ruleName: rule.name, severity: rule.severity, message });
      }
    }

    return {
      passed: violations.every((v) => v.severity !== "error"),
      violations,
      score: qualityScore(violations),
    };
  }
}

// ---------------------------------------------------------------------------
// Built-in rules
// ---------------------------------------------------------------------------

export function nonEmptyResults(severity: Severity = "error"): ValidationRule {
  return {
    name: "non-empty-results",
    severity,
    check: (_view, results) =>
      Object.entries(results)
        .filter(([, r]) => r.output.trim().length === 0)
        .map(([id]) => `Node "${id}" produced empty output`),
  };
}

export function maxResultLength(maxChars: number, severity: Severity = "warning"): ValidationRule {
  return {
    name: "max-result-length",
    severity,
    check: (_view, results) =>
      Object.entries(results)
        .filter(([, r]) => r.output.length > maxChars)
        .map(([id, r]) => `Node "${id}" output is ${r.output.length} chars (limit ${maxChars})`),
  };
}

export function forbiddenPatterns(patterns: RegExp[], severity: Severity = "error"): ValidationRule {
  return {
    name: "forbidden-patterns",
    severity,
    check: (_view, results) => {
      const hits: string[] = [];
      for (const [id, r] of Object.entries(results)) {
        for (const pattern of patterns) {
          if (r.output.search(pattern) !== -1) hits.push(`Node "${id}" output matches ${pattern}`);
        }
      }
      return hits;
    },
  };
}
