import { toErrorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { qualityScore } from "./rule-validator.js";
import type { RuleOutcome } from "./rule-validator.js";
import type { InputValidatorPort, Severity, ValidationResult, Violation } from "./types.js";

const log = createLogger("validation");

export type InputRule = {
  name: string;
  severity: Severity;
  check(input: string): RuleOutcome;
};

const INJECTION_MARKERS = [
  "DROP TABLE",
  "DELETE FROM",
  "INSERT INTO",
  "EXEC(",
  "EXECUTE(",
  "<script",
  "javascript:",
  "onerror=",
  "onload=",
];

const PII_PATTERNS: Record<string, RegExp> = {
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/,
  ssn: /\b\d{3}-\d{2}-\d{4}\b/,
  "credit card": /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/,
};

export function notBlank(): InputRule {
  return {
    name: "input.not-blank",
    severity: "error",
    check: (input) => (input.trim().length === 0 ? "Input is empty" : undefined),
  };
}

export function maxInputLength(maxChars: number, severity: Severity = "error"): InputRule {
  return {
    name: "input.max-length",
    severity,
    check: (input) =>
      input.length > maxChars ? `Input is ${input.length} chars (limit ${maxChars})` : undefined,
  };
}

/** Case-insensitive search for SQL and script injection markers. */
export function noInjection(markers: string[] = INJECTION_MARKERS, severity: Severity = "error"): InputRule {
  return {
    name: "input.no-injection",
    severity,
    check: (input) => {
      const upper = input.toUpperCase();
      return markers
        .filter((marker) => upper.includes(marker.toUpperCase()))
        .map((marker) => `Potential injection: ${marker}`);
    },
  };
}

/** Flags emails, phone numbers, SSNs and card numbers. Warns by default. */
export function noPii(severity: Severity = "warning"): InputRule {
  return {
    name: "input.no-pii",
    severity,
    check: (input) =>
      Object.entries(PII_PATTERNS)
        .filter(([, pattern]) => pattern.test(input))
        .map(([kind]) => `Possible ${kind} in input`),
  };
}

export function defaultInputRules(): InputRule[] {
  return [notBlank(), maxInputLength(100_000), noInjection(), noPii()];
}

/**
 * Screens text before the loop acts on it. Rejects when any rule reports an
 * `error`; warnings are kept on the result and logged.
 */
export class InputValidator implements InputValidatorPort {
  private rules: InputRule[];

  constructor(rules: InputRule[] = defaultInputRules()) {
    this.rules = [...rules];
  }

  add(rule: InputRule): this {
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

  validate(input: string): ValidationResult {
    const violations: Violation[] = [];

    for (const rule of this.rules) {
      let outcome: RuleOutcome;
      try {
        outcome = rule.check(input);
      } catch (err) {
        log.error(`Input rule "${rule.name}" threw`, { error: toErrorMessage(err) });
        violations.push({ ruleName: rule.name, severity: "error", message: `Rule failed: ${toErrorMessage(err)}` });
        continue;
      }
      const messages = outcome === undefined ? [] : Array.isArray(outcome) ? outcome : [outcome];
      for (const message of messages) {
        violations.push({ ruleName: rule.name, severity: rule.severity, message });
      }
    }

    const warnings = violations.filter((v) => v.severity === "warning");
    if (warnings.length > 0) log.warn("Input flagged", { warnings: warnings.map((v) => v.message) });

    return {
      passed: violations.every((v) => v.severity !== "error"),
      violations,
      score: qualityScore(violations),
    };
  }
}
