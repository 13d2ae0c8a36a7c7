import type { ViewEntry } from "../context/types.js";
import type { TaskResult } from "../graph/types.js";

export type Severity = "error" | "warning" | "info";

export type Violation = {
  ruleName: string;
  severity: Severity;
  message: string;
};

export type ValidationResult = {
  passed: boolean;
  violations: Violation[];
  score?: number;
};

/** Results of the nodes that finished in the latest execution phase, by node id. */
export type LatestResults = Record<string, TaskResult>;

export interface ValidatorPort {
  validate(view: ViewEntry[], latestResults: LatestResults): Promise<ValidationResult>;
}

/** Screens free text entering the loop, such as the session goal. */
export interface InputValidatorPort {
  validate(input: string): ValidationResult;
}
