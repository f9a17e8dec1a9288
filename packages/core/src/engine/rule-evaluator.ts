import type { ContextField, DetectionRule, FieldCondition } from "@exam-desk/schemas";
import type { EvaluationContext } from "./context.js";

export type ContextValue = EvaluationContext[ContextField];

export interface ConditionResult {
  field: ContextField;
  operator: FieldCondition["operator"];
  expected: FieldCondition["value"];
  actual: ContextValue;
  matched: boolean;
}

export function readField(context: Readonly<EvaluationContext>, field: ContextField): ContextValue {
  return context[field];
}

function isTruthy(value: ContextValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function compare(
  actual: ContextValue,
  expected: FieldCondition["value"],
  test: (a: number, b: number) => boolean,
): boolean {
  return typeof actual === "number" && typeof expected === "number" && test(actual, expected);
}

export function evaluateCondition(
  condition: FieldCondition,
  context: Readonly<EvaluationContext>,
): ConditionResult {
  const actual = readField(context, condition.field);
  const expected = condition.value;
  let matched = false;

  switch (condition.operator) {
    case "eq":
      matched = actual === (expected ?? null);
      break;
    case "neq":
      matched = actual !== (expected ?? null);
      break;
    case "in":
      matched = Array.isArray(expected) && (typeof actual === "string" || typeof actual === "number")
        && expected.includes(actual);
      break;
    case "not_in":
      // Absent values are "not in" any list.
      matched = Array.isArray(expected)
        && !((typeof actual === "string" || typeof actual === "number") && expected.includes(actual));
      break;
    case "truthy":
      matched = isTruthy(actual);
      break;
    case "falsy":
      matched = !isTruthy(actual);
      break;
    case "gt":
      matched = compare(actual, expected, (a, b) => a > b);
      break;
    case "gte":
      matched = compare(actual, expected, (a, b) => a >= b);
      break;
    case "lt":
      matched = compare(actual, expected, (a, b) => a < b);
      break;
    case "lte":
      matched = compare(actual, expected, (a, b) => a <= b);
      break;
    case "contains":
      if (Array.isArray(actual)) {
        matched = typeof expected === "string" && actual.includes(expected);
      } else {
        matched = typeof actual === "string" && typeof expected === "string" && actual.includes(expected);
      }
      break;
  }

  return { field: condition.field, operator: condition.operator, expected, actual, matched };
}

/** Primary intent first, then the secondary intents of a multi-intent message. */
export function hasIntent(context: Readonly<EvaluationContext>, intent: string): boolean {
  return context.primaryIntent === intent || context.secondaryIntents.includes(intent);
}

/** Short human-readable form of a rule, used as the detection reason. */
export function describeRule(rule: DetectionRule): string {
  switch (rule.method) {
    case "field": {
      const { field, operator, value } = rule.condition;
      return value === undefined ? `${field} ${operator}` : `${field} ${operator} ${JSON.stringify(value)}`;
    }
    case "all_of":
      return `all of (${rule.rules.map(describeRule).join(", ")})`;
    case "any_of":
      return `any of (${rule.rules.map(describeRule).join(", ")})`;
    case "not":
      return `not (${describeRule(rule.rule)})`;
    case "uber_case":
      return `uber case ${rule.case}`;
    case "exam_date_case":
      return `exam date case ${rule.case}`;
    case "intent":
      return `intent ${rule.intent}`;
    case "triage_action":
      return `triage action ${rule.action}`;
    case "fallback":
      return "fallback";
    case "unsupported":
      return `unsupported method ${rule.declaredMethod}`;
    default: {
      const exhaustive: never = rule;
      throw new Error(`Unhandled detection rule: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Single dispatcher over the detection-rule union. Pure: it reads the frozen
 * context and never writes to it.
 */
export function evaluateRule(rule: DetectionRule, context: Readonly<EvaluationContext>): boolean {
  switch (rule.method) {
    case "field":
      return evaluateCondition(rule.condition, context).matched;
    case "all_of":
      return rule.rules.length > 0 && rule.rules.every((child) => evaluateRule(child, context));
    case "any_of":
      return rule.rules.some((child) => evaluateRule(child, context));
    case "not":
      return !evaluateRule(rule.rule, context);
    case "uber_case":
      return context.uberCase === rule.case;
    case "exam_date_case":
      return context.examDateCase === rule.case;
    case "intent":
      return hasIntent(context, rule.intent);
    case "triage_action":
      return context.triageAction === rule.action;
    case "fallback":
      return true;
    case "unsupported":
      return false;
    default: {
      const exhaustive: never = rule;
      throw new Error(`Unhandled detection rule: ${JSON.stringify(exhaustive)}`);
    }
  }
}
