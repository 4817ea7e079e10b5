import type { ZodError } from "zod";
import type { Comparable, Company, ScenarioConfig } from "./types";
import { ValuationError, type ValuationIssue } from "./errors";
import {
  CompanyInputSchema,
  ComparableSchema,
  ScenarioConfigSchema,
} from "./schemas";

function toIssues(error: ZodError): ValuationIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join(".") || "(root)",
    message: i.message,
  }));
}

function describeIssues(issues: ValuationIssue[]): string {
  return issues.map((i) => `${i.path}: ${i.message}`).join("; ");
}

/**
 * Validate raw company input, apply documented defaults and return an
 * immutable Company. Throws ValuationError("INVALID_INPUT") listing every
 * offending field.
 */
export function parseCompany(input: unknown): Company {
  const parsed = CompanyInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new ValuationError("INVALID_INPUT", `Invalid company: ${describeIssues(issues)}`, {
      parameter: issues[0]?.path,
      issues,
    });
  }

  const d = parsed.data;
  return Object.freeze({
    ...d,
    ebitda: d.ebitda ?? undefined,
    reinvestment: Object.freeze({ ...d.reinvestment }),
  });
}

/**
 * Return a frozen copy of `company` with `patch` applied. The source company
 * is never touched; analyses use this to build overridden inputs.
 */
export function deriveCompany(
  company: Company,
  patch: Partial<Omit<Company, "reinvestment">>,
): Company {
  return Object.freeze({ ...company, ...patch });
}

export function parseComparable(input: unknown): Comparable {
  const parsed = ComparableSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new ValuationError("INVALID_INPUT", `Invalid comparable: ${describeIssues(issues)}`, {
      parameter: issues[0]?.path,
      issues,
    });
  }
  return parsed.data;
}

export function parseComparables(input: unknown): Comparable[] {
  if (!Array.isArray(input)) {
    throw new ValuationError("INVALID_INPUT", "Comparables must be an array", {
      parameter: "comparables",
    });
  }
  return input.map((c, idx) => {
    try {
      return parseComparable(c);
    } catch (e) {
      if (e instanceof ValuationError) {
        throw new ValuationError("INVALID_INPUT", `comparables[${idx}]: ${e.message}`, {
          parameter: `comparables[${idx}]`,
          issues: [...e.issues],
        });
      }
      throw e;
    }
  });
}

export function parseScenarioConfig(input: unknown): ScenarioConfig {
  const parsed = ScenarioConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new ValuationError("INVALID_INPUT", `Invalid scenario: ${describeIssues(issues)}`, {
      parameter: issues[0]?.path,
      issues,
    });
  }
  return parsed.data;
}
