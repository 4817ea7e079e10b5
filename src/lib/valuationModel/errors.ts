/**
 * Valuation Model - Errors
 *
 * Error taxonomy shared by every engine. Kernel functions throw
 * ValuationError; orchestration boundaries convert to EngineResult so
 * callers never receive a bare exception.
 */

export type ValuationErrorCode =
  /** Missing/negative/out-of-range input, rejected before computation */
  | "INVALID_INPUT"
  /** Model diverges or divides by zero (e.g. WACC <= terminal growth) */
  | "DEGENERATE_MODEL"
  /** Method not applicable to this company or not implemented */
  | "UNSUPPORTED_METHOD"
  /** Required external data (comparables, transactions, book values) not supplied */
  | "MISSING_DATA";

export interface ValuationIssue {
  path: string;
  message: string;
}

export class ValuationError extends Error {
  readonly code: ValuationErrorCode;
  readonly parameter?: string;
  readonly issues: readonly ValuationIssue[];

  constructor(
    code: ValuationErrorCode,
    message: string,
    opts: { parameter?: string; issues?: ValuationIssue[] } = {},
  ) {
    super(message);
    this.name = "ValuationError";
    this.code = code;
    this.parameter = opts.parameter;
    this.issues = opts.issues ?? [];
  }
}

export function isValuationError(e: unknown): e is ValuationError {
  return e instanceof ValuationError;
}

// ---------------------------------------------------------------------------
// Engine result envelope
// ---------------------------------------------------------------------------

export interface EngineFailure {
  code: ValuationErrorCode | "INTERNAL";
  message: string;
  parameter?: string;
  issues?: ValuationIssue[];
}

export type EngineResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EngineFailure };

export function toEngineFailure(e: unknown): EngineFailure {
  if (isValuationError(e)) {
    return {
      code: e.code,
      message: e.message,
      ...(e.parameter !== undefined ? { parameter: e.parameter } : {}),
      ...(e.issues.length > 0 ? { issues: [...e.issues] } : {}),
    };
  }
  return {
    code: "INTERNAL",
    message: e instanceof Error ? e.message : String(e),
  };
}

/** Run a throwing computation and wrap its outcome. */
export function toEngineResult<T>(fn: () => T): EngineResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    return { ok: false, error: toEngineFailure(e) };
  }
}

export async function toEngineResultAsync<T>(
  fn: () => Promise<T>,
): Promise<EngineResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e) {
    return { ok: false, error: toEngineFailure(e) };
  }
}
