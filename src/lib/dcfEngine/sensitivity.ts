import { isValuationError } from "@/lib/valuationModel/errors";
import type { Company } from "@/lib/valuationModel/types";
import type {
  DcfOptions,
  DcfOverrideKey,
  DcfOverrides,
  DcfSensitivityResult,
} from "./types";
import { computeDcf, resolveDcfOptions, validateOverrides } from "./dcf";

/**
 * Re-run the DCF once per value of `parameter`. Points where the model is
 * degenerate (or the override is out of domain) are recorded as null.
 */
export function dcfSensitivityAnalysis(
  company: Company,
  parameter: DcfOverrideKey,
  values: readonly number[],
  options: DcfOptions & { overrides?: DcfOverrides } = {},
): DcfSensitivityResult {
  const resolved = resolveDcfOptions(options);
  const base = validateOverrides(options.overrides ?? {});

  const points = values.map((parameterValue) => {
    try {
      const patch: DcfOverrides = { ...base };
      patch[parameter] = parameterValue;
      const overrides = validateOverrides(patch);
      return { parameterValue, value: computeDcf(company, overrides, resolved).value };
    } catch (e) {
      if (isValuationError(e)) return { parameterValue, value: null };
      throw e;
    }
  });

  return { parameter, points };
}
