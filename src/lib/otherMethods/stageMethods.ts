/**
 * Other Methods — Stage-Appropriate Methods
 */

import type { Company, CompanyStage, ValuationMethod } from "@/lib/valuationModel/types";

/** Methods suited to each lifecycle stage, most appropriate first. */
export const STAGE_METHODS: Readonly<Record<CompanyStage, readonly ValuationMethod[]>> = {
  early: ["VC", "TRANSACTION_COMPARABLE"],
  growth: ["PS", "DCF", "VC"],
  mature: ["PE", "DCF", "EV_EBITDA"],
  listed: ["PE", "PB", "EV_EBITDA", "DCF"],
};

export function analyzeStageAppropriateValuation(
  company: Pick<Company, "stage">,
): readonly ValuationMethod[] {
  return STAGE_METHODS[company.stage];
}
