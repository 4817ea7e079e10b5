import { z } from "zod";

/**
 * Documented defaults applied when an optional Company field is absent.
 * These are assumptions, not data: callers should override them per company.
 */
export const COMPANY_DEFAULTS = {
  netAssets: 0,
  totalDebt: 0,
  cashAndEquivalents: 0,
  growthRate: 0.15,
  operatingMargin: 0.2,
  taxRate: 0.25,
  beta: 1.0,
  riskFreeRate: 0.03,
  marketRiskPremium: 0.07,
  costOfDebt: 0.05,
  targetDebtRatio: 0.3,
  terminalGrowthRate: 0.025,
  reinvestment: {
    capexRatio: 0,
    workingCapitalRatio: 0,
    depreciationRatio: 0,
  },
} as const;

const money = z.number().finite().min(0, "must be >= 0");
const rate = z.number().finite();
const ratio = z.number().finite().min(0, "must be >= 0");

export const CompanyStageSchema = z.enum(["early", "growth", "mature", "listed"]);

export const ReinvestmentSchema = z.object({
  capexRatio: ratio.default(COMPANY_DEFAULTS.reinvestment.capexRatio),
  workingCapitalRatio: ratio.default(COMPANY_DEFAULTS.reinvestment.workingCapitalRatio),
  depreciationRatio: ratio.default(COMPANY_DEFAULTS.reinvestment.depreciationRatio),
});

export const CompanyInputSchema = z.object({
  name: z.string().trim().min(1),
  industry: z.string(),
  stage: CompanyStageSchema,

  revenue: money,
  netIncome: z.number().finite(),
  netAssets: money.default(COMPANY_DEFAULTS.netAssets),
  ebitda: z.number().finite().nullish(),
  totalDebt: money.default(COMPANY_DEFAULTS.totalDebt),
  cashAndEquivalents: money.default(COMPANY_DEFAULTS.cashAndEquivalents),

  growthRate: rate.gt(-1, "must be > -1").default(COMPANY_DEFAULTS.growthRate),
  operatingMargin: rate
    .min(0, "must be >= 0")
    .lt(1, "must be < 1")
    .default(COMPANY_DEFAULTS.operatingMargin),
  taxRate: rate.min(0, "must be >= 0").lt(1, "must be < 1").default(COMPANY_DEFAULTS.taxRate),

  beta: ratio.default(COMPANY_DEFAULTS.beta),
  riskFreeRate: rate.default(COMPANY_DEFAULTS.riskFreeRate),
  marketRiskPremium: rate.default(COMPANY_DEFAULTS.marketRiskPremium),
  costOfDebt: ratio.default(COMPANY_DEFAULTS.costOfDebt),
  targetDebtRatio: rate
    .min(0, "must be >= 0")
    .max(1, "must be <= 1")
    .default(COMPANY_DEFAULTS.targetDebtRatio),
  terminalGrowthRate: rate
    .gt(-1, "must be > -1")
    .default(COMPANY_DEFAULTS.terminalGrowthRate),

  reinvestment: ReinvestmentSchema.default({}),
});

export type CompanyInput = z.input<typeof CompanyInputSchema>;

const optionalMultiple = z.number().finite().nullish();

export const ComparableSchema = z.object({
  name: z.string().min(1),
  tsCode: z.string().optional(),
  industry: z.string().default(""),
  marketCap: z.number().finite().nullish(),
  revenue: z.number().finite().default(0),
  netIncome: z.number().finite().default(0),
  netAssets: z.number().finite().default(0),
  ebitda: z.number().finite().nullish(),
  peRatio: optionalMultiple,
  psRatio: optionalMultiple,
  pbRatio: optionalMultiple,
  evEbitda: optionalMultiple,
  growthRate: z.number().finite().nullish(),
});

export type ComparableInput = z.input<typeof ComparableSchema>;

export const ScenarioConfigSchema = z.object({
  name: z.string().trim().min(1),
  revenueGrowthAdj: rate.default(0),
  marginAdj: rate.default(0),
  waccAdj: rate.default(0),
  terminalGrowthAdj: rate.default(0),
});

export type ScenarioConfigInput = z.input<typeof ScenarioConfigSchema>;
