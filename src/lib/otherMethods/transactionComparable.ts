/**
 * Other Methods — Precedent Transactions
 *
 * Applies the median deal multiple of comparable transactions to the
 * target's net income, or to revenue when the target is loss-making.
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Company } from "@/lib/valuationModel/types";
import { summarize } from "@/lib/statistics";
import type {
  PrecedentTransaction,
  TransactionComparableDetails,
  TransactionComparableResult,
} from "./types";
import { parseMethodInput } from "./validation";

const optionalAmount = z.number().finite().nullish();

const TransactionsSchema = z.array(
  z.object({
    companyName: z.string().min(1),
    dealValue: optionalAmount,
    metricValue: optionalAmount,
    multiple: optionalAmount,
    dealDate: z.string().optional(),
    stage: z.string().optional(),
  }),
);

function targetMetric(company: Company): Pick<TransactionComparableDetails, "metricUsed" | "metricValue"> {
  if (company.netIncome > 0) return { metricUsed: "netIncome", metricValue: company.netIncome };
  if (company.revenue > 0) return { metricUsed: "revenue", metricValue: company.revenue };
  throw new ValuationError(
    "UNSUPPORTED_METHOD",
    "Transaction comparables need positive net income or revenue",
    { parameter: "revenue" },
  );
}

/**
 *   value     = metric * median(multiples)
 *   valueLow  = metric * min(multiples)
 *   valueHigh = metric * max(multiples)
 *
 * MISSING_DATA when there are no transactions or none carries a positive
 * multiple.
 */
export function transactionComparable(
  company: Company,
  transactions: readonly PrecedentTransaction[],
): TransactionComparableResult {
  const deals = parseMethodInput(TransactionsSchema, transactions, "transactions");
  if (deals.length === 0) {
    throw new ValuationError("MISSING_DATA", "No precedent transactions supplied", {
      parameter: "transactions",
    });
  }

  const multiples = deals
    .map((d) => d.multiple)
    .filter((m): m is number => typeof m === "number" && m > 0);
  const stats = summarize(multiples);
  if (!stats) {
    throw new ValuationError("MISSING_DATA", "No transaction carries a positive multiple", {
      parameter: "multiple",
    });
  }

  const { metricUsed, metricValue } = targetMetric(company);

  const details: TransactionComparableDetails = {
    transactionCount: deals.length,
    multiplesUsed: stats.count,
    meanMultiple: stats.mean,
    medianMultiple: stats.median,
    minMultiple: stats.min,
    maxMultiple: stats.max,
    metricUsed,
    metricValue,
  };

  return createValuationResult({
    method: "TRANSACTION_COMPARABLE",
    value: metricValue * stats.median,
    valueLow: metricValue * stats.min,
    valueHigh: metricValue * stats.max,
    details,
    assumptions: { metricUsed },
  });
}
