import { QA_CRITERIA, type EvaluationResult } from "@/lib/evaluation/rubric";

export function formatCriterionLabel(criterion: string): string {
  return criterion
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function formatUsd(amount: number): string {
  return `$${Math.round(amount).toLocaleString("en-US")}`;
}

export type ScoreConsistency = {
  criteriaSum: number | null;
  reported: unknown;
  consistent: boolean;
};

/**
 * Compares the model's overall score with the sum of its criterion scores.
 * Display only: the result itself is never corrected.
 */
export function checkScoreConsistency(result: EvaluationResult): ScoreConsistency {
  const values: unknown[] = QA_CRITERIA.map((criterion) => result.criteria_scores[criterion]);
  const numeric = values.filter((value): value is number => typeof value === "number");

  if (numeric.length !== values.length) {
    return { criteriaSum: null, reported: result.overall_score, consistent: false };
  }

  const criteriaSum = numeric.reduce((sum, value) => sum + value, 0);
  return {
    criteriaSum,
    reported: result.overall_score,
    consistent: result.overall_score === criteriaSum,
  };
}
