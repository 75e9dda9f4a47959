export const QA_CRITERIA = [
  "accuracy",
  "empathy_and_tone",
  "clarity",
  "actionability",
  "escalation_awareness",
] as const;

export type QaCriterion = (typeof QA_CRITERIA)[number];

export const MIN_CRITERION_SCORE = 1;
export const MAX_CRITERION_SCORE = 5;
export const MAX_OVERALL_SCORE = MAX_CRITERION_SCORE * QA_CRITERIA.length;

export const REQUIRED_RESULT_KEYS = ["criteria_scores", "overall_score"] as const;

/**
 * Shape the model is asked for. Only the key set of `criteria_scores` and the
 * presence of `overall_score` are checked before a result is accepted; the
 * value types below are what the prompt requests, not what is verified.
 */
export interface EvaluationResult {
  criteria_scores: Record<QaCriterion, number>;
  overall_score: number;
  coaching_summary: string;
  suggested_1on1_questions?: string[];
  [extra: string]: unknown;
}

export function isQaCriterion(value: string): value is QaCriterion {
  return (QA_CRITERIA as readonly string[]).includes(value);
}
