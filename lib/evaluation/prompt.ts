import { MAX_CRITERION_SCORE, MIN_CRITERION_SCORE, QA_CRITERIA } from "@/lib/evaluation/rubric";

export const TRANSCRIPT_DELIMITER = "TICKET TRANSCRIPT:";

export const SYSTEM_GUIDE = [
  "You are a meticulous QA coach for SaaS support agents.",
  "Read the entire ticket transcript (customer, agent, follow-ups).",
  `Score the agent responses on the following ${QA_CRITERIA.length} criteria from ${MIN_CRITERION_SCORE}-${MAX_CRITERION_SCORE}:`,
  ...QA_CRITERIA.map((criterion) => `- ${criterion}`),
  "",
  "Rules:",
  "- Return ONLY valid JSON. No code fences, no commentary.",
  "- JSON schema:",
  "  {",
  `    "criteria_scores": {${QA_CRITERIA.map((criterion) => `"${criterion}": int`).join(", ")}},`,
  '    "overall_score": int,',
  '    "coaching_summary": "string with 2-4 crisp, actionable points",',
  '    "suggested_1on1_questions": ["short question 1", "short question 2"]',
  "  }",
  "- overall_score = sum(criteria)",
  "- coaching summary should be specific and actionable",
].join("\n");

// The transcript is appended verbatim; nothing is escaped.
export function buildEvaluationPrompt(transcript: string): string {
  return `${SYSTEM_GUIDE}\n\n${TRANSCRIPT_DELIMITER}\n${transcript}\n`;
}
