import {
  CriteriaMismatchError,
  MalformedJsonError,
  MissingKeysError,
  NoJsonFoundError,
} from "@/lib/evaluation/errors";
import {
  QA_CRITERIA,
  REQUIRED_RESULT_KEYS,
  isQaCriterion,
  type EvaluationResult,
} from "@/lib/evaluation/rubric";

export type ExtractionStrategy = "greedy" | "balanced";

/** Leftmost `{` through rightmost `}`, taken as one span. */
export function extractGreedyJsonSpan(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * First balanced `{...}` span, skipping braces inside JSON strings. Returns
 * null when the first object never closes.
 */
export function extractBalancedJsonSpan(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

export function extractJsonSpan(text: string, strategy: ExtractionStrategy = "greedy"): string | null {
  if (strategy === "balanced") {
    // Unclosed objects fall back to the greedy span so they surface as malformed, not missing.
    return extractBalancedJsonSpan(text) ?? extractGreedyJsonSpan(text);
  }
  return extractGreedyJsonSpan(text);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasRubricShape(data: Record<string, unknown>): data is EvaluationResult {
  return REQUIRED_RESULT_KEYS.every((key) => key in data) && isRecord(data.criteria_scores);
}

export function validateEvaluationResult(data: unknown): EvaluationResult {
  if (!isRecord(data)) {
    throw new MissingKeysError([...REQUIRED_RESULT_KEYS], data);
  }

  const missingKeys = REQUIRED_RESULT_KEYS.filter((key) => !(key in data));
  if (missingKeys.length > 0) {
    throw new MissingKeysError(missingKeys, data);
  }

  const scoreKeys = isRecord(data.criteria_scores) ? Object.keys(data.criteria_scores) : [];
  const received = new Set(scoreKeys);
  const missingCriteria = QA_CRITERIA.filter((criterion) => !received.has(criterion));
  const unexpectedCriteria = scoreKeys.filter((key) => !isQaCriterion(key));

  if (missingCriteria.length > 0 || unexpectedCriteria.length > 0 || !hasRubricShape(data)) {
    throw new CriteriaMismatchError(missingCriteria, unexpectedCriteria);
  }

  return data;
}

/** Extraction, parsing and shape validation of one raw completion. */
export function parseEvaluationResponse(
  raw: string,
  strategy: ExtractionStrategy = "greedy",
): EvaluationResult {
  const candidate = extractJsonSpan(raw, strategy);
  if (candidate === null) {
    throw new NoJsonFoundError(raw);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    throw new MalformedJsonError(candidate, error);
  }

  return validateEvaluationResult(parsed);
}
