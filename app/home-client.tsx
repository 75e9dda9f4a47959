"use client";

import { useMemo, useState, type FormEvent } from "react";
import {
  Button,
  Card,
  Collapsible,
  MetricCard,
  MonoLabel,
  NumberInput,
  ScoreBar,
  Spinner,
  TextArea,
} from "@/components/ui/primitives";
import {
  MAX_CRITERION_SCORE,
  MAX_OVERALL_SCORE,
  QA_CRITERIA,
  type EvaluationResult,
} from "@/lib/evaluation/rubric";
import { ROI_LIMITS, estimateRoi } from "@/lib/roi/estimator";
import { checkScoreConsistency, formatCriterionLabel, formatUsd } from "@/lib/ui/format";

type EvaluateResponse = { result: EvaluationResult } | { error: string; kind: string };

const SAMPLE_TRANSCRIPT = `Customer: Priya Raman (Ops Lead, Northwind Freight) | Priority: High | Plan: Business | SLA: 8 hrs
Subject: Scheduled exports stopped arriving after password reset

Customer:
Hi, since I reset my password on Monday none of our nightly CSV exports have landed in the shared bucket.
We rely on them for the morning dispatch meeting. Can you help?

Agent:
Hi Priya, sorry about the disruption. Exports run under the credentials of the user who created them,
so the reset invalidated the stored token. Please open Settings > Integrations and re-authorize the bucket.

Customer:
Done, but I still see "403 forbidden" in the export log.

Agent:
Thanks for checking. I'll look into it and get back to you.

(Paste the full ticket here.)
`;

export default function HomeClient() {
  const [transcript, setTranscript] = useState(SAMPLE_TRANSCRIPT);
  const [scoring, setScoring] = useState(false);
  const [result, setResult] = useState<EvaluationResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  const [managers, setManagers] = useState<number>(ROI_LIMITS.managers.defaultValue);
  const [hoursSaved, setHoursSaved] = useState<number>(ROI_LIMITS.hoursSavedPerManager.defaultValue);
  const [hourlyCost, setHourlyCost] = useState<number>(ROI_LIMITS.hourlyCost.defaultValue);

  const roi = useMemo(
    () => estimateRoi({ managers, hoursSavedPerManager: hoursSaved, hourlyCost }),
    [managers, hoursSaved, hourlyCost],
  );

  const consistency = useMemo(() => (result ? checkScoreConsistency(result) : null), [result]);

  async function onEvaluate(e: FormEvent<HTMLFormElement>) {
    e.preventDefault();
    if (scoring) {
      return;
    }

    setScoring(true);
    setError(null);
    setResult(null);

    try {
      const res = await fetch("/api/evaluations", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ transcript }),
      });
      const payload = (await res.json().catch(() => null)) as EvaluateResponse | null;

      if (!payload) {
        throw new Error(`Evaluation failed with status ${res.status}`);
      }
      if ("error" in payload) {
        throw new Error(payload.error);
      }
      setResult(payload.result);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Unexpected error");
    } finally {
      setScoring(false);
    }
  }

  function onClear() {
    setTranscript(SAMPLE_TRANSCRIPT);
    setResult(null);
    setError(null);
  }

  const questions =
    result && Array.isArray(result.suggested_1on1_questions)
      ? result.suggested_1on1_questions.map(String)
      : [];

  return (
    <main style={{ maxWidth: 760, margin: "0 auto", padding: "32px 24px 64px" }}>
      <h1 style={{ margin: 0, fontSize: 26, fontWeight: 600 }}>QA Coaching Agent</h1>
      <p style={{ marginTop: 6, fontSize: 14, color: "var(--text-secondary)" }}>
        Paste a support ticket transcript to get QA scores and a coaching summary.
      </p>

      <Card elevated style={{ marginTop: 20 }}>
        <form onSubmit={onEvaluate}>
          <TextArea
            label="Ticket transcript"
            rows={16}
            value={transcript}
            onChange={(e) => setTranscript(e.target.value)}
          />
          <div style={{ display: "flex", alignItems: "center", gap: 12, marginTop: 12 }}>
            <Button type="submit" variant="primary" disabled={scoring}>
              Evaluate
            </Button>
            <Button type="button" onClick={onClear} disabled={scoring}>
              Clear
            </Button>
            {scoring && <Spinner label="Scoring…" />}
          </div>
        </form>
      </Card>

      {error && (
        <pre
          role="alert"
          style={{
            marginTop: 16,
            padding: 14,
            whiteSpace: "pre-wrap",
            fontSize: 12,
            fontFamily: "var(--font-mono)",
            color: "var(--status-fail)",
            border: "1px solid var(--status-fail)",
            borderRadius: "var(--radius)",
          }}
        >
          {error}
        </pre>
      )}

      {result && (
        <Card style={{ marginTop: 16 }}>
          <h2 style={{ margin: 0, fontSize: 20 }}>
            Overall Score: {String(result.overall_score)} / {MAX_OVERALL_SCORE}
          </h2>
          {consistency && !consistency.consistent && (
            <p style={{ fontSize: 12, color: "var(--status-warn)" }}>
              {consistency.criteriaSum === null
                ? "Some criterion scores are not numbers; the overall score could not be checked."
                : `The criterion scores add up to ${consistency.criteriaSum}, not ${String(consistency.reported)}.`}
            </p>
          )}

          <h3 style={{ margin: "20px 0 10px", fontSize: 15 }}>Criteria Scores</h3>
          {QA_CRITERIA.map((criterion) => (
            <ScoreBar
              key={criterion}
              label={formatCriterionLabel(criterion)}
              score={result.criteria_scores[criterion]}
              max={MAX_CRITERION_SCORE}
            />
          ))}

          <h3 style={{ margin: "20px 0 8px", fontSize: 15 }}>Coaching Summary</h3>
          <p style={{ margin: 0, fontSize: 14, whiteSpace: "pre-wrap" }}>
            {String(result.coaching_summary ?? "")}
          </p>

          {questions.length > 0 && (
            <>
              <h3 style={{ margin: "20px 0 8px", fontSize: 15 }}>Suggested 1:1 Questions</h3>
              <ul style={{ margin: 0, paddingLeft: 18, fontSize: 14 }}>
                {questions.map((question, index) => (
                  <li key={`${index}-${question}`}>{question}</li>
                ))}
              </ul>
            </>
          )}

          <div style={{ marginTop: 20 }}>
            <Collapsible title="Raw JSON (for debugging)">
              <pre style={{ margin: 0, fontSize: 12, overflowX: "auto" }}>
                {JSON.stringify(result, null, 2)}
              </pre>
            </Collapsible>
          </div>
        </Card>
      )}

      <hr style={{ margin: "32px 0", border: 0, borderTop: "1px solid var(--border-default)" }} />

      <Card title="ROI Estimator (toy example)">
        <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr 1fr", gap: 12 }}>
          <NumberInput
            label="Managers doing QA"
            min={ROI_LIMITS.managers.min}
            max={ROI_LIMITS.managers.max}
            value={managers}
            onChange={(e) => setManagers(Number(e.target.value))}
          />
          <NumberInput
            label="Hours saved per manager / week"
            min={ROI_LIMITS.hoursSavedPerManager.min}
            max={ROI_LIMITS.hoursSavedPerManager.max}
            value={hoursSaved}
            onChange={(e) => setHoursSaved(Number(e.target.value))}
          />
          <NumberInput
            label="Fully-loaded hourly cost ($)"
            min={ROI_LIMITS.hourlyCost.min}
            max={ROI_LIMITS.hourlyCost.max}
            value={hourlyCost}
            onChange={(e) => setHourlyCost(Number(e.target.value))}
          />
        </div>
        <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr", gap: 12, marginTop: 16 }}>
          <MetricCard label="Estimated hours saved / week" value={roi.weeklyHours} />
          <MetricCard label="Estimated cost savings / week" value={formatUsd(roi.weeklySavings)} />
        </div>
        <p style={{ marginTop: 10 }}>
          <MonoLabel>Values outside the allowed ranges are clamped.</MonoLabel>
        </p>
      </Card>
    </main>
  );
}
