import { createEvaluationClientFromEnv, type EvaluationClient } from "@/lib/evaluation/client";
import { createEvaluationHandler } from "@/lib/evaluation/handler";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

let client: EvaluationClient | null = null;

function resolveClient(): EvaluationClient {
  client ??= createEvaluationClientFromEnv();
  return client;
}

export const POST = createEvaluationHandler(resolveClient);
