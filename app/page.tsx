import HomeClient from "@/app/home-client";
import { checkConfiguration } from "@/lib/config/env";

export const dynamic = "force-dynamic";

export default function HomePage() {
  const issue = checkConfiguration();

  if (issue) {
    return (
      <main style={{ maxWidth: 760, margin: "0 auto", padding: "32px 24px" }}>
        <h1 style={{ fontSize: 26, fontWeight: 600 }}>QA Coaching Agent</h1>
        <pre
          role="alert"
          style={{
            padding: 16,
            whiteSpace: "pre-wrap",
            fontFamily: "var(--font-mono)",
            fontSize: 13,
            color: "var(--status-fail)",
            border: "1px solid var(--status-fail)",
            borderRadius: "var(--radius)",
          }}
        >
          {issue.message}
        </pre>
      </main>
    );
  }

  return <HomeClient />;
}
