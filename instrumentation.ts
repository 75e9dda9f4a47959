export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const { checkConfiguration } = await import("@/lib/config/env");
  const issue = checkConfiguration();
  if (issue) {
    console.error(`[config] ${issue.message}`);
  }
}
