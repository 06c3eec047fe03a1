export function createRunId(now = new Date(), workflow?: string): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  return workflow ? `run_${workflow}_${stamp}_${suffix}` : `run_${stamp}_${suffix}`;
}
