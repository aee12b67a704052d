function stamp(prefix: string, now: Date): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${prefix}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

export function createRunId(now = new Date()): string {
  return stamp("run", now);
}

export function createJobId(now = new Date()): string {
  return stamp("job", now);
}
