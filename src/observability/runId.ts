/** `<prefix>_<iso time with : and . replaced>_<random suffix>`. */
export function createRunId(now = new Date(), prefix = "run"): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${prefix}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
