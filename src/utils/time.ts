export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoFileSafe(): string {
  return toFileSafe(nowUtcIsoSeconds());
}

export function toFileSafe(isoTimestamp: string): string {
  return isoTimestamp.replace(/:/g, "-");
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms} ms`;
  return `${(ms / 1000).toFixed(1)} s`;
}
