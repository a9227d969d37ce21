/**
 * Timestamp formatting for highlight indexes
 */

/**
 * Format seconds as `H:MM:SS`, or `M:SS` under one hour.
 * Fractions are truncated to the whole second.
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return `${hours}:${pad(mins)}:${pad(secs)}`;
  }
  return `${mins}:${pad(secs)}`;
}

/**
 * Parse `H:MM:SS` or `M:SS` back to whole seconds.
 * Inverse of {@link formatTimestamp} on the integer second.
 */
export function parseTimestamp(value: string): number {
  const parts = value.trim().split(":");
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^\d+$/.test(p))) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parts.map(Number).reduce((acc, part) => acc * 60 + part, 0);
}

/** Clip filename marker: `MMmSSs` */
export function formatClipMarker(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${pad(mins)}m${pad(secs)}s`;
}

/** Human duration for progress output, e.g. `1:02.5` */
export function formatDuration(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = (seconds % 60).toFixed(1);
  return `${mins}:${secs.padStart(4, "0")}`;
}

function pad(num: number): string {
  return num.toString().padStart(2, "0");
}
