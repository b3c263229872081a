/**
 * Format a duration given in seconds for humans
 *
 * @example
 * formatDuration(0.25) // "250ms"
 * formatDuration(12.345) // "12.3s"
 * formatDuration(125) // "2m 5s"
 */
export function formatDuration(seconds: number): string {
  if (seconds < 1) {
    return `${Math.round(seconds * 1000)}ms`;
  }
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
