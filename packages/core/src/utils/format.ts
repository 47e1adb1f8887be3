/**
 * Display formatting for incident responses
 */

/**
 * Human-readable duration: 850ms, 12.3s, 4m 5s, 4m, 2h 10m, 2h
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.floor(ms)}ms`;
  }
  // Thresholds compare the rounded value so 59.96s reads as 1m, not 60.0s
  const tenths = Math.round(ms / 100);
  if (tenths < 600) {
    return `${(tenths / 10).toFixed(1)}s`;
  }

  const totalSeconds = Math.round(ms / 1000);
  const totalMinutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (totalMinutes < 60) {
    return seconds > 0 ? `${totalMinutes}m ${seconds}s` : `${totalMinutes}m`;
  }

  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}

/**
 * Integer with comma thousands separators (1234567 -> "1,234,567")
 */
export function formatNumber(n: number): string {
  const digits = String(Math.trunc(Math.abs(n)));
  const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return n < 0 ? `-${grouped}` : grouped;
}

/**
 * Append the metrics footer shown under every final response.
 * Tokens are omitted when the agent reported none.
 */
export function appendMetrics(response: string, executionTimeMs: number, tokensUsed: number): string {
  const time = formatDuration(executionTimeMs);
  const footer =
    tokensUsed > 0
      ? `\n\n---\n⏱️ Time: ${time} | 🎯 Tokens: ${formatNumber(tokensUsed)}`
      : `\n\n---\n⏱️ Time: ${time}`;
  return response + footer;
}

/**
 * Numbered list, one entry per line, each line newline-terminated
 */
export function formatNumberedList(items: readonly string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}\n`).join('');
}
