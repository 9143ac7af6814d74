/**
 * Formatting helpers shared by the CLI tables and the text tool output.
 */

const BYTES_PER_KB = 1024;
const METHOD_WIDTH = 7;

/**
 * Format duration in milliseconds to a human-readable string.
 */
export function formatDuration(durationMs: number | undefined): string {
  if (durationMs === undefined) {
    return "-";
  }

  if (durationMs < 1000) {
    return `${durationMs}ms`;
  }

  const seconds = durationMs / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.floor(seconds % 60);
  return `${minutes}m${remainingSeconds}s`;
}

/**
 * Compact byte count: "0B", "500B", "1.2KB", "3.5MB".
 */
export function formatSize(bytes: number): string {
  if (bytes < BYTES_PER_KB) return `${bytes}B`;
  const kb = bytes / BYTES_PER_KB;
  if (kb < BYTES_PER_KB) return `${kb.toFixed(1)}KB`;
  const mb = kb / BYTES_PER_KB;
  if (mb < BYTES_PER_KB) return `${mb.toFixed(1)}MB`;
  return `${(mb / BYTES_PER_KB).toFixed(1)}GB`;
}

/**
 * Truncate a string to a maximum length, adding ellipsis if needed.
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 1) + "…";
}

export function padRight(str: string, width: number): string {
  if (str.length >= width) {
    return str;
  }
  return str + " ".repeat(width - str.length);
}

export function padLeft(str: string, width: number): string {
  if (str.length >= width) {
    return str;
  }
  return " ".repeat(width - str.length) + str;
}

export function formatMethod(method: string): string {
  return padRight(method.toUpperCase(), METHOD_WIDTH);
}

/**
 * Status column text. Partial records show "ERR".
 */
export function formatStatus(status: number | undefined): string {
  return status === undefined ? "ERR" : String(status);
}
