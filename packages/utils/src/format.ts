/**
 * Human-readable formatting
 */

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Format a byte count with binary units: `512 B`, `1.5 KB`, `9.8 MB`, `1.25 GB`
 */
export function formatBytes(bytes: number): string {
  if (bytes < KB) return `${bytes.toFixed(0)} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  if (bytes < GB) return `${(bytes / MB).toFixed(1)} MB`;
  return `${(bytes / GB).toFixed(2)} GB`;
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Format a bit rate: `1117587` gives `1117.6 kb/s`
 */
export function formatBitrate(bitsPerSecond: number): string {
  return `${(bitsPerSecond / 1000).toFixed(1)} kb/s`;
}
