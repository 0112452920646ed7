/**
 * Formatting helpers for tool output.
 *
 * @module utils/format
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Format bytes as a human-readable size (1024 base).
 *
 * Plain bytes are printed as an integer, larger units with two decimals.
 *
 * @example
 * ```typescript
 * formatSize(0);        // "0 B"
 * formatSize(512);      // "512 B"
 * formatSize(1536);     // "1.50 KB"
 * formatSize(1048576);  // "1.00 MB"
 * ```
 */
export function formatSize(bytes: number): string {
  if (bytes <= 0) return "0 B";

  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return unit === 0 ? `${Math.floor(size)} B` : `${size.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

/**
 * Octal permission bits of a file mode, e.g. `644`.
 */
export function formatPermissions(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, "0");
}
