/**
 * Small formatting helpers shared by the human formatters.
 */

/**
 * Bytes as kilobytes with one decimal ("2.5")
 */
export function formatKilobytes(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}

/**
 * First `limit` characters of a text, with "..." appended when cut
 */
export function preview(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

