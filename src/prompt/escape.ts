/**
 * Escape HTML special characters (`& < > " '`).
 *
 * @example
 * ```typescript
 * escapeHtml('<b>Rock & Roll</b>'); // '&lt;b&gt;Rock &amp; Roll&lt;/b&gt;'
 * ```
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}
