/**
 * Keep at most `max` code points of a string, so surrogate pairs such as
 * emoji are never split.
 *
 * @example
 * ```typescript
 * truncateCodePoints('ab🎵cd', 3); // 'ab🎵'
 * ```
 */
export function truncateCodePoints(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : text;
}
