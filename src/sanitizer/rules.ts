/**
 * Rule-Based Description Cleaner
 *
 * Pattern-matching fallback used when the model pass is unavailable or
 * returns a misaligned batch. Pure: the same input always yields the same
 * output.
 *
 * @module sanitizer/rules
 */

// ============================================================================
// Patterns
// ============================================================================

/**
 * Whole lines dropped when they match.
 */
const LINE_PATTERNS: readonly RegExp[] = [
  // Copyright notices
  /^.*(?:©|℗|\(c\)|\bcopyright\b|\ball rights reserved\b).*$/gim,
  // Subscription and engagement requests
  /^.*\b(?:subscrib(?:e|ed|ing)|hit the (?:like|bell)|ring the bell|turn on (?:post )?notifications?|like,? (?:and |& )?(?:share|comment)|smash (?:that|the) like)\b.*$/gim,
  // Social-media plugs
  /^.*\b(?:follow|find|connect with)\b.*\b(?:instagram|twitter|facebook|tiktok|snapchat|discord|twitch|threads|social media)\b.*$/gim,
  // Merchandise and marketing
  /^.*\b(?:merch(?:andise)?|discount code|promo code|use code|coupon|stream\/download|stream or download|stream now|download now|available (?:now )?on|pre-?order|buy (?:now|tickets)|shop now|limited edition)\b.*$/gim,
];

/** http(s) and bare www links */
const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/gi;

/** @handles not preceded by a word character (so e-mail addresses stay) */
const HANDLE_PATTERN = /(^|[^\w])@[\w.]+/g;

/** mm:ss and h:mm:ss timestamps */
const TIMESTAMP_PATTERN = /\b(?:\d{1,2}:)?\d{1,2}:\d{2}\b/g;

// ============================================================================
// Cleaner
// ============================================================================

/**
 * Clean a description with pattern rules.
 *
 * Drops copyright, subscribe, social and promotional lines, strips URLs,
 * handles and timestamps, tidies whitespace and collapses three or more
 * line breaks to two.
 *
 * @example
 * ```typescript
 * cleanDescriptionRules('Live at the pier\nhttps://example.test/tix\nSubscribe for more!');
 * // 'Live at the pier'
 * ```
 */
export function cleanDescriptionRules(text: string): string {
  if (!text) {
    return '';
  }

  let cleaned = text.replace(/\r\n?/g, '\n');

  for (const pattern of LINE_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }

  cleaned = cleaned
    .replace(URL_PATTERN, '')
    .replace(HANDLE_PATTERN, '$1')
    .replace(TIMESTAMP_PATTERN, '')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/^[ \t]+|[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return cleaned;
}
