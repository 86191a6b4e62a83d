/**
 * Description Cleaning Prompts
 *
 * @module sanitizer/prompts
 */

/**
 * Separator between entries in both the request and the response.
 */
export const END_MARKER = '<<<END>>>';

/**
 * System prompt for batch description cleaning.
 */
export const SANITIZER_SYSTEM_PROMPT = `You clean music video descriptions so they can be used as context about the song.

Remove ONLY these elements:
- URLs and links
- Social media mentions and handles
- Requests to subscribe, like, comment or enable notifications
- Timestamps and chapter markers
- Copyright notices
- Marketing language
- Merchandise promotion

Keep everything else exactly as written: lyrics, credits, background about the song or performance.
If nothing remains, return an empty entry.`;

/**
 * Build the user prompt for one batch.
 *
 * Entries are numbered for the model's benefit; the response must contain
 * one cleaned entry per input, each followed by the end marker.
 */
export function buildSanitizerPrompt(descriptions: readonly string[]): string {
  const entries = descriptions.map((d, i) => `[${i + 1}]\n${d}\n${END_MARKER}`).join('\n');

  return `Clean the following ${descriptions.length} descriptions.

Return exactly ${descriptions.length} cleaned entries in the same order, each followed by ${END_MARKER} on its own line. Do not number the entries and do not add commentary.

${entries}`;
}

/**
 * Split a model response into cleaned entries.
 *
 * @returns The entries, or undefined when the count does not match
 */
export function parseSanitizerResponse(content: string, expected: number): string[] | undefined {
  const parts = content.split(END_MARKER).map((part) => part.trim());

  // A trailing marker leaves one empty piece at the end
  if (parts.length === expected + 1 && parts[parts.length - 1] === '') {
    parts.pop();
  }

  if (parts.length !== expected) {
    return undefined;
  }

  return parts.map((part) => part.replace(/^\[\d+\]\s*/, ''));
}
