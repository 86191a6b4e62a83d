/**
 * Description Sanitizer Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { cleanDescriptionRules } from './rules.js';
import { buildSanitizerPrompt, parseSanitizerResponse, END_MARKER } from './prompts.js';
import { DescriptionSanitizer } from './sanitizer.js';
import type { CompletionClient, CompletionResponse } from '../llm/client.js';
import type { YouTubeVideoRecord } from '../schemas/track.js';

// ============================================================================
// Helpers
// ============================================================================

function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function completion(content: string): CompletionResponse {
  return {
    content,
    usage: { promptTokens: 100, completionTokens: 20 },
    model: 'gpt-3.5-turbo',
    finishReason: 'stop',
  };
}

function createClient(respond: () => Promise<CompletionResponse>) {
  const complete = jest.fn<CompletionClient['complete']>().mockImplementation(respond);
  const client: CompletionClient = { complete };
  return { client, complete };
}

// ============================================================================
// Rule-Based Cleaner
// ============================================================================

describe('cleanDescriptionRules', () => {
  it('should strip promotional lines, links, handles and timestamps', () => {
    const raw = [
      'New single out now!',
      'Stream/download: https://example.test/harbor',
      '',
      'Follow us on Instagram @tidewaterband',
      '',
      '',
      '',
      '00:00 Intro',
      '1:02:03 Outro',
      '© 2024 Tidewater Records. All rights reserved.',
      'Subscribe for more music!',
    ].join('\n');

    expect(cleanDescriptionRules(raw)).toBe('New single out now!\n\nIntro\nOutro');
  });

  it('should remove inline urls and handles but keep e-mail addresses', () => {
    expect(cleanDescriptionRules('Shot by @lens.crew at www.example.test today')).toBe('Shot by at today');
    expect(cleanDescriptionRules('Booking: band@example.test')).toBe('Booking: band@example.test');
  });

  it('should collapse three or more line breaks to two', () => {
    expect(cleanDescriptionRules('Verse one\n\n\n\n\nVerse two')).toBe('Verse one\n\nVerse two');
  });

  it('should drop merchandise and discount promotions', () => {
    expect(cleanDescriptionRules('Lyrics below\nGet the merch in our shop\nUse code TIDE10 for 10% off')).toBe(
      'Lyrics below'
    );
  });

  it('should return an empty string for empty input', () => {
    expect(cleanDescriptionRules('')).toBe('');
  });

  it('should trim text it has nothing to remove from', () => {
    expect(cleanDescriptionRules('  Written on a night ferry.  ')).toBe('Written on a night ferry.');
  });

  it('should be idempotent on its own output', () => {
    const once = cleanDescriptionRules('Live take 2:31\nhttps://example.test\nRecorded in one pass');
    expect(cleanDescriptionRules(once)).toBe(once);
  });
});

// ============================================================================
// Response Parsing
// ============================================================================

describe('parseSanitizerResponse', () => {
  it('should split on the marker and drop the trailing empty piece', () => {
    expect(parseSanitizerResponse(`A\n${END_MARKER}\n\n${END_MARKER}`, 2)).toEqual(['A', '']);
  });

  it('should accept a response without a trailing marker', () => {
    expect(parseSanitizerResponse(`A${END_MARKER}B`, 2)).toEqual(['A', 'B']);
    expect(parseSanitizerResponse('Only entry', 1)).toEqual(['Only entry']);
  });

  it('should strip echoed entry numbers', () => {
    expect(parseSanitizerResponse(`[1]\nA\n${END_MARKER}\n[2]\nB\n${END_MARKER}`, 2)).toEqual(['A', 'B']);
  });

  it('should reject a count mismatch', () => {
    expect(parseSanitizerResponse(`A${END_MARKER}B${END_MARKER}C`, 2)).toBeUndefined();
    expect(parseSanitizerResponse('', 3)).toBeUndefined();
  });
});

describe('buildSanitizerPrompt', () => {
  it('should number entries and terminate each with the marker', () => {
    const prompt = buildSanitizerPrompt(['first', 'second']);
    expect(prompt).toContain(`[1]\nfirst\n${END_MARKER}\n[2]\nsecond\n${END_MARKER}`);
    expect(prompt).toContain('Return exactly 2 cleaned entries in the same order');
  });
});

// ============================================================================
// DescriptionSanitizer
// ============================================================================

describe('DescriptionSanitizer', () => {
  it('should use only the rules without a completion client', async () => {
    const sanitizer = new DescriptionSanitizer();
    await expect(sanitizer.sanitize(['Live https://example.test', '', '   '])).resolves.toEqual([
      'Live',
      '',
      '',
    ]);
  });

  it('should realign model output to non-empty positions', async () => {
    const { client, complete } = createClient(async () => completion(`A\n${END_MARKER}\nB\n${END_MARKER}`));
    const sanitizer = new DescriptionSanitizer(client);

    const result = await sanitizer.sanitize(['A https://example.test', '', 'B']);

    expect(result).toEqual(['A', '', 'B']);
    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0][0];
    expect(request.model).toBe('gpt-3.5-turbo');
    expect(request.temperature).toBe(0.2);
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: buildSanitizerPrompt(['A https://example.test', 'B']),
    });
  });

  it('should not call the model when every description is empty', async () => {
    const { client, complete } = createClient(async () => completion(''));
    const sanitizer = new DescriptionSanitizer(client);

    await expect(sanitizer.sanitize(['', ' \n'])).resolves.toEqual(['', '']);
    await expect(sanitizer.sanitize([])).resolves.toEqual([]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should fall back to the rules when the batch is misaligned', async () => {
    const { client } = createClient(async () => completion('just one entry'));
    const logger = createMockLogger();
    const sanitizer = new DescriptionSanitizer(client, { logger });

    const result = await sanitizer.sanitize(['A https://example.test', 'Subscribe now\nB']);

    expect(result).toEqual(['A', 'B']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Description cleaning returned a misaligned batch of 2; using rule-based cleaner'
    );
  });

  it('should fall back to the rules when the call throws', async () => {
    const { client } = createClient(async () => {
      throw new Error('service unavailable');
    });
    const logger = createMockLogger();
    const sanitizer = new DescriptionSanitizer(client);

    const result = await sanitizer.sanitize(['Intro 0:15 https://example.test'], logger);

    expect(result).toEqual(['Intro']);
    expect(logger.warn).toHaveBeenCalledWith(
      'description-cleaning failed: service unavailable; using rule-based cleaner'
    );
  });

  it('should submit batches of 50 and keep the output aligned', async () => {
    const { client, complete } = createClient(async () => completion(''));
    const sanitizer = new DescriptionSanitizer(client);
    const descriptions = Array.from({ length: 130 }, (_, i) => (i % 13 === 0 ? '' : `Description ${i}`));

    const result = await sanitizer.sanitize(descriptions);

    // 10 empty entries leave 120 to clean: 50 + 50 + 20
    expect(complete).toHaveBeenCalledTimes(3);
    expect(result).toHaveLength(130);
    expect(result[0]).toBe('');
    expect(result[1]).toBe('Description 1');
    expect(result[129]).toBe('Description 129');
  });

  it('should truncate descriptions to 500 characters before cleaning', async () => {
    const { client, complete } = createClient(async () => completion('cleaned'));
    const sanitizer = new DescriptionSanitizer(client);
    const long = 'x'.repeat(600);

    await expect(sanitizer.sanitize([long])).resolves.toEqual(['cleaned']);
    const prompt = complete.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain(`\n${'x'.repeat(500)}\n`);
    expect(prompt).not.toContain('x'.repeat(501));

    await expect(new DescriptionSanitizer().sanitize([long])).resolves.toEqual(['x'.repeat(500)]);
  });

  it('should not split an emoji at the truncation boundary', async () => {
    const { client, complete } = createClient(async () => completion('cleaned'));
    const sanitizer = new DescriptionSanitizer(client);

    await sanitizer.sanitize([`${'a'.repeat(499)}🎵 more`]);

    const prompt = complete.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain(`\n${'a'.repeat(499)}🎵\n`);
  });

  it('should set transformedDescription on YouTube records', async () => {
    const record: YouTubeVideoRecord = {
      provenance: 'youtube',
      id: 'v1',
      name: 'Harbor Lights',
      artist: 'Tidewater',
      album: '',
      tags: [],
      topicCategories: [],
      description: 'Filmed at dawn https://example.test',
    };

    const [cleaned] = await new DescriptionSanitizer().sanitizeRecords([record]);

    expect(cleaned.transformedDescription).toBe('Filmed at dawn');
    expect(cleaned.description).toBe('Filmed at dawn https://example.test');
    expect(record.transformedDescription).toBeUndefined();
  });

  it('should reject an invalid batch size', () => {
    expect(() => new DescriptionSanitizer(undefined, { batchSize: 0 })).toThrow(
      'Sanitizer batch size must be a positive integer, got 0'
    );
  });
});
