/**
 * Recommendation Pipeline Tests
 *
 * End-to-end runs against in-memory client handles, a scripted completion
 * client, a fake video search and a spy analytics sink.
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  RecommendationPipeline,
  createRecommendationPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  NO_DATA_MESSAGE,
  ALL_MODELS_FAILED_MESSAGE,
} from './recommend.js';
import { PipelineStateMachine, InvalidTransitionError } from './state-machine.js';
import type { PipelineOptions } from './types.js';
import { ConfigurationError, loadConfig } from '../config/index.js';
import type { AnalyticsSink } from '../analytics/sink.js';
import type { CompletionClient, CompletionRequest, CompletionResponse } from '../llm/client.js';
import type { VideoSearchClient } from '../links/resolver.js';
import { DescriptionSanitizer } from '../sanitizer/sanitizer.js';
import type { SpotifyCatalogClient, SpotifyPlaylistEntry, YouTubePlaylistClient } from '../sources/types.js';
import type { RecommendationEvent } from '../schemas/recommendation.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const NOW = '2026-01-01T00:00:00.000Z';
const clock = () => new Date(NOW);

const TRACKS: SpotifyPlaylistEntry[] = [
  { id: 't1', name: 'Harbor Lights', artists: ['Tidewater'], album: 'Low Tide' },
  { id: 't2', name: 'Salt Road', artists: ['Tidewater'], album: 'Low Tide' },
  { id: 't3', name: 'Neon Pier', artists: ['The Lanterns'], album: 'Boardwalk' },
  { id: 't4', name: 'Quiet Engines', artists: ['Static Bloom'], album: '' },
  { id: 't5', name: 'Paper Kites', artists: ['Static Bloom'], album: 'Drafts' },
];

const UNIQUE = 'New Song - New Artist - New Album';
const DUPLICATE = 'Harbor Lights - Tidewater - Low Tide';

function createSpotify(entries: SpotifyPlaylistEntry[] = TRACKS) {
  const getPlaylistEntries = jest.fn<SpotifyCatalogClient['getPlaylistEntries']>(async (_id, page) => ({
    items: entries.slice(page.offset, page.offset + page.limit),
    hasNext: page.offset + page.limit < entries.length,
  }));
  const client: SpotifyCatalogClient = {
    getPlaylistEntries,
    getAudioFeatures: async (ids) =>
      ids.map((id) => ({ id, danceability: 0.5, energy: 0.8, tempo: 120, valence: 0.3 })),
    getUserPlaylists: async () => ({ items: [], hasNext: false }),
  };
  return { client, getPlaylistEntries };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Spotify handle whose playlist pages arrive after a delay.
 */
function createDelayedSpotify(ms: number): SpotifyCatalogClient {
  const { client } = createSpotify();
  return {
    ...client,
    getPlaylistEntries: async (id, page) => {
      await delay(ms);
      return client.getPlaylistEntries(id, page);
    },
  };
}

function completion(content: string): CompletionResponse {
  return { content, usage: { promptTokens: 1000, completionTokens: 50 }, model: 'served', finishReason: 'stop' };
}

/**
 * Completion client answering per model.
 */
function createCompletionClient(answers: Record<string, string>) {
  const complete = jest.fn<CompletionClient['complete']>(async (request: CompletionRequest) =>
    completion(answers[request.model] ?? '')
  );
  const client: CompletionClient = { complete };
  return { client, complete };
}

function createVideoSearch() {
  const search = jest.fn<VideoSearchClient['search']>(async () => [
    { videoId: 'abc123', title: 'New Song (Official Video)', channelTitle: 'New Artist', description: '' },
  ]);
  const client: VideoSearchClient = { search };
  return { client, search };
}

function createSink() {
  const record = jest.fn<AnalyticsSink['record']>(async () => undefined);
  const sink: AnalyticsSink = { record };
  return { sink, record };
}

function createPipeline(answers: Record<string, string>, options: Partial<PipelineOptions> = {}) {
  const completions = createCompletionClient(answers);
  const videos = createVideoSearch();
  const analytics = createSink();
  const pipeline = new RecommendationPipeline({
    completionClient: completions.client,
    videoSearch: videos.client,
    analyticsSink: analytics.sink,
    clock,
    options,
  });
  return { pipeline, complete: completions.complete, search: videos.search, record: analytics.record };
}

function recordedEvent(record: ReturnType<typeof createSink>['record']): RecommendationEvent {
  expect(record).toHaveBeenCalledTimes(1);
  return record.mock.calls[0][0];
}

// ============================================================================
// End-to-End Scenarios
// ============================================================================

describe('RecommendationPipeline', () => {
  it('should report no data for an empty playlist', async () => {
    const { pipeline, complete, record } = createPipeline({ 'gpt-4': UNIQUE });
    const spotify = createSpotify([]);

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: spotify.client });

    expect(result.recommendation).toBeNull();
    expect(result.details.error).toBe(NO_DATA_MESSAGE);
    expect(result.details.logs).toContain(`[${NOW}] ${NO_DATA_MESSAGE}`);
    expect(complete).not.toHaveBeenCalled();
    expect(recordedEvent(record)).toMatchObject({
      outcome: 'no_data',
      recommendationText: null,
      errorMessage: NO_DATA_MESSAGE,
      playlistId: 'pl123',
    });
  });

  it('should recommend a new song with the primary model', async () => {
    const { pipeline, complete, search, record } = createPipeline({ 'gpt-4': UNIQUE });
    const spotify = createSpotify();

    const result = await pipeline.recommend({
      service: 'spotify',
      playlist: 'https://open.spotify.com/playlist/pl123?si=abc',
      client: spotify.client,
      sessionId: 'session-1',
    });

    expect(result.recommendation).toBe(UNIQUE);
    expect(result.details.model).toBe('gpt-4');
    expect(result.details.costUsd).toBeCloseTo(0.0036, 10);
    expect(result.details.videoLink).toEqual({
      videoId: 'abc123',
      title: 'New Song (Official Video)',
      channel: 'New Artist',
      url: 'https://youtu.be/abc123',
    });
    expect(result.details.error).toBeUndefined();
    expect(result.details.logs).toContain(`[${NOW}] Querying gpt-4, attempt 1, temperature=0.7`);

    expect(complete).toHaveBeenCalledTimes(1);
    const prompt = complete.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain(
      "- 'Harbor Lights' by Tidewater | Album: Low Tide | [danceability=0.50, energy=0.80, tempo=120.0, valence=0.30]"
    );
    expect(prompt).toContain('in english.');
    expect(search).toHaveBeenCalledWith(UNIQUE, { maxResults: 1 });

    expect(recordedEvent(record)).toMatchObject({
      sessionId: 'session-1',
      service: 'spotify',
      playlistId: 'pl123',
      recommendationText: UNIQUE,
      language: 'english',
      outcome: 'success',
      timestamp: NOW,
    });
  });

  it('should fall back to the secondary model when the primary only repeats the playlist', async () => {
    const { pipeline, complete } = createPipeline({ 'gpt-4': DUPLICATE, 'gpt-3.5-turbo': UNIQUE });

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.recommendation).toBe(UNIQUE);
    expect(result.details.model).toBe('gpt-3.5-turbo');
    // 1000 * 0.5 / 1e6 + 50 * 1.5 / 1e6
    expect(result.details.costUsd).toBeCloseTo(0.000575, 10);
    expect(complete).toHaveBeenCalledTimes(4);
    expect(result.details.logs).toContain(`[${NOW}] Duplicate detected (harbor lights), retrying...`);
    expect(result.details.logs).toContain(`[${NOW}] No unique recommendation after 3 attempts with gpt-4`);
  });

  it('should fail when every model is exhausted', async () => {
    const { pipeline, complete, search, record } = createPipeline({ 'gpt-4': DUPLICATE, 'gpt-3.5-turbo': DUPLICATE });

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.recommendation).toBeNull();
    expect(result.details.error).toBe(ALL_MODELS_FAILED_MESSAGE);
    expect(result.details.model).toBeUndefined();
    expect(complete).toHaveBeenCalledTimes(6);
    expect(search).not.toHaveBeenCalled();
    expect(recordedEvent(record)).toMatchObject({ outcome: 'failure', errorMessage: ALL_MODELS_FAILED_MESSAGE });
  });

  it('should report a fetch failure', async () => {
    const { pipeline, complete, record } = createPipeline({ 'gpt-4': UNIQUE });
    const spotify = createSpotify();
    spotify.getPlaylistEntries.mockRejectedValue(new Error('Not found'));

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: spotify.client });

    expect(result).toEqual({
      recommendation: null,
      details: {
        error: 'Failed to fetch playlist data: Not found',
        logs: [`[${NOW}] Fetching spotify playlist pl123`, `[${NOW}] Failed to fetch playlist data: Not found`],
      },
    });
    expect(complete).not.toHaveBeenCalled();
    expect(recordedEvent(record).outcome).toBe('failure');
  });

  it('should escape the displayed recommendation but search with the raw text', async () => {
    const raw = 'Rock & Roll <Live> - "The" Band - Album';
    const { pipeline, search, record } = createPipeline({ 'gpt-4': raw });

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.recommendation).toBe('Rock &amp; Roll &lt;Live&gt; - &quot;The&quot; Band - Album');
    expect(search).toHaveBeenCalledWith(raw, { maxResults: 1 });
    expect(recordedEvent(record).recommendationText).toBe(raw);
  });

  it('should keep the recommendation when the video search fails', async () => {
    const { pipeline, search } = createPipeline({ 'gpt-4': UNIQUE });
    search.mockRejectedValue(new Error('quota exceeded'));

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.recommendation).toBe(UNIQUE);
    expect(result.details.videoLink).toBeNull();
    expect(result.details.logs).toContain(`[${NOW}] video-search failed: quota exceeded`);
  });

  it('should log and swallow analytics sink errors', async () => {
    const { pipeline, record } = createPipeline({ 'gpt-4': UNIQUE });
    record.mockRejectedValue(new Error('disk full'));

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.recommendation).toBe(UNIQUE);
    expect(result.details.logs[result.details.logs.length - 1]).toBe(
      `[${NOW}] Failed to record analytics event: disk full`
    );
    expect(record).toHaveBeenCalledTimes(1);
  });

  it('should sample at most the configured number of tracks', async () => {
    const { pipeline, complete } = createPipeline({ 'gpt-4': UNIQUE }, { sampleSize: 2 });

    const result = await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client });

    expect(result.details.logs).toContain(`[${NOW}] Prompt built from 2 of 5 tracks`);
    const prompt = complete.mock.calls[0][0].messages[1].content;
    expect(prompt.split('\n').filter((line) => line.startsWith("- '"))).toHaveLength(2);
  });

  it('should clean YouTube descriptions before rendering the prompt', async () => {
    const completions = createCompletionClient({ 'gpt-4': UNIQUE });
    const pipeline = new RecommendationPipeline({
      completionClient: completions.client,
      sanitizer: new DescriptionSanitizer(),
      clock,
    });
    const youtube: YouTubePlaylistClient = {
      listPlaylistItems: async () => ({
        items: [
          {
            videoId: 'v1',
            title: 'Harbor Lights',
            channelTitle: 'Tidewater',
            description: 'Filmed at dawn https://example.test\nSubscribe for more!',
          },
        ],
      }),
      getVideoEnrichment: async () => [],
      listMyPlaylists: async () => ({ items: [] }),
    };

    const result = await pipeline.recommend({
      service: 'youtube',
      playlist: 'https://www.youtube.com/playlist?list=PLtest',
      client: youtube,
      language: 'french',
    });

    expect(result.recommendation).toBe(UNIQUE);
    expect(result.details.videoLink).toBeNull();
    expect(completions.complete).toHaveBeenCalledTimes(1);
    const prompt = completions.complete.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain("- 'Harbor Lights' by Tidewater | Context: Filmed at dawn\n");
    expect(prompt).toContain('in french.');
  });

  it('should reject invalid options', () => {
    const { client } = createCompletionClient({});

    expect(() => new RecommendationPipeline({ completionClient: client, options: { models: [] } })).toThrow(
      ConfigurationError
    );
    expect(() => new RecommendationPipeline({ completionClient: client, options: { similarityThreshold: 101 } })).toThrow(
      ConfigurationError
    );
    expect(() => new RecommendationPipeline({ completionClient: client, options: { sampleSize: 0 } })).toThrow(
      ConfigurationError
    );
    expect(() => new RecommendationPipeline({ completionClient: client, options: { maxAttempts: 0 } })).toThrow(
      ConfigurationError
    );
  });

  it('should keep defaults for options passed as undefined', () => {
    const { client } = createCompletionClient({});

    const pipeline = new RecommendationPipeline({
      completionClient: client,
      options: { sampleSeed: undefined, sampleSize: 10 },
    });

    expect(pipeline.options).toEqual({ ...DEFAULT_PIPELINE_OPTIONS, sampleSize: 10 });
  });

  it('should normalize the requested language', async () => {
    const { pipeline, complete, record } = createPipeline({ 'gpt-4': UNIQUE });

    await pipeline.recommend({ service: 'spotify', playlist: 'pl123', client: createSpotify().client, language: ' French ' });

    expect(complete.mock.calls[0][0].messages[1].content).toContain('in french.');
    expect(recordedEvent(record).language).toBe('french');
  });

  it('should keep the logs of concurrent invocations apart', async () => {
    const { pipeline, record } = createPipeline({ 'gpt-4': UNIQUE });
    const slow = createDelayedSpotify(20);
    const fast = createDelayedSpotify(5);

    const [first, second] = await Promise.all([
      pipeline.recommend({ service: 'spotify', playlist: 'AAA', client: slow }),
      pipeline.recommend({ service: 'spotify', playlist: 'BBB', client: fast }),
    ]);

    expect(first.details.logs).toContain(`[${NOW}] Fetching spotify playlist AAA`);
    expect(first.details.logs.filter((line) => line.includes('BBB'))).toEqual([]);
    expect(second.details.logs).toContain(`[${NOW}] Fetching spotify playlist BBB`);
    expect(second.details.logs.filter((line) => line.includes('AAA'))).toEqual([]);
    expect(record.mock.calls.map((call) => call[0].playlistId).sort()).toEqual(['AAA', 'BBB']);
  });
});

// ============================================================================
// Factory
// ============================================================================

describe('createRecommendationPipeline', () => {
  it('should require the completion and video search keys', () => {
    expect(() => createRecommendationPipeline(loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toThrow(
      'Missing required API key: YOUTUBE_API_KEY. Please set it in your .env file.'
    );
    expect(() => createRecommendationPipeline(loadConfig({ YOUTUBE_API_KEY: 'test-secret' }))).toThrow(
      ConfigurationError
    );
  });

  it('should build the model order from configuration', () => {
    const pipeline = createRecommendationPipeline(
      loadConfig({
        OPENAI_API_KEY: 'test-secret',
        YOUTUBE_API_KEY: 'test-secret',
        OPENAI_MODEL: 'gpt-3.5-turbo',
        SIMILARITY_THRESHOLD: '90',
      })
    );

    expect(pipeline.options.models).toEqual(['gpt-3.5-turbo']);
    expect(pipeline.options.similarityThreshold).toBe(90);
  });
});

// ============================================================================
// State Machine
// ============================================================================

describe('PipelineStateMachine', () => {
  it('should move forward and record history', () => {
    const machine = new PipelineStateMachine();
    machine.transition('PROMPTING');
    machine.transition('QUERYING');
    machine.transition('DONE');

    expect(machine.state).toBe('DONE');
    expect(machine.isDone).toBe(true);
    expect(machine.history()).toEqual(['FETCHING', 'PROMPTING', 'QUERYING', 'DONE']);
  });

  it('should reject backward and repeated transitions', () => {
    const machine = new PipelineStateMachine();
    machine.transition('QUERYING');

    expect(() => machine.transition('PROMPTING')).toThrow('Invalid pipeline transition: QUERYING -> PROMPTING');
    expect(() => machine.transition('QUERYING')).toThrow(InvalidTransitionError);
    expect(machine.state).toBe('QUERYING');
  });
});
