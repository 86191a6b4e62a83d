/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfig,
  hasApiKey,
  requireApiKey,
  ConfigurationError,
} from './index.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should load defaults from an empty environment', () => {
      const config = loadConfig({});
      expect(config.nodeEnv).toBe('development');
      expect(config.models).toEqual({
        primary: 'gpt-4',
        fallback: 'gpt-3.5-turbo',
        sanitizer: 'gpt-3.5-turbo',
      });
      expect(config.recommendation).toEqual({
        similarityThreshold: 85,
        sampleSize: 200,
        maxAttempts: 3,
      });
    });

    it('should use default data directory when not specified', () => {
      const config = loadConfig({});
      expect(config.dataDir).toBe(join(homedir(), '.setlist-scout'));
    });

    it('should use custom data directory when specified', () => {
      const config = loadConfig({ SETLIST_DATA_DIR: '/custom/path' });
      expect(config.dataDir).toBe('/custom/path');
    });

    it('should expand ~ in the data directory', () => {
      const config = loadConfig({ SETLIST_DATA_DIR: '~/music-data' });
      expect(config.dataDir).toBe(join(homedir(), '/music-data'));
    });

    it('should have environment flags', () => {
      const config = loadConfig({ NODE_ENV: 'test' });
      expect(config.isTest).toBe(true);
      expect(config.isProduction).toBe(false);
    });

    it('should read model overrides', () => {
      const config = loadConfig({ OPENAI_MODEL: 'gpt-4o', FALLBACK_MODEL: 'gpt-4o-mini' });
      expect(config.models.primary).toBe('gpt-4o');
      expect(config.models.fallback).toBe('gpt-4o-mini');
    });

    it('should parse numeric tuning values', () => {
      const config = loadConfig({
        SIMILARITY_THRESHOLD: '90',
        PROMPT_SAMPLE_SIZE: '50',
        MAX_ATTEMPTS: '5',
      });
      expect(config.recommendation).toEqual({
        similarityThreshold: 90,
        sampleSize: 50,
        maxAttempts: 5,
      });
    });

    it('should keep defaults for blank numeric values', () => {
      const config = loadConfig({ SIMILARITY_THRESHOLD: '  ' });
      expect(config.recommendation.similarityThreshold).toBe(85);
    });

    it('should reject an out-of-range threshold', () => {
      expect(() => loadConfig({ SIMILARITY_THRESHOLD: '150' })).toThrow(ConfigurationError);
    });

    it('should reject a non-numeric sample size', () => {
      expect(() => loadConfig({ PROMPT_SAMPLE_SIZE: 'lots' })).toThrow(/PROMPT_SAMPLE_SIZE/);
    });

    it('should reject an unknown NODE_ENV', () => {
      expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV/);
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(loadConfig({}))).toBe(true);
    });
  });

  describe('hasApiKey', () => {
    it('should reflect configured keys', () => {
      const config = loadConfig({ OPENAI_API_KEY: 'test-openai-key' });
      expect(hasApiKey(config, 'openai')).toBe(true);
      expect(hasApiKey(config, 'youtube')).toBe(false);
    });
  });

  describe('requireApiKey', () => {
    it('should throw for missing keys', () => {
      const config = loadConfig({});
      expect(() => requireApiKey(config, 'youtube')).toThrow(/Missing required API key: YOUTUBE_API_KEY/);
    });

    it('should reject empty keys at load time', () => {
      expect(() => loadConfig({ OPENAI_API_KEY: '' })).toThrow(ConfigurationError);
    });

    it('should return key when present in config', () => {
      const config = loadConfig({ YOUTUBE_API_KEY: 'test-youtube-key' });
      expect(requireApiKey(config, 'youtube')).toBe('test-youtube-key');
    });
  });
});
