/**
 * Recommendation Formatters
 *
 * Plain-text renderings of a recommendation result and a playlist listing.
 *
 * @module cli/formatters/recommendation
 */

import chalk from 'chalk';
import { formatCost } from '../../config/costs.js';
import { truncateCodePoints } from '../../prompt/truncate.js';
import type { RecommendationResult } from '../../schemas/recommendation.js';
import type { PlaylistSummary } from '../../schemas/track.js';

// ============================================================================
// Recommendation
// ============================================================================

/**
 * Detail lines printed under a successful recommendation.
 *
 * @example
 * ```typescript
 * formatRecommendationDetails(result);
 * // ['Model: gpt-4', 'Cost: $0.003600', 'Video: https://youtu.be/abc123 (Harbor Lights)']
 * ```
 */
export function formatRecommendationDetails(result: RecommendationResult): string[] {
  const { model, costUsd, videoLink } = result.details;
  const lines: string[] = [];

  if (model) {
    lines.push(`${chalk.dim('Model:')} ${model}`);
  }
  if (costUsd !== undefined) {
    lines.push(`${chalk.dim('Cost:')} ${formatCost(costUsd)}`);
  }
  if (videoLink) {
    lines.push(`${chalk.dim('Video:')} ${videoLink.url} (${videoLink.title})`);
  }

  return lines;
}

// ============================================================================
// Playlist Table
// ============================================================================

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  const kept = truncateCodePoints(str, maxLen);
  if (kept === str) return str;
  return truncateCodePoints(str, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width.
 */
export function padRight(str: string, width: number): string {
  // Account for ANSI codes by calculating visible length
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

const ID_WIDTH = 36;

/**
 * Render playlists as a two-column table: header, divider, one row each.
 */
export function formatPlaylistTable(playlists: readonly PlaylistSummary[]): string[] {
  const header = chalk.bold(padRight('PLAYLIST ID', ID_WIDTH) + 'NAME');
  const divider = chalk.dim('-'.repeat(ID_WIDTH + 40));
  const rows = playlists.map(
    (playlist) => padRight(truncate(playlist.id, ID_WIDTH - 2), ID_WIDTH) + truncate(playlist.name, 40)
  );
  return [header, divider, ...rows];
}
