/**
 * Theme Resolver - maps free text to a theme of the theme table
 *
 * Scoring counts, for each theme, how many of its keywords occur as
 * substrings of the lower-cased text. The first theme in table order with
 * the highest non-zero score wins; earlier-declared themes win ties.
 */

import type { EnginePools, ThemeEntry, ThemeTable } from '../types/engine.types';
import { logDebug } from '../utils/logger';

/**
 * Number of the theme's keywords contained in already lower-cased text.
 */
export function scoreTheme(theme: ThemeEntry, lowerText: string): number {
  let score = 0;
  for (const keyword of theme.keywords) {
    const needle = keyword.toLowerCase();
    if (needle.length > 0 && lowerText.includes(needle)) {
      score++;
    }
  }
  return score;
}

/**
 * True when every pool the theme references exists.
 */
export function themePoolsExist(theme: ThemeEntry, pools: EnginePools): boolean {
  return (
    theme.symbolPools.every(id => Object.hasOwn(pools.symbols, id)) &&
    theme.colorPools.every(id => Object.hasOwn(pools.colors, id))
  );
}

export class ThemeResolverService {
  /**
   * Resolves the theme for an intent.
   *
   * When pools are given, a winning theme that references a missing pool
   * resolves to null instead of raising.
   *
   * @returns Theme id, or null when no keyword matches
   *
   * @example
   * ```typescript
   * resolver.resolve('Channel the raw power of elemental fire', table); // 'elemental'
   * resolver.resolve('Quiet afternoon', table); // null
   * ```
   */
  resolve(text: string, table: ThemeTable, pools?: EnginePools): string | null {
    const lowerText = text.toLowerCase();
    let winner: ThemeEntry | null = null;
    let bestScore = 0;

    for (const theme of table) {
      const score = scoreTheme(theme, lowerText);
      // Strictly greater keeps the earliest theme on ties
      if (score > bestScore) {
        bestScore = score;
        winner = theme;
      }
    }

    if (winner === null) {
      return null;
    }

    if (pools && !themePoolsExist(winner, pools)) {
      logDebug('resolveTheme:missingPool', () => ({
        theme: winner?.id,
        symbolPools: winner?.symbolPools,
        colorPools: winner?.colorPools,
      }));
      return null;
    }

    logDebug('resolveTheme', () => ({ theme: winner?.id, score: bestScore }));
    return winner.id;
  }

  /**
   * Looks up a theme entry by id.
   */
  findTheme(themeId: string, table: ThemeTable): ThemeEntry | undefined {
    return table.find(theme => theme.id === themeId);
  }
}
