/**
 * Symbol Selection Service - picks one symbol and one color for a theme
 *
 * Candidate lists are the theme's referenced pools concatenated in
 * declaration order, duplicates kept, so a value appearing in two pools is
 * twice as likely. The symbol is drawn before the color; both draws come from
 * the supplied RandomSource, which makes the result reproducible for a seed.
 *
 * Degradation is per axis: a theme whose symbol pools are all empty or
 * missing still gets a themed color, and the other way round.
 *
 * @example
 * ```typescript
 * const selector = new SymbolSelectionService();
 * const { symbol, color } = selector.select('wisdom', config.themes, config.pools, rng);
 * ```
 */

import type { EnginePools, ThemeTable } from '../types/engine.types';
import { logDebug } from '../utils/logger';
import { pickOne, type RandomSource } from './prng.service';

export interface SymbolColorChoice {
  symbol: string;
  color: string;
  /** True when the symbol came from the global fallback pool */
  symbolFromFallback: boolean;
  /** True when the color is the global fallback color */
  colorFromFallback: boolean;
}

export class SymbolSelectionService {
  /**
   * Flattens the referenced pools in order. Missing pools contribute nothing.
   */
  collectCandidates(
    poolIds: readonly string[],
    pools: Record<string, string[]>
  ): string[] {
    const candidates: string[] = [];
    for (const poolId of poolIds) {
      const pool = Object.hasOwn(pools, poolId) ? pools[poolId] : undefined;
      if (pool) {
        candidates.push(...pool);
      }
    }
    return candidates;
  }

  select(
    themeId: string | null,
    table: ThemeTable,
    pools: EnginePools,
    rng: RandomSource
  ): SymbolColorChoice {
    const theme =
      themeId === null ? undefined : table.find(entry => entry.id === themeId);

    const symbols = theme
      ? this.collectCandidates(theme.symbolPools, pools.symbols)
      : [];
    const colors = theme
      ? this.collectCandidates(theme.colorPools, pools.colors)
      : [];

    const symbolFromFallback = symbols.length === 0;
    const colorFromFallback = colors.length === 0;

    const symbol = symbolFromFallback
      ? pickOne(rng, pools.fallbackSymbols)
      : pickOne(rng, symbols);
    const color = colorFromFallback ? pools.fallbackColor : pickOne(rng, colors);

    logDebug('selectSymbolColor', () => ({
      theme: themeId,
      symbolCandidates: symbols.length,
      colorCandidates: colors.length,
      symbol,
      color,
      symbolFromFallback,
      colorFromFallback,
    }));

    return { symbol, color, symbolFromFallback, colorFromFallback };
  }
}
