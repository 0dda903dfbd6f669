/**
 * Fallback Service - artifact without a backend
 *
 * Used whenever the backend times out, fails to run, or returns a payload
 * that does not validate. The result is always a complete Artifact with a
 * valid color: symbol and color come from the theme's pools (or the global
 * fallback), phrase and reasoning from the fallback templates.
 *
 * Template choice:
 * 1. Templates tagged with the resolved theme, when any exist
 * 2. Otherwise the untagged default templates
 * 3. Otherwise the built-in template below
 */

import type {
  EngineConfig,
  EnginePools,
  FallbackTemplate,
} from '../types/engine.types';
import type { Artifact } from '../types/generation.types';
import { isHexColor } from '../validation/artifact.validation';
import { logDebug } from '../utils/logger';
import { pickOne, type RandomSource } from './prng.service';
import { SymbolSelectionService } from './symbol-selection.service';

export const DEFAULT_FALLBACK_SYMBOL = '∞';
export const DEFAULT_FALLBACK_COLOR = '#7f8c8d';

export const BUILT_IN_TEMPLATE: FallbackTemplate = {
  phrase: 'The dream continues beyond understanding.',
  reasoning: 'When symbols fail, the infinite persists.',
};

export type FallbackEngine = Pick<
  EngineConfig,
  'themes' | 'pools' | 'fallbackTemplates'
>;

export class FallbackService {
  constructor(
    private readonly selector: SymbolSelectionService = new SymbolSelectionService()
  ) {}

  /**
   * Templates eligible for a theme, never empty.
   */
  templatesFor(
    themeId: string | null,
    templates: readonly FallbackTemplate[]
  ): readonly FallbackTemplate[] {
    if (themeId !== null) {
      const themed = templates.filter(template =>
        template.themes?.includes(themeId)
      );
      if (themed.length > 0) {
        return themed;
      }
    }

    const defaults = templates.filter(
      template => !template.themes || template.themes.length === 0
    );
    return defaults.length > 0 ? defaults : [BUILT_IN_TEMPLATE];
  }

  /**
   * Produces a fallback artifact. Never throws.
   *
   * @example
   * ```typescript
   * const artifact = fallbackService.fallback('Discover the flow of peace', 'harmony', config, rng);
   * // { symbol: '≋', phrase: '...', color: '#1abc9c',
   * //   reasoning: "Theme 'harmony' resonates through symbolic selection. ..." }
   * ```
   */
  fallback(
    intentText: string,
    themeId: string | null,
    engine: FallbackEngine,
    rng: RandomSource
  ): Artifact {
    const pools = this.safePools(engine.pools);
    const { symbol, color } = this.selector.select(
      themeId,
      engine.themes,
      pools,
      rng
    );
    const template = pickOne(rng, this.templatesFor(themeId, engine.fallbackTemplates));

    const reasoning =
      themeId === null
        ? template.reasoning
        : `Theme '${themeId}' resonates through symbolic selection. ${template.reasoning}`;

    const artifact: Artifact = Object.freeze({
      symbol: symbol.length > 0 ? symbol : DEFAULT_FALLBACK_SYMBOL,
      phrase: template.phrase,
      color: isHexColor(color) ? color : DEFAULT_FALLBACK_COLOR,
      reasoning,
    });

    logDebug('fallback', () => ({
      theme: themeId,
      intentLength: intentText.length,
      artifact,
    }));

    return artifact;
  }

  /**
   * Fills in the global fallback so selection cannot run out of candidates.
   */
  private safePools(pools: EnginePools): EnginePools {
    const fallbackSymbols = pools.fallbackSymbols.filter(
      symbol => symbol.length > 0
    );
    return {
      ...pools,
      fallbackSymbols:
        fallbackSymbols.length > 0 ? fallbackSymbols : [DEFAULT_FALLBACK_SYMBOL],
      fallbackColor: isHexColor(pools.fallbackColor)
        ? pools.fallbackColor
        : DEFAULT_FALLBACK_COLOR,
    };
  }
}
