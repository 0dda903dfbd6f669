/**
 * TypeScript type definitions for the generation engine configuration.
 * These types describe the theme table, the symbol and color pools the themes
 * reference, the fallback templates and the prompt templates loaded from
 * data/engine.config.json, plus the brain configurations that carry an intent.
 */

/**
 * One entry of the theme table.
 * Keywords are matched as lower-case substrings of the intent text.
 *
 * @example
 * {
 *   id: "wisdom",
 *   keywords: ["wisdom", "knowledge", "ancient"],
 *   symbolPools: ["ancient", "sacred"],
 *   colorPools: ["mystical", "earth"]
 * }
 */
export interface ThemeEntry {
  /** Theme identifier, unique within the table */
  id: string;
  /** Lower-case keywords counted by substring containment */
  keywords: string[];
  /** Symbol pool ids, in declaration order */
  symbolPools: string[];
  /** Color pool ids, in declaration order */
  colorPools: string[];
}

/**
 * Ordered theme table. Order is the tie-break order for theme resolution:
 * the earliest-declared theme wins a tie.
 */
export type ThemeTable = readonly ThemeEntry[];

/**
 * Symbol and color pools referenced by the theme table, plus the global
 * fallback used when no theme applies.
 */
export interface EnginePools {
  /** Map of pool id to candidate display glyphs */
  symbols: Record<string, string[]>;
  /** Map of pool id to candidate #rrggbb colors */
  colors: Record<string, string[]>;
  /** Global fallback symbol pool */
  fallbackSymbols: string[];
  /** Global fallback color (a single value, not a pool) */
  fallbackColor: string;
}

/**
 * Phrase and reasoning template used when the backend cannot produce an artifact.
 * Templates without `themes` form the theme-agnostic default set.
 */
export interface FallbackTemplate {
  phrase: string;
  reasoning: string;
  /** Theme ids this template is written for */
  themes?: string[];
}

/**
 * Prompt templates. `{intent}` and `{style}` are substituted; a variation,
 * when present, is prepended to the base template.
 */
export interface PromptTemplates {
  base: string;
  variations: string[];
}

/**
 * Validated engine configuration (data/engine.config.json).
 */
export interface EngineConfig {
  /** Version identifier of the configuration (e.g., "v1") */
  version: string;
  /** Default backend model name */
  model: string;
  themes: ThemeTable;
  pools: EnginePools;
  fallbackTemplates: FallbackTemplate[];
  prompts: PromptTemplates;
}

/**
 * Brain configuration: one intent to generate an artifact for.
 *
 * @example
 * {
 *   intent: "Explore the depths of inner wisdom and ancient knowledge",
 *   style: "ancient, profound, cosmic wisdom"
 * }
 */
export interface BrainConfig {
  intent: string;
  style: string;
}
