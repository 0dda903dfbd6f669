/**
 * Validation of engine and brain configurations.
 *
 * Configuration arrives as untyped JSON. These validators check every field,
 * collect every problem instead of stopping at the first, and either return
 * a typed configuration or throw a ConfigurationError listing the issues.
 * Keywords are normalized to trimmed lower case on the way through.
 *
 * The same validators revive entries read back from the persisted cache tier,
 * so a stored entry is trusted no more than a fresh file.
 */

import type {
  BrainConfig,
  EngineConfig,
  EnginePools,
  FallbackTemplate,
  PromptTemplates,
  ThemeEntry,
} from '../types/engine.types';
import { ConfigurationError } from '../utils/errors';
import { isHexColor } from './artifact.validation';

/**
 * Parses a configuration source into T. Used by ConfigCache for fresh
 * source text (`parse`) and for entries read from the persisted tier (`revive`).
 */
export interface ConfigParser<T> {
  parse(text: string, sourceId: string): T;
  revive(stored: unknown): T;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function readStringArray(
  value: unknown,
  path: string,
  issues: string[],
  { allowEmpty }: { allowEmpty: boolean }
): string[] {
  if (!Array.isArray(value)) {
    issues.push(`${path} must be an array of strings`);
    return [];
  }
  if (!allowEmpty && value.length === 0) {
    issues.push(`${path} must not be empty`);
  }
  const result: string[] = [];
  value.forEach((item, index) => {
    if (isNonEmptyString(item)) {
      result.push(item);
    } else {
      issues.push(`${path}[${index}] must be a non-empty string`);
    }
  });
  return result;
}

function readPoolMap(
  value: unknown,
  path: string,
  issues: string[],
  checkItem?: (item: string, itemPath: string) => void
): Record<string, string[]> {
  if (!isRecord(value)) {
    issues.push(`${path} must be an object of pool id to array`);
    return {};
  }
  const pools: Record<string, string[]> = {};
  for (const [poolId, items] of Object.entries(value)) {
    const poolPath = `${path}.${poolId}`;
    const pool = readStringArray(items, poolPath, issues, { allowEmpty: true });
    if (checkItem) {
      pool.forEach((item, index) => checkItem(item, `${poolPath}[${index}]`));
    }
    pools[poolId] = pool;
  }
  return pools;
}

function readPools(value: unknown, issues: string[]): EnginePools {
  if (!isRecord(value)) {
    issues.push('pools must be an object');
    return { symbols: {}, colors: {}, fallbackSymbols: [], fallbackColor: '' };
  }

  const symbols = readPoolMap(value.symbols, 'pools.symbols', issues);
  const colors = readPoolMap(value.colors, 'pools.colors', issues, (item, path) => {
    if (!isHexColor(item)) {
      issues.push(`${path} must match #rrggbb (got "${item}")`);
    }
  });
  const fallbackSymbols = readStringArray(
    value.fallbackSymbols,
    'pools.fallbackSymbols',
    issues,
    { allowEmpty: false }
  );

  const fallbackColor = value.fallbackColor;
  if (!isHexColor(fallbackColor)) {
    issues.push('pools.fallbackColor must match #rrggbb');
  }

  return {
    symbols,
    colors,
    fallbackSymbols,
    fallbackColor: isHexColor(fallbackColor) ? fallbackColor : '',
  };
}

function readThemes(
  value: unknown,
  pools: EnginePools,
  issues: string[]
): ThemeEntry[] {
  if (!Array.isArray(value)) {
    issues.push('themes must be an array');
    return [];
  }
  if (value.length === 0) {
    issues.push('themes must contain at least one theme');
  }

  const seen = new Set<string>();
  const themes: ThemeEntry[] = [];

  value.forEach((entry, index) => {
    const path = `themes[${index}]`;
    if (!isRecord(entry)) {
      issues.push(`${path} must be an object`);
      return;
    }

    const id = isNonEmptyString(entry.id) ? entry.id.trim() : '';
    if (!id) {
      issues.push(`${path}.id must be a non-empty string`);
    } else if (seen.has(id)) {
      issues.push(`${path}.id "${id}" is declared more than once`);
    }
    seen.add(id);

    const keywords = readStringArray(entry.keywords, `${path}.keywords`, issues, {
      allowEmpty: false,
    }).map(keyword => keyword.trim().toLowerCase());

    const symbolPools = readStringArray(
      entry.symbolPools,
      `${path}.symbolPools`,
      issues,
      { allowEmpty: true }
    );
    const colorPools = readStringArray(
      entry.colorPools,
      `${path}.colorPools`,
      issues,
      { allowEmpty: true }
    );

    for (const poolId of symbolPools) {
      if (!Object.hasOwn(pools.symbols, poolId)) {
        issues.push(`${path}.symbolPools references missing pool "${poolId}"`);
      }
    }
    for (const poolId of colorPools) {
      if (!Object.hasOwn(pools.colors, poolId)) {
        issues.push(`${path}.colorPools references missing pool "${poolId}"`);
      }
    }

    themes.push({ id, keywords, symbolPools, colorPools });
  });

  return themes;
}

function readFallbackTemplates(
  value: unknown,
  themeIds: ReadonlySet<string>,
  issues: string[]
): FallbackTemplate[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push('fallbackTemplates must be an array');
    return [];
  }

  const templates: FallbackTemplate[] = [];
  value.forEach((entry, index) => {
    const path = `fallbackTemplates[${index}]`;
    if (!isRecord(entry)) {
      issues.push(`${path} must be an object`);
      return;
    }
    if (!isNonEmptyString(entry.phrase)) {
      issues.push(`${path}.phrase must be a non-empty string`);
    }
    if (!isNonEmptyString(entry.reasoning)) {
      issues.push(`${path}.reasoning must be a non-empty string`);
    }

    const template: FallbackTemplate = {
      phrase: isNonEmptyString(entry.phrase) ? entry.phrase : '',
      reasoning: isNonEmptyString(entry.reasoning) ? entry.reasoning : '',
    };

    if (entry.themes !== undefined) {
      const themes = readStringArray(entry.themes, `${path}.themes`, issues, {
        allowEmpty: true,
      });
      for (const themeId of themes) {
        if (!themeIds.has(themeId)) {
          issues.push(`${path}.themes references unknown theme "${themeId}"`);
        }
      }
      template.themes = themes;
    }

    templates.push(template);
  });

  return templates;
}

function readPrompts(value: unknown, issues: string[]): PromptTemplates {
  if (!isRecord(value)) {
    issues.push('prompts must be an object');
    return { base: '', variations: [] };
  }
  if (!isNonEmptyString(value.base)) {
    issues.push('prompts.base must be a non-empty string');
  }
  const variations =
    value.variations === undefined
      ? []
      : readStringArray(value.variations, 'prompts.variations', issues, {
          allowEmpty: true,
        });

  return {
    base: isNonEmptyString(value.base) ? value.base : '',
    variations,
  };
}

/**
 * Validates an engine configuration.
 *
 * @throws {ConfigurationError} Listing every problem found
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const issues: string[] = [];

  if (!isRecord(raw)) {
    throw new ConfigurationError('Invalid engine configuration', [
      'configuration must be a JSON object',
    ]);
  }

  if (!isNonEmptyString(raw.version)) {
    issues.push('version must be a non-empty string');
  }
  if (!isNonEmptyString(raw.model)) {
    issues.push('model must be a non-empty string');
  }

  const pools = readPools(raw.pools, issues);
  const themes = readThemes(raw.themes, pools, issues);
  const fallbackTemplates = readFallbackTemplates(
    raw.fallbackTemplates,
    new Set(themes.map(theme => theme.id)),
    issues
  );
  const prompts = readPrompts(raw.prompts, issues);

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid engine configuration', issues);
  }

  return {
    version: isNonEmptyString(raw.version) ? raw.version : '',
    model: isNonEmptyString(raw.model) ? raw.model : '',
    themes,
    pools,
    fallbackTemplates,
    prompts,
  };
}

/**
 * Validates a brain configuration: a non-empty intent and a style string.
 *
 * @throws {ConfigurationError} Listing every problem found
 */
export function parseBrainConfig(raw: unknown): BrainConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Invalid brain configuration', [
      'configuration must be a JSON object',
    ]);
  }

  const issues: string[] = [];
  if (!isNonEmptyString(raw.intent)) {
    issues.push('intent must be a non-empty string');
  }
  if (raw.style !== undefined && typeof raw.style !== 'string') {
    issues.push('style must be a string');
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid brain configuration', issues);
  }

  return {
    intent: isNonEmptyString(raw.intent) ? raw.intent.trim() : '',
    style: typeof raw.style === 'string' ? raw.style.trim() : '',
  };
}

function parseJson(text: string, sourceId: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in configuration "${sourceId}"`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

export const engineConfigParser: ConfigParser<EngineConfig> = {
  parse: (text, sourceId) => parseEngineConfig(parseJson(text, sourceId)),
  revive: stored => parseEngineConfig(stored),
};

export const brainConfigParser: ConfigParser<BrainConfig> = {
  parse: (text, sourceId) => parseBrainConfig(parseJson(text, sourceId)),
  revive: stored => parseBrainConfig(stored),
};
