/**
 * Concept Service - names the echo file an artifact is appended to
 *
 * The concept is the resolved theme when there is one. Otherwise each word of
 * the intent is scored: priority concepts by their weight, other words longer
 * than four letters 5, longer than three letters 3, stop words never. The
 * first word with the highest score wins.
 *
 * The lexicon (priority weights, stop words, default) lives in
 * data/concepts.json.
 */

import { readFileSync } from 'fs';
import { ConfigurationError } from '../utils/errors';

const WORD_REGEX = /[\p{L}\p{N}_]+/gu;

export interface ConceptLexicon {
  priorityConcepts: Record<string, number>;
  stopWords: string[];
  defaultConcept: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @throws {ConfigurationError} If the lexicon is malformed
 */
export function parseConceptLexicon(raw: unknown): ConceptLexicon {
  const issues: string[] = [];
  if (!isRecord(raw)) {
    throw new ConfigurationError('Invalid concept lexicon', ['lexicon must be a JSON object']);
  }

  const priorityConcepts: Record<string, number> = {};
  if (isRecord(raw.priorityConcepts)) {
    for (const [word, weight] of Object.entries(raw.priorityConcepts)) {
      if (typeof weight === 'number' && Number.isFinite(weight)) {
        priorityConcepts[word.toLowerCase()] = weight;
      } else {
        issues.push(`priorityConcepts.${word} must be a number`);
      }
    }
  } else {
    issues.push('priorityConcepts must be an object of word to weight');
  }

  const stopWords: string[] = [];
  if (Array.isArray(raw.stopWords)) {
    for (const word of raw.stopWords) {
      if (typeof word === 'string') {
        stopWords.push(word.toLowerCase());
      } else {
        issues.push('stopWords must contain only strings');
      }
    }
  } else {
    issues.push('stopWords must be an array');
  }

  const defaultConcept = raw.defaultConcept;
  if (typeof defaultConcept !== 'string' || defaultConcept.length === 0) {
    issues.push('defaultConcept must be a non-empty string');
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid concept lexicon', issues);
  }

  return {
    priorityConcepts,
    stopWords,
    defaultConcept: typeof defaultConcept === 'string' ? defaultConcept : '',
  };
}

export class ConceptService {
  private readonly stopWords: ReadonlySet<string>;

  constructor(private readonly lexicon: ConceptLexicon) {
    this.stopWords = new Set(lexicon.stopWords);
  }

  static fromFile(filePath: string): ConceptService {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot load concept lexicon ${filePath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
    return new ConceptService(parseConceptLexicon(raw));
  }

  /**
   * @example
   * ```typescript
   * concepts.conceptFor('Seek inner light', 'sacred'); // 'sacred'
   * concepts.conceptFor('Seek inner light', null);    // 'light'
   * ```
   */
  conceptFor(intent: string, themeId: string | null): string {
    return themeId ?? this.extractConcept(intent);
  }

  extractConcept(intent: string): string {
    let best: string | null = null;
    let bestScore = 0;

    for (const word of intent.toLowerCase().match(WORD_REGEX) ?? []) {
      const score = this.score(word);
      if (score > bestScore) {
        best = word;
        bestScore = score;
      }
    }

    return best ?? this.lexicon.defaultConcept;
  }

  private score(word: string): number {
    if (Object.hasOwn(this.lexicon.priorityConcepts, word)) {
      return this.lexicon.priorityConcepts[word] ?? 0;
    }
    if (this.stopWords.has(word)) {
      return 0;
    }
    if (word.length > 4) {
      return 5;
    }
    if (word.length > 3) {
      return 3;
    }
    return 0;
  }
}
