/**
 * Prompt Service - builds the backend prompt from the prompt templates
 *
 * A variation (opening line set by the configuration) is drawn with the
 * attempt's random source and placed before the base template; `{intent}`
 * and `{style}` are substituted everywhere. The variation is cosmetic: it
 * never changes how the response is validated.
 */

import type { PromptTemplates } from '../types/engine.types';
import { pickOne, type RandomSource } from './prng.service';

const PLACEHOLDER_REGEX = /\{(intent|style)\}/g;

export interface PromptInput {
  intent: string;
  style: string;
}

export class PromptService {
  /**
   * @example
   * ```typescript
   * promptService.build(
   *   { intent: 'peace', style: 'serene' },
   *   { base: 'Intent: {intent}\nStyle: {style}', variations: ['Oracle, listen.'] },
   *   rng
   * );
   * // 'Oracle, listen.\n\nIntent: peace\nStyle: serene'
   * ```
   */
  build(input: PromptInput, templates: PromptTemplates, rng: RandomSource): string {
    const template =
      templates.variations.length > 0
        ? `${pickOne(rng, templates.variations)}\n\n${templates.base}`
        : templates.base;

    return this.fill(template, input);
  }

  fill(template: string, input: PromptInput): string {
    // Single pass so substituted text is never re-scanned for placeholders
    return template.replace(PLACEHOLDER_REGEX, (_match, key: string) =>
      key === 'intent' ? input.intent : input.style
    );
  }
}
