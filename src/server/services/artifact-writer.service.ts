/**
 * Artifact Writer - persists each artifact for people to read
 *
 * File Layout (under the output directory):
 * - output.json                      → latest artifact, replaced atomically
 * - echoes/{concept}.md              → every artifact for a concept, numbered visits
 * - logs/seed_{YYYYMMDD-HHMMSS}.log  → prompt, raw response and result per attempt
 *
 * Times are UTC.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { ArtifactRecord, ArtifactSink } from '../types/generation.types';
import type { ConceptService } from './concept.service';

const SAFE_CONCEPT_REGEX = /[^\p{L}\p{N}_-]+/gu;
const ECHO_ENTRY_PREFIX = '## ';
const ECHO_ENTRY_REGEX = /^## \d{4}-\d{2}-\d{2}-\d{4} · visit \d+$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** 2026-10-19-1430 */
export function formatEchoTime(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;
}

/** 20261019-143005 */
export function formatLogStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/**
 * Artifact fields come from model output; each must stay on its entry line.
 */
function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ');
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ArtifactWriterService implements ArtifactSink {
  constructor(
    private readonly outputDir: string,
    private readonly concepts: ConceptService,
    private readonly now: () => Date = () => new Date()
  ) {}

  get outputPath(): string {
    return path.join(this.outputDir, 'output.json');
  }

  echoPath(concept: string): string {
    return path.join(this.outputDir, 'echoes', `${concept}.md`);
  }

  logPath(date: Date): string {
    return path.join(this.outputDir, 'logs', `seed_${formatLogStamp(date)}.log`);
  }

  async record(entry: ArtifactRecord): Promise<void> {
    const timestamp = this.now();
    const concept = this.safeConcept(this.concepts.conceptFor(entry.intent, entry.theme));

    await this.writeOutput(entry, timestamp);
    await this.appendEcho(concept, entry, timestamp);
    await this.appendLog(entry, timestamp);
  }

  /**
   * Appends one entry to the concept's echo file, creating it with a title.
   *
   * @returns Visit number of the appended entry
   */
  async appendEcho(concept: string, entry: ArtifactRecord, timestamp: Date): Promise<number> {
    const file = this.echoPath(concept);
    await fs.mkdir(path.dirname(file), { recursive: true });

    let existing = '';
    try {
      existing = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }

    const visit =
      existing.split('\n').filter(line => ECHO_ENTRY_REGEX.test(line)).length + 1;
    const header = existing.length === 0 ? `# ${titleCase(concept)} Echoes\n\n` : '';
    const { symbol, phrase, reasoning } = entry.artifact;

    await fs.appendFile(
      file,
      `${header}${ECHO_ENTRY_PREFIX}${formatEchoTime(timestamp)} · visit ${visit}\n` +
        `**Symbol**: ${singleLine(symbol)}  \n` +
        `**Phrase**: ${singleLine(phrase)}  \n` +
        `**Reasoning**: ${singleLine(reasoning)}\n\n`,
      'utf8'
    );

    return visit;
  }

  private async writeOutput(entry: ArtifactRecord, timestamp: Date): Promise<void> {
    const target = this.outputPath;
    const temp = `${target}.${randomUUID()}.tmp`;
    const body = JSON.stringify(
      {
        ...entry.artifact,
        theme: entry.theme,
        status: entry.status,
        sourceId: entry.sourceId,
        backend: entry.backendId,
        timestamp: timestamp.toISOString(),
      },
      null,
      2
    );

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(temp, `${body}\n`, 'utf8');
    await fs.rename(temp, target);
  }

  private async appendLog(entry: ArtifactRecord, timestamp: Date): Promise<void> {
    const file = this.logPath(timestamp);
    await fs.mkdir(path.dirname(file), { recursive: true });

    await fs.appendFile(
      file,
      [
        '=== SESSION LOG ===',
        `Timestamp: ${timestamp.toISOString()}`,
        `Source: ${entry.sourceId}`,
        `Backend: ${entry.backendId}`,
        `Status: ${entry.status}`,
        '',
        'PROMPT SENT:',
        entry.prompt ?? '(none)',
        '',
        'RAW RESPONSE:',
        entry.rawResponse ?? '(none)',
        '',
        'RESULT:',
        JSON.stringify(entry.artifact, null, 2),
        '',
        '',
      ].join('\n'),
      'utf8'
    );
  }

  private safeConcept(concept: string): string {
    const cleaned = concept.replace(SAFE_CONCEPT_REGEX, '');
    return cleaned.length > 0 ? cleaned : 'dream';
  }
}
