/**
 * Config Source - raw bytes of configuration files
 *
 * A source id names one JSON file in a directory: `brain_wisdom` is
 * `<dir>/brain_wisdom.json`. Ids are restricted to a safe character set so
 * they can never point outside the directory.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError, errorMessage } from '../utils/errors';

const SOURCE_ID_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const DEFAULT_LIST_PATTERN = /^brain.*\.json$/;

/**
 * Where configuration bytes come from. ConfigCache depends only on this.
 */
export interface ConfigSource {
  /**
   * @throws {ConfigurationError} If the id is invalid or the source cannot be read
   */
  read(sourceId: string): Promise<Buffer>;
  /** Source ids available for batches, in name order */
  list(): Promise<string[]>;
}

export function isValidSourceId(sourceId: string): boolean {
  return SOURCE_ID_REGEX.test(sourceId) && !sourceId.includes('..');
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileConfigSource implements ConfigSource {
  constructor(
    private readonly dir: string,
    private readonly listPattern: RegExp = DEFAULT_LIST_PATTERN
  ) {}

  /**
   * Source for a single file, e.g. data/engine.config.json → id `engine.config`.
   */
  static forFile(filePath: string): { source: FileConfigSource; sourceId: string } {
    return {
      source: new FileConfigSource(path.dirname(filePath)),
      sourceId: path.basename(filePath, '.json'),
    };
  }

  pathFor(sourceId: string): string {
    return path.join(this.dir, `${sourceId}.json`);
  }

  async read(sourceId: string): Promise<Buffer> {
    if (!isValidSourceId(sourceId)) {
      throw new ConfigurationError(`Invalid source id "${sourceId}"`, [
        'source ids may contain letters, digits, "_", "-" and "."',
      ]);
    }

    try {
      return await fs.readFile(this.pathFor(sourceId));
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new ConfigurationError(`Configuration source "${sourceId}" not found`);
      }
      throw new ConfigurationError(`Cannot read configuration source "${sourceId}"`, [
        errorMessage(error),
      ]);
    }
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return names
      .filter(name => this.listPattern.test(name))
      .map(name => name.slice(0, -'.json'.length))
      .filter(isValidSourceId)
      .sort();
  }
}
