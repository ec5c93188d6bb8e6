import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { KarmaFileError } from '../errors';
import { createLogger } from '../logger';
import { formatIssues, KarmaFileSchema } from '../schemas';
import { KarmaRecord } from '../types';

const logger = createLogger('karma.store');

// fs errors may come from another realm (e.g. a test VM), so no instanceof Error here
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Flat-file persistence for the ledger: a JSON array of `{ name, pluses, minuses }`.
 */
export class KarmaStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Load the ledger at startup. A missing file is a first run and is created as `[]`; anything
   * present but unusable is fatal.
   */
  async load(): Promise<KarmaRecord[]> {
    logger.debug('Loading karma file', { filePath: this.filePath });

    const raw = await this.readRaw();
    if (raw === undefined) {
      logger.info('No existing karma file found, starting fresh', { filePath: this.filePath });
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await this.save([]);
      return [];
    }

    if (!raw.trim()) {
      throw new KarmaFileError(this.filePath, 'Karma file is empty');
    }
    return this.parse(raw);
  }

  /**
   * Read the file as it is on disk right now. Missing and blank files both mean no karma yet.
   */
  async snapshot(): Promise<KarmaRecord[]> {
    const raw = await this.readRaw();
    if (raw === undefined || !raw.trim()) return [];
    return this.parse(raw);
  }

  /**
   * Replace the whole file. The content is written beside the target first and renamed over it,
   * so a reader sees either the previous ledger or this one.
   */
  async save(records: readonly KarmaRecord[]): Promise<void> {
    const payload = records.map(({ name, pluses, minuses }) => ({ name, pluses, minuses }));
    const tmpPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await fs.writeFile(tmpPath, JSON.stringify(payload), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }

    logger.debug('Saved karma file', { filePath: this.filePath, records: payload.length });
  }

  private async readRaw(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw new KarmaFileError(this.filePath, 'Karma file could not be read', { cause: error });
    }
  }

  private parse(raw: string): KarmaRecord[] {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new KarmaFileError(this.filePath, 'Karma file is not valid JSON', { cause: error });
    }

    const result = KarmaFileSchema.safeParse(data);
    if (!result.success) {
      throw new KarmaFileError(
        this.filePath,
        `Karma file has an unexpected shape: ${formatIssues(result.error)}`
      );
    }
    return result.data;
  }
}
