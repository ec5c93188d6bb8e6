import { EventEmitter } from 'events';
import { InvalidInputError } from './errors';
import { createLogger } from './logger';
import { KarmaStore } from './services/KarmaStore';
import { KarmaLedgerEvents, KarmaOperation, KarmaRecord, totalScore } from './types';

const logger = createLogger('karma.ledger');

/**
 * In-memory karma totals, backed by a {@link KarmaStore}.
 *
 * Construct one per process with {@link KarmaLedger.open} and hand it to whatever handles
 * messages. Every mutation rewrites the whole file before the next mutation starts.
 */
export class KarmaLedger extends EventEmitter<KarmaLedgerEvents> {
  private readonly store: KarmaStore;
  private readonly records: Map<string, KarmaRecord>;
  private tail: Promise<void> = Promise.resolve();

  constructor(store: KarmaStore, records: readonly KarmaRecord[] = []) {
    super();
    this.store = store;
    this.records = new Map(records.map((record) => [record.name, { ...record }]));
  }

  /**
   * Load the persisted ledger. Rejects with a KarmaFileError if the file is malformed.
   */
  static async open(store: KarmaStore): Promise<KarmaLedger> {
    const records = await store.load();
    logger.info('Karma ledger loaded', { filePath: store.filePath, records: records.length });
    return new KarmaLedger(store, records);
  }

  async applyIncrement(subject: string): Promise<KarmaRecord> {
    return this.apply(subject, 'increment');
  }

  async applyDecrement(subject: string): Promise<KarmaRecord> {
    return this.apply(subject, 'decrement');
  }

  get(subject: string): KarmaRecord | undefined {
    const record = this.records.get(subject);
    return record ? { ...record } : undefined;
  }

  all(): KarmaRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  /**
   * Resolves once every mutation queued so far has settled.
   */
  async idle(): Promise<void> {
    await this.tail;
  }

  private apply(subject: string, operation: KarmaOperation): Promise<KarmaRecord> {
    return this.serialize(async () => {
      if (!subject) {
        throw new InvalidInputError('Karma subject must not be empty');
      }

      const previous = this.records.get(subject);
      const updated: KarmaRecord = previous
        ? { ...previous }
        : { name: subject, pluses: 0, minuses: 0 };

      if (operation === 'increment') {
        updated.pluses += 1;
      } else {
        updated.minuses += 1;
      }
      this.records.set(subject, updated);

      try {
        await this.store.save(this.all());
      } catch (error) {
        // Memory must not get ahead of disk
        if (previous) {
          this.records.set(subject, previous);
        } else {
          this.records.delete(subject);
        }
        throw error;
      }

      logger.debug(`Got ${operation} for ${subject}`, { total: totalScore(updated) });
      this.emit('karma:updated', { ...updated }, operation);
      return { ...updated };
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The chain only tracks completion; the caller of `run` sees the failure.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
