import { randomInt } from 'crypto';
import phrases from './data/phrases.json';
import { KarmaOperation, KarmaRecord, totalScore } from './types';

export const SELF_INCREMENT_REPLY = 'Ahem, no self-karma please!';
export const SELF_DECREMENT_REPLY = "Now, now.  Don't be so hard on yourself!";

export interface PhraseSource {
  positive(): string;
  negative(): string;
}

export interface PhraseTables {
  positive: readonly string[];
  negative: readonly string[];
}

/**
 * Picks uniformly from the phrase tables. `pick(n)` must return an integer in `[0, n)`.
 */
export class RandomPhraseSource implements PhraseSource {
  constructor(
    private readonly tables: PhraseTables = phrases,
    private readonly pick: (max: number) => number = randomInt
  ) {
    if (!tables.positive.length || !tables.negative.length) {
      throw new Error('Phrase tables must not be empty');
    }
  }

  positive(): string {
    return this.tables.positive[this.pick(this.tables.positive.length)];
  }

  negative(): string {
    return this.tables.negative[this.pick(this.tables.negative.length)];
  }
}

export class ResponseComposer {
  constructor(private readonly phrases: PhraseSource = new RandomPhraseSource()) {}

  selfBump(operation: KarmaOperation): string {
    return operation === 'increment' ? SELF_INCREMENT_REPLY : SELF_DECREMENT_REPLY;
  }

  /**
   * Reply for an applied operation, e.g. `Bravo. widget now has 3 points.`
   *
   * @param attribution - display name of the sender, appended as `, thanks to <name>`
   */
  karmaChanged(operation: KarmaOperation, record: KarmaRecord, attribution?: string): string {
    const phrase = operation === 'increment' ? this.phrases.positive() : this.phrases.negative();
    const tail = attribution ? `, thanks to ${attribution}` : '';
    return `${phrase} ${record.name} now has ${totalScore(record)} points${tail}.`;
  }
}
