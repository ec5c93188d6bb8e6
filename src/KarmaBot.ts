import { InvalidInputError } from './errors';
import { KarmaLedger } from './KarmaLedger';
import { LeaderboardBuilder, renderLeaderboard } from './Leaderboard';
import { createLogger, describeError } from './logger';
import {
  classify,
  extractSubject,
  isSelfReference,
  looksLikeUrlFalsePositive
} from './MessageParser';
import { ResponseComposer } from './ResponseComposer';
import { CommandEvent, LeaderboardReply, MessageEvent, NameResolver } from './types';

const logger = createLogger('karma.bot');

export const KARMA_COMMAND_USAGE =
  "Hmmm... this doesn't look right.  Syntax is '/k SUBJECT (++|--) [FLAVOR]'";

export interface KarmaBotOptions {
  ledger: KarmaLedger;
  leaderboard: LeaderboardBuilder;
  composer?: ResponseComposer;
  /** Names the sender in increment replies; failures drop the attribution. */
  resolveAttribution?: NameResolver;
}

/**
 * Entry points for a chat transport: turn inbound text into ledger updates and reply text.
 */
export class KarmaBot {
  private ledger: KarmaLedger;
  private leaderboard: LeaderboardBuilder;
  private composer: ResponseComposer;
  private resolveAttribution?: NameResolver;

  constructor(options: KarmaBotOptions) {
    this.ledger = options.ledger;
    this.leaderboard = options.leaderboard;
    this.composer = options.composer ?? new ResponseComposer();
    this.resolveAttribution = options.resolveAttribution;
  }

  /**
   * Handle one chat message. Returns the reply to send, or `undefined` when the message is not
   * a karma operation, is a `--` inside a URL, or has no sender.
   */
  async handleText(event: MessageEvent): Promise<string | undefined> {
    // Every text contains the empty string, so without a sender there is no self-bump check
    if (!event.user) {
      logger.warn('Ignoring message without a sender');
      return undefined;
    }

    const operation = classify(event.text);
    if (operation === 'none') return undefined;

    if (operation === 'decrement' && looksLikeUrlFalsePositive(event.text)) {
      logger.debug('Ignoring "--" inside a URL', { user: event.user });
      return undefined;
    }

    if (isSelfReference(event.user, event.text)) {
      logger.debug(`Skipping self-${operation}`, { user: event.user });
      return this.composer.selfBump(operation);
    }

    let subject: string;
    try {
      subject = extractSubject(event.text);
    } catch (error) {
      if (error instanceof InvalidInputError) return undefined;
      throw error;
    }

    const record =
      operation === 'increment'
        ? await this.ledger.applyIncrement(subject)
        : await this.ledger.applyDecrement(subject);

    const attribution =
      operation === 'increment' ? await this.attributionFor(event.user) : undefined;
    return this.composer.karmaChanged(operation, record, attribution);
  }

  /**
   * Slash commands: `/k SUBJECT (++|--) [FLAVOR]` and `/leaderboard`. Returns `undefined` when
   * there is nothing to say, as for a `--` inside a URL.
   */
  async handleCommand(event: CommandEvent): Promise<string | undefined> {
    switch (event.command) {
      case '/k': {
        if (classify(event.text) === 'none') return KARMA_COMMAND_USAGE;
        return this.handleText({ user: event.user, text: event.text });
      }
      case '/leaderboard': {
        const { message, people, things } = await this.buildLeaderboard();
        return [message, people, things].filter(Boolean).join('\n\n');
      }
      default:
        return `Unknown command ${event.command}`;
    }
  }

  async buildLeaderboard(): Promise<LeaderboardReply> {
    return renderLeaderboard(await this.leaderboard.build());
  }

  private async attributionFor(userId: string): Promise<string | undefined> {
    if (!this.resolveAttribution) return undefined;
    try {
      return await this.resolveAttribution(userId);
    } catch (error) {
      logger.warn('Could not resolve sender name', { userId, ...describeError(error) });
      return undefined;
    }
  }
}
