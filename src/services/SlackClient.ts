import { WebClient } from '@slack/web-api';
import { createLogger, describeError } from '../logger';
import { ChatPoster } from '../types';

const logger = createLogger('karma.slack');

/**
 * Thin wrapper over the Slack Web API: display names for the leaderboard and attribution, and
 * posting replies back to a channel.
 */
export class SlackClient implements ChatPoster {
  private client: WebClient;
  private names: Map<string, string> = new Map();

  constructor(token: string, client?: WebClient) {
    this.client = client ?? new WebClient(token);
  }

  /**
   * Real name of a workspace member, falling back to their handle. Lookups are cached for the
   * lifetime of the process.
   */
  async displayName(userId: string): Promise<string | undefined> {
    const cached = this.names.get(userId);
    if (cached) return cached;

    const result = await this.client.users.info({ user: userId });
    const name = result.user?.real_name || result.user?.name;
    if (name) {
      this.names.set(userId, name);
    }
    return name;
  }

  /**
   * Names for many members at once. Pages through `users.list` only when some requested ID is not
   * cached yet; IDs that are not workspace members are left out of the result.
   */
  async displayNames(userIds: readonly string[]): Promise<Map<string, string>> {
    if (userIds.some((userId) => !this.names.has(userId))) {
      let cursor: string | undefined;
      do {
        const page = await this.client.users.list({ cursor, limit: 200 });
        for (const member of page.members ?? []) {
          const name = member.real_name || member.name;
          if (member.id && name) {
            this.names.set(member.id, name);
          }
        }
        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);
      logger.debug('Refreshed member directory', { members: this.names.size });
    }

    const found = new Map<string, string>();
    for (const userId of userIds) {
      const name = this.names.get(userId);
      if (name) found.set(userId, name);
    }
    return found;
  }

  async postMessage(channel: string, text: string): Promise<void> {
    try {
      await this.client.chat.postMessage({ channel, text });
    } catch (error) {
      logger.error('Failed to post message', { channel, ...describeError(error) });
      throw error;
    }
  }
}
