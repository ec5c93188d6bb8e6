export interface KarmaRecord {
  name: string;
  pluses: number;
  minuses: number;
}

export type KarmaOperation = 'increment' | 'decrement';

export type Classification = KarmaOperation | 'none';

/** Inbound chat message, already validated at the transport boundary. */
export interface MessageEvent {
  user: string;
  text: string;
}

export interface CommandEvent {
  command: string;
  text: string;
  user: string;
}

/** Resolves a chat user ID to a display name; `undefined` when the ID is unknown. */
export type NameResolver = (userId: string) => Promise<string | undefined>;

/** Resolves many user IDs at once; IDs missing from the result are unknown. */
export type DirectoryLookup = (userIds: readonly string[]) => Promise<ReadonlyMap<string, string>>;

export interface ChatPoster {
  postMessage(channel: string, text: string): Promise<void>;
}

export interface LeaderboardRow {
  name: string;
  pluses: number;
  minuses: number;
  netScore: number;
}

export type Leaderboard =
  | { kind: 'empty' }
  | { kind: 'tables'; people: LeaderboardRow[]; things: LeaderboardRow[] };

export interface LeaderboardReply {
  message: string;
  people: string;
  things: string;
}

export type KarmaLedgerEvents = {
  'karma:updated': [record: KarmaRecord, operation: KarmaOperation];
};

export function totalScore(record: KarmaRecord): number {
  return record.pluses - record.minuses;
}
