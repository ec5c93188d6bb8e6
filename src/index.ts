export { KarmaBot, KARMA_COMMAND_USAGE } from './KarmaBot';
export type { KarmaBotOptions } from './KarmaBot';
export { KarmaLedger } from './KarmaLedger';
export {
  LeaderboardBuilder,
  NO_KARMA_MESSAGE,
  renderLeaderboard,
  renderTable
} from './Leaderboard';
export type { LeaderboardOptions } from './Leaderboard';
export {
  classify,
  extractSubject,
  isSelfReference,
  looksLikeUrlFalsePositive
} from './MessageParser';
export {
  RandomPhraseSource,
  ResponseComposer,
  SELF_DECREMENT_REPLY,
  SELF_INCREMENT_REPLY
} from './ResponseComposer';
export type { PhraseSource, PhraseTables } from './ResponseComposer';
export { KarmaStore } from './services/KarmaStore';
export { SlackClient } from './services/SlackClient';
export { KarmaBotAPI } from './api';
export { InvalidInputError, KarmaError, KarmaFileError } from './errors';
export { totalScore } from './types';
export type {
  ChatPoster,
  Classification,
  CommandEvent,
  DirectoryLookup,
  KarmaLedgerEvents,
  KarmaOperation,
  KarmaRecord,
  Leaderboard,
  LeaderboardReply,
  LeaderboardRow,
  MessageEvent,
  NameResolver
} from './types';
