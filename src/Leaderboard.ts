import { createLogger, describeError } from './logger';
import { KarmaStore } from './services/KarmaStore';
import {
  DirectoryLookup,
  KarmaRecord,
  Leaderboard,
  LeaderboardReply,
  LeaderboardRow,
  totalScore
} from './types';

const logger = createLogger('karma.leaderboard');

export const NO_KARMA_MESSAGE = 'No karma yet!';

const HEADERS = ['Name', 'Pluses', 'Minuses', 'Net Score'] as const;

// <@U123>, <@U123|ada>, <!here>, <!subteam^S1|@team>
const PERSON_REGEX = /^<([@!])([^>|]*)(?:\|([^>]*))?>$/;

export interface LeaderboardOptions {
  /** Looks up every user ID on the board in one call. */
  resolveNames?: DirectoryLookup;
  /** Keep only the first N rows of each table after sorting. */
  maxRows?: number;
}

interface SortableRow {
  row: LeaderboardRow;
  rawName: string;
}

interface PersonEntry {
  record: KarmaRecord;
  /** User ID for `<@...>` mentions, absent for group tokens */
  userId?: string;
  fallback: string;
}

function compareRows(a: SortableRow, b: SortableRow): number {
  if (a.row.name !== b.row.name) return a.row.name < b.row.name ? -1 : 1;
  if (a.rawName !== b.rawName) return a.rawName < b.rawName ? -1 : 1;
  return 0;
}

function toRow(record: KarmaRecord, name: string): SortableRow {
  return {
    row: {
      name,
      pluses: record.pluses,
      minuses: record.minuses,
      netScore: totalScore(record)
    },
    rawName: record.name
  };
}

/**
 * Builds the people and things tables from the file on disk.
 *
 * Both tables are sorted ascending by display name (plain code-unit order), with the stored
 * name as tie-break, so the order never depends on scores or on the resolver.
 */
export class LeaderboardBuilder {
  private readonly store: KarmaStore;
  private readonly resolveNames?: DirectoryLookup;
  private readonly maxRows?: number;

  constructor(store: KarmaStore, options: LeaderboardOptions = {}) {
    this.store = store;
    this.resolveNames = options.resolveNames;
    this.maxRows = options.maxRows;
  }

  async build(): Promise<Leaderboard> {
    const records = await this.store.snapshot();
    if (records.length === 0) {
      return { kind: 'empty' };
    }

    const people: PersonEntry[] = [];
    const things: SortableRow[] = [];

    for (const record of records) {
      const match = PERSON_REGEX.exec(record.name);
      if (match) {
        const [, sigil, id, label] = match;
        // The label Slack puts after `|` reads better than a bare ID
        people.push({ record, userId: sigil === '@' ? id : undefined, fallback: label || id });
      } else {
        things.push(toRow(record, record.name));
      }
    }

    const userIds = people.flatMap(({ userId }) => (userId ? [userId] : []));
    const names = await this.lookupNames(userIds);

    return {
      kind: 'tables',
      people: this.finish(
        people.map(({ record, userId, fallback }) =>
          toRow(record, (userId && names.get(userId)) || fallback)
        )
      ),
      things: this.finish(things)
    };
  }

  private finish(rows: SortableRow[]): LeaderboardRow[] {
    const sorted = rows.sort(compareRows).map(({ row }) => row);
    return this.maxRows === undefined ? sorted : sorted.slice(0, this.maxRows);
  }

  /**
   * A failed lookup leaves every person on their fallback name rather than failing the board.
   */
  private async lookupNames(userIds: string[]): Promise<ReadonlyMap<string, string>> {
    if (!this.resolveNames || userIds.length === 0) return new Map();

    try {
      return await this.resolveNames(Array.from(new Set(userIds)));
    } catch (error) {
      logger.warn('Could not resolve display names', { users: userIds.length, ...describeError(error) });
      return new Map();
    }
  }
}

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

/**
 * Render rows as a pipe-delimited table with a header and separator row, cells left-aligned.
 */
export function renderTable(rows: readonly LeaderboardRow[]): string {
  const cells: string[][] = [
    [...HEADERS],
    ...rows.map((row) => [escapeCell(row.name), String(row.pluses), String(row.minuses), String(row.netScore)])
  ];
  const widths = HEADERS.map((_, column) => Math.max(...cells.map((line) => line[column].length)));

  const format = (line: string[]) =>
    `| ${line.map((cell, column) => cell.padEnd(widths[column])).join(' | ')} |`;
  const separator = `|${widths.map((width) => '-'.repeat(width + 2)).join('|')}|`;

  const [header, ...body] = cells;
  return [format(header), separator, ...body.map(format)].join('\n');
}

export function renderLeaderboard(leaderboard: Leaderboard): LeaderboardReply {
  if (leaderboard.kind === 'empty') {
    return { message: NO_KARMA_MESSAGE, people: '', things: '' };
  }

  return {
    message: '',
    people: `User leaderboard:\n\`\`\`\n${renderTable(leaderboard.people)}\n\`\`\``,
    things: `Thing leaderboard:\n\`\`\`\n${renderTable(leaderboard.things)}\n\`\`\``
  };
}
