import { KarmaBotAPI } from './api';
import { karmaConfig, slackConfig } from './config';
import { KarmaBot } from './KarmaBot';
import { KarmaLedger } from './KarmaLedger';
import { LeaderboardBuilder } from './Leaderboard';
import { createLogger, describeError } from './logger';
import { KarmaStore } from './services/KarmaStore';
import { SlackClient } from './services/SlackClient';

const logger = createLogger('karma');

async function main() {
  const store = new KarmaStore(karmaConfig.filePath);
  // A malformed karma file stops startup here
  const ledger = await KarmaLedger.open(store);

  const slack = slackConfig.botToken ? new SlackClient(slackConfig.botToken) : undefined;
  if (!slack) {
    logger.warn('SLACK_BOT_TOKEN is not set; names will not be resolved and replies will not be posted');
  }

  const leaderboard = new LeaderboardBuilder(store, {
    resolveNames: slack ? (userIds) => slack.displayNames(userIds) : undefined,
    maxRows: karmaConfig.leaderboard.maxRows
  });
  const bot = new KarmaBot({
    ledger,
    leaderboard,
    resolveAttribution: slack ? (userId) => slack.displayName(userId) : undefined
  });

  ledger.on('karma:updated', (record, operation) => {
    logger.info(`Karma ${operation} for ${record.name}`, {
      pluses: record.pluses,
      minuses: record.minuses
    });
  });

  const api = new KarmaBotAPI({ bot, ledger, leaderboard, poster: slack });
  const server = api.start();

  // Let in-flight saves finish before exiting
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    ledger
      .idle()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', describeError(error));
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Error starting application', describeError(error));
  process.exit(1);
});
