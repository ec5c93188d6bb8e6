import { karmaConfig } from '../src/config';
import { createLogger, describeError } from '../src/logger';
import { KarmaStore } from '../src/services/KarmaStore';

const logger = createLogger('karma.init');

async function main() {
  const store = new KarmaStore(karmaConfig.filePath);

  // Creates the file when missing and validates it otherwise
  const records = await store.load();
  logger.info('Karma file ready', { filePath: store.filePath, records: records.length });
}

main().catch((error: unknown) => {
  logger.error('Error initializing karma file', describeError(error));
  process.exit(1);
});
