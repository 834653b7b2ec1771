/**
 * Load every vocabulary file in VOCAB_DIR into the configured card store.
 *
 *   npm run vocab:sync
 *
 * Exits 1 when any file failed to load.
 */

import { loadConfig } from '@/config/env';
import { openStores } from '@/config/stores';
import { VocabLoaderService, isLoadFailure } from '@/services/vocab-loader.service';
import { configureLogger, logger, serializeError } from '@/utils/logger';

async function main(): Promise<number> {
  const config = loadConfig();
  configureLogger({ nodeEnv: config.NODE_ENV, level: config.LOG_LEVEL });

  const stores = await openStores(config);
  try {
    const loader = new VocabLoaderService(stores.cards, config.VOCAB_DIR);
    const result = await loader.syncAllTopics();

    for (const [filename, outcome] of Object.entries(result.files)) {
      if (isLoadFailure(outcome)) {
        console.log(`✗ ${filename}: ${outcome.error.message}`);
        continue;
      }
      console.log(`✓ ${filename}: ${outcome.inserted} inserted, ${outcome.skipped} skipped, ${outcome.rejected} rejected`);
      for (const rejection of outcome.errors) {
        console.log(`    row ${rejection.row}: ${rejection.reason}`);
      }
    }
    const { totals } = result;
    console.log(
      `\n${totals.files} file(s), ${totals.inserted} inserted, ${totals.skipped} skipped, ${totals.rejected} rejected, ${totals.failed} failed`
    );
    return totals.failed > 0 ? 1 : 0;
  } finally {
    await stores.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    logger.error('Vocabulary sync failed', { error: serializeError(error) });
    process.exit(1);
  });
