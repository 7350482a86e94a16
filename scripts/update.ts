#!/usr/bin/env node
import { runUpdate } from '../lib/update';
import logger from '../lib/logger';

async function main() {
  const { variants, written } = await runUpdate();
  logger.info(
    {
      domains: variants.plainWithoutShortlinks.length,
      optimized: variants.optimizedWithoutShortlinks.length,
      failedWrites: written.filter((w) => !w.ok).length,
    },
    'update finished',
  );
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    logger.fatal({ err }, 'update aborted');
    process.exit(1);
  });
