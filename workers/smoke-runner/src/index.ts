import { config } from 'dotenv';
import { createLogger } from '@ragops/core';
import { runCli } from './cli';

// Load environment variables
config();

const logger = createLogger('smoke-runner-main');

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    logger.fatal({ error }, 'Smoke runner crashed');
    process.exit(1);
  });
