import { config } from 'dotenv';
import { createLogger } from '@ragops/core';
import { runCli } from './cli';

// Load environment variables
config();

const logger = createLogger('stack-control-main');

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error) => {
    logger.fatal({ error }, 'Stack control crashed');
    process.exit(1);
  });
