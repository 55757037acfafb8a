// נקודת הכניסה של ה-CLI: טעינת .env, טיפול ב-SIGINT והרצה
import './loadEnv';

import { createModuleLogger } from 'ssdp-core';

import { runCli } from './cli';

const logger = createModuleLogger('MainIndex');
const controller = new AbortController();

// Ctrl+C מסיים את הסבב הנוכחי ומדפיס את מה שנמצא עד כה
process.once('SIGINT', () => {
  logger.info('SIGINT received. Finishing discovery with the services found so far...');
  controller.abort();
});

runCli(process.argv.slice(2), { abortSignal: controller.signal }).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    logger.error('Unexpected failure', { error: err });
    process.exitCode = 1;
  }
);
