// Load environment variables FIRST
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createContainer } from '@/config/container';
import { createApp } from '@/app';
import { logger } from '@/services/logger';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

const config = loadConfig();
const app = createApp(config, createContainer(config));

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const server = app.listen(config.port, () => {
  logger.info('server:listening', { url: `http://localhost:${config.port}`, environment: config.nodeEnv });
});
setServerInstance(server);
