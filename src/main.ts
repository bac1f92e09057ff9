/**
 * Server entry point. Reads configuration from the environment and serves
 * the ingest API.
 */

import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

const config = loadConfig();
setLogLevel(config.logLevel);

const context = createAppContext({ config });
const app = createApp(context);

app.listen(config.port, () => {
  logger.info('Server listening', { port: config.port, syncMode: config.sync.mode });
});
