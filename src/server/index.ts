// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loadConfig, type AppConfig } from './utils/config';
import { createAPIRouter } from './api/router';
import { InsultService } from './services/insult.service';
import { RedisWordStore } from './services/word-store.service';
import { SlackReplySink } from './services/reply.service';

// Validate environment variables at startup. REDIS_URL is checked lazily when
// the word list is first needed, so only malformed values stop the server.
let config: AppConfig;

try {
  config = loadConfig();

  if (!config.redisUrl) {
    // eslint-disable-next-line no-console
    console.warn(
      '⚠ Warning: REDIS_URL is not set. Commands that need the word list will fail until it is configured.'
    );
  }
  if (!config.slackToken) {
    // eslint-disable-next-line no-console
    console.warn('⚠ Warning: SLACK_TOKEN is not set. Replies will not be delivered.');
  }

  // eslint-disable-next-line no-console
  console.log('✓ Environment variable validation passed');
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(
    '✗ Configuration error:',
    error instanceof Error ? error.message : error
  );
  // eslint-disable-next-line no-console
  console.error('Server cannot start without required configuration.');
  process.exit(1);
}

function setupServer(appConfig: AppConfig): express.Express {
  const app = express();

  const store = new RedisWordStore({
    redisUrl: appConfig.redisUrl,
    key: appConfig.wordStoreKey,
    commandTimeoutMs: appConfig.redisCommandTimeoutMs,
  });
  const insults = new InsultService({
    store,
    replies: new SlackReplySink(appConfig.slackToken),
  });

  app.use(
    '/api',
    createAPIRouter({
      insults,
      storeHealth: () => store.health(),
      signingSecret: appConfig.slackSigningSecret,
    })
  );

  return app;
}

const app = setupServer(config);

app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`✓ Insult bot listening on port ${config.port}`);
});
