/**
 * Server entry point
 *
 * Usage: node dist/src/server.js [public-url]
 * The optional argument is the externally reachable base URL Twilio calls back on.
 */

import type { Server } from 'http';
import { createApp } from './app';
import { describeDatabase, loadConfig, resolvePublicUrl } from './config/env.config';
import { WebhookConfig } from './config/webhook-urls.config';
import { AppointmentBookingFlow } from './services/booking-flow.service';
import { CallSessionStore } from './services/call-session.store';
import { createPool, DatabaseService } from './services/database.service';
import { createGroqClient, LlmService } from './services/llm.service';
import { createTwilioClient, TwilioService } from './services/twilio.service';
import { CALL } from './utils/constants';
import { configureLogger, describeError, loggers } from './utils/logger';

const log = loggers.system;

const start = (): void => {
  const config = loadConfig();
  configureLogger({ level: config.logging.level, file: config.logging.file });

  const publicUrl = resolvePublicUrl(process.argv[2], config.app.port, config.app.publicUrl);
  if (!publicUrl.reachable) {
    log.warn('No public URL configured; Twilio cannot reach the webhooks', { url: publicUrl.url });
  }
  const webhooks = new WebhookConfig(publicUrl.url);

  log.info('Starting appointment call server', {
    phoneNumber: config.twilio.phoneNumber,
    publicUrl: publicUrl.url,
    database: describeDatabase(config.database.url),
    port: config.app.port,
    debug: config.app.debug,
  });

  const database = new DatabaseService(createPool(config.database.url));
  const llm = new LlmService(
    createGroqClient({ apiKey: config.groq.apiKey, baseUrl: config.groq.baseUrl }),
    config.groq.model
  );
  const telephony = new TwilioService(
    createTwilioClient(config.twilio.accountSid, config.twilio.authToken),
    config.twilio.phoneNumber,
    webhooks
  );
  const sessions = new CallSessionStore();

  const flow = new AppointmentBookingFlow({
    telephony,
    llm,
    database,
    sessions,
    clinicName: config.app.clinicName,
  });

  const app = createApp({ config, webhooks, flow, database });

  const server: Server = app.listen(config.app.port, () => {
    log.info(`Server listening on port ${config.app.port}`, {
      welcome: webhooks.getFullUrl('/api/welcome'),
      health: `http://localhost:${config.app.port}/health`,
    });
  });

  const sweeper = setInterval(() => {
    const removed = sessions.sweep();
    if (removed > 0) {
      log.info('Expired call sessions removed', { removed, active: sessions.size() });
    }
  }, CALL.SESSION_SWEEP_INTERVAL_MS);
  sweeper.unref();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);

    clearInterval(sweeper);
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await database.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Shutdown failed', describeError(error));
          process.exit(1);
        });
    });
  }
};

try {
  start();
} catch (error) {
  log.error('Server failed to start', describeError(error));
  process.exitCode = 1;
}
