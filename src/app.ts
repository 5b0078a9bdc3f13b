/**
 * Express Application Configuration
 * Main application setup with all middleware and routes
 */

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import fs from 'fs';
import path from 'path';

// Import logging
import { stream } from './utils/logger';
import { requestId, requestLogger } from './middleware/logging.middleware';
import { asyncHandler, createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { hasValidTwilioSignature, validateTwilioSignature } from './middleware/twilio-signature.middleware';

// Import config and types
import type { AppConfig } from './config/env.config';
import { describeDatabase, maskAccountSid } from './config/env.config';
import type { WebhookConfig } from './config/webhook-urls.config';
import { HttpStatus, type HealthResponse, type StatusResponse } from './types/api.types';
import { APP_CONFIG, RATE_LIMIT } from './utils/constants';

// Import routes
import { createCallRouter, type CallRouterOptions } from './routes/call.routes';
import { createDoctorsRouter } from './routes/doctors.routes';
import type { DatabaseService } from './services/database.service';

export interface AppDependencies {
  config: AppConfig;
  webhooks: WebhookConfig;
  flow: CallRouterOptions['flow'];
  database: Pick<DatabaseService, 'findDoctorByNameOrSpecialty' | 'healthCheck'>;
}

/**
 * public/ sits at the project root, one level above src/ and two above dist/src/
 */
const resolvePublicDir = (): string | null => {
  const candidates = [
    path.resolve(__dirname, '..', 'public'),
    path.resolve(__dirname, '..', '..', 'public'),
  ];
  return candidates.find((dir) => fs.existsSync(path.join(dir, 'index.html'))) ?? null;
};

/**
 * Create and configure Express application
 */
export const createApp = ({ config, webhooks, flow, database }: AppDependencies): Application => {
  const app: Application = express();
  const isProduction = config.app.env === 'production';
  const isTest = config.app.env === 'test';

  // Trust proxy - webhooks arrive through a tunnel or reverse proxy
  app.set('trust proxy', 1);

  // ============================
  // Security Middleware
  // ============================

  app.use(helmet({
    contentSecurityPolicy: isProduction ? undefined : false,
  }));

  app.use(cors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
  }));

  // ============================
  // Request Processing Middleware
  // ============================

  app.use(compression());

  // Twilio posts form-encoded bodies; the booking page posts JSON
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  // Rate limiting; requests whose Twilio signature checks out are not counted
  const limiter = rateLimit({
    windowMs: RATE_LIMIT.WINDOW_MS,
    max: isProduction ? RATE_LIMIT.MAX_REQUESTS : RATE_LIMIT.DEV_MAX_REQUESTS,
    message: { success: false, error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => hasValidTwilioSignature(req, config.twilio.authToken, webhooks),
  });
  app.use(APP_CONFIG.API_PREFIX, limiter);

  app.use(requestId);

  if (!isTest) {
    // Use Morgan for HTTP logging with Winston stream
    app.use(morgan(isProduction ? 'combined' : 'dev', {
      skip: (req) => req.url === '/health',
      stream,
    }));
    app.use(requestLogger);
  }

  // ============================
  // Health & Status Endpoints
  // ============================

  app.get('/health', asyncHandler(async (req: Request, res: Response) => {
    const databaseUp = await database.healthCheck();
    const body: HealthResponse = {
      status: databaseUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.app.env,
      version: APP_CONFIG.VERSION,
      database: databaseUp ? 'up' : 'down',
    };
    res.status(databaseUp ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE).json(body);
  }));

  app.get('/status', (req: Request, res: Response) => {
    const body: StatusResponse = {
      status: 'running',
      twilio: {
        account_sid: maskAccountSid(config.twilio.accountSid),
        phone_number: config.twilio.phoneNumber,
      },
      database: describeDatabase(config.database.url),
    };
    res.json(body);
  });

  // ============================
  // Static Files
  // ============================

  // Booking page that starts outbound calls
  const publicDir = resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir, { index: 'index.html' }));
  }

  // ============================
  // API Routes
  // ============================

  const verifyWebhook = validateTwilioSignature({
    authToken: config.twilio.authToken,
    webhooks,
    enabled: isProduction,
  });

  app.use(APP_CONFIG.API_PREFIX, createCallRouter({ flow, verifyWebhook }));
  app.use(APP_CONFIG.API_PREFIX, createDoctorsRouter(database));

  // ============================
  // Error Handling
  // ============================

  app.use(notFoundHandler);
  app.use(createErrorHandler({ exposeStack: config.app.debug && !isProduction }));

  return app;
};
