import type { NextFunction, Request, Response } from 'express';
import twilio from 'twilio';
import type { WebhookConfig } from '../config/webhook-urls.config';
import { HttpStatus } from '../types/api.types';
import { loggers } from '../utils/logger';

export interface TwilioSignatureOptions {
  authToken: string;
  webhooks: WebhookConfig;
  /** Validation runs only when enabled (production) */
  enabled: boolean;
}

/**
 * URL Twilio signed: the public base URL when known, since requests arrive
 * through a tunnel or proxy under a different host.
 */
const signedUrl = (req: Request, webhooks: WebhookConfig): string => {
  const base = webhooks.getBaseUrl();
  return base ? `${base}${req.originalUrl}` : `${req.protocol}://${req.get('host')}${req.originalUrl}`;
};

/**
 * True when the request carries an X-Twilio-Signature that matches its URL and
 * form body. Needs the body parsed.
 */
export const hasValidTwilioSignature = (req: Request, authToken: string, webhooks: WebhookConfig): boolean => {
  const signature = req.get('x-twilio-signature') ?? '';
  if (signature === '') return false;

  const params: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
  return twilio.validateRequest(authToken, signature, signedUrl(req, webhooks), params);
};

export const validateTwilioSignature = (options: TwilioSignatureOptions) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!options.enabled) {
      next();
      return;
    }

    if (!hasValidTwilioSignature(req, options.authToken, options.webhooks)) {
      loggers.twilio.warn('Rejected webhook with invalid signature', {
        requestId: req.requestId,
        url: req.originalUrl,
      });
      res.status(HttpStatus.FORBIDDEN).send('Forbidden');
      return;
    }

    next();
  };
};
