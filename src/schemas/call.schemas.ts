import { z } from 'zod';
import { DATABASE } from '../utils/constants';

export const callRequestSchema = z.object({
  phone: z
    .string({ required_error: 'Phone number is required' })
    .trim()
    .min(1, 'Phone number is required'),
});

export type CallRequestBody = z.infer<typeof callRequestSchema>;

const optionalParam = z.string().optional();

/**
 * Fields Twilio posts (form encoded) to voice and status webhooks
 */
export const twilioWebhookSchema = z.object({
  CallSid: z.string().min(1, 'CallSid is required'),
  To: optionalParam,
  From: optionalParam,
  Direction: optionalParam,
  SpeechResult: optionalParam,
  Confidence: optionalParam,
  CallStatus: optionalParam,
});

export type TwilioWebhookBody = z.infer<typeof twilioWebhookSchema>;

export const doctorQuerySchema = z.object({
  query: z.string({ required_error: 'query is required' }).trim().min(1, 'query is required'),
  hospitalId: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().max(DATABASE.MAX_ID).optional()
  ),
});

export type DoctorQuery = z.infer<typeof doctorQuerySchema>;
