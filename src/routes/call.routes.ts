/**
 * Call Routes
 * Outbound call trigger plus the Twilio voice webhooks. Webhooks always answer
 * with TwiML so the caller hears a message instead of Twilio's error prompt.
 */

import express, { Request, RequestHandler, Response } from 'express';
import { asyncHandler, ValidationError } from '../middleware/error.middleware';
import { formatZodErrors, validateZod } from '../middleware/validation.middleware';
import { callRequestSchema, twilioWebhookSchema, type CallRequestBody } from '../schemas/call.schemas';
import type { AppointmentBookingFlow } from '../services/booking-flow.service';
import type { CallInitiatedResponse } from '../types/api.types';
import type { VoiceWebhookParams } from '../types/call.types';
import { loggers } from '../utils/logger';

type CallFlow = Pick<AppointmentBookingFlow,
  'initiateCall' | 'welcome' | 'conversationTurn' | 'confirmAppointment' | 'callStatus'>;

export interface CallRouterOptions {
  flow: CallFlow;
  /** Applied to every Twilio webhook route */
  verifyWebhook: RequestHandler;
}

const readWebhook = (req: Request): VoiceWebhookParams & { callStatus?: string } => {
  const parsed = twilioWebhookSchema.safeParse(req.body);
  if (!parsed.success) {
    throw new ValidationError('Invalid Twilio webhook payload', formatZodErrors(parsed.error));
  }

  const body = parsed.data;
  return {
    callSid: body.CallSid,
    to: body.To,
    from: body.From,
    direction: body.Direction,
    speechResult: body.SpeechResult,
    confidence: body.Confidence,
    callStatus: body.CallStatus,
  };
};

const sendTwiml = (res: Response, twiml: string): void => {
  res.type('text/xml').send(twiml);
};

export const createCallRouter = ({ flow, verifyWebhook }: CallRouterOptions) => {
  const router = express.Router();

  // Initiate an outbound call to a patient
  router.post('/call', validateZod(callRequestSchema), asyncHandler(async (req: Request, res: Response) => {
    const { phone }: CallRequestBody = req.body;
    const callSid = await flow.initiateCall(phone);

    const body: CallInitiatedResponse = {
      success: true,
      message: 'Call initiated successfully',
      call_sid: callSid,
    };
    res.json(body);
  }));

  router.post('/welcome', verifyWebhook, asyncHandler(async (req: Request, res: Response) => {
    sendTwiml(res, await flow.welcome(readWebhook(req)));
  }));

  router.post('/conversation', verifyWebhook, asyncHandler(async (req: Request, res: Response) => {
    sendTwiml(res, await flow.conversationTurn(readWebhook(req)));
  }));

  router.post('/confirm_appointment', verifyWebhook, asyncHandler(async (req: Request, res: Response) => {
    sendTwiml(res, await flow.confirmAppointment(readWebhook(req)));
  }));

  router.post('/call_status', verifyWebhook, (req: Request, res: Response) => {
    const parsed = twilioWebhookSchema.safeParse(req.body);
    if (parsed.success) {
      flow.callStatus(parsed.data.CallSid, parsed.data.CallStatus ?? '');
    } else {
      loggers.api.warn('Status callback without CallSid', { requestId: req.requestId });
    }
    res.status(200).end();
  });

  return router;
};
