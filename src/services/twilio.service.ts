/**
 * Twilio Service
 * Outbound calls, SMS and the TwiML documents returned to voice webhooks.
 */

import twilio from 'twilio';
import type { WebhookConfig } from '../config/webhook-urls.config';
import { ExternalServiceError, getErrorMessage } from '../middleware/error.middleware';
import type { SpeechReading } from '../types/call.types';
import { CALL, WEBHOOK_PATHS } from '../utils/constants';
import { loggers } from '../utils/logger';

const VoiceResponse = twilio.twiml.VoiceResponse;
type TwimlResponse = InstanceType<typeof VoiceResponse>;

export interface CallCreateParams {
  to: string;
  from: string;
  url: string;
  method: 'POST';
  record: boolean;
  statusCallback: string;
  statusCallbackMethod: 'POST';
  statusCallbackEvent: string[];
}

export interface MessageCreateParams {
  to: string;
  from: string;
  body: string;
}

/**
 * The part of the Twilio REST client the service uses
 */
export interface TwilioMessagingClient {
  calls: {
    create(params: CallCreateParams): Promise<{ sid: string }>;
  };
  messages: {
    create(params: MessageCreateParams): Promise<{ sid: string }>;
  };
}

/**
 * REST client built on first use, since the SDK rejects an empty account SID
 * at construction.
 */
export const createTwilioClient = (accountSid: string, authToken: string): TwilioMessagingClient => {
  let client: ReturnType<typeof twilio> | null = null;
  const getClient = () => {
    client ??= twilio(accountSid, authToken);
    return client;
  };

  return {
    calls: { create: (params) => getClient().calls.create(params) },
    messages: { create: (params) => getClient().messages.create(params) },
  };
};

export interface ConversationResponseOptions {
  actionPath?: string;
  gather?: boolean;
}

export interface SpeechParams {
  speechResult?: string;
  confidence?: string;
}

export const WELCOME_INSTRUCTIONS = 'Please clearly state your full name, hospital ID, symptoms, appointment date, and appointment time. '
  + 'For example, say: My name is Alex Morgan, hospital ID 1, symptoms are headache, date 2025-06-15, time 10:00 AM.';
export const WELCOME_NO_INPUT = "I didn't hear anything. Please call back when you're ready to book an appointment.";
export const CONVERSATION_NO_INPUT = "I didn't hear anything. Please call back when you're ready.";

export class TwilioService {
  constructor(
    private readonly client: TwilioMessagingClient,
    private readonly fromNumber: string,
    private readonly webhooks: WebhookConfig
  ) {
    loggers.twilio.info('Twilio service initialized', { from: fromNumber });
  }

  getFullUrl(path: string): string {
    return this.webhooks.getFullUrl(path);
  }

  async makeCall(to: string, callbackUrl: string): Promise<string> {
    try {
      const call = await this.client.calls.create({
        to,
        from: this.fromNumber,
        url: callbackUrl,
        method: 'POST',
        record: true,
        statusCallback: this.getFullUrl(WEBHOOK_PATHS.STATUS),
        statusCallbackMethod: 'POST',
        statusCallbackEvent: ['completed'],
      });

      loggers.twilio.info('Initiated call', { to, callSid: call.sid });
      return call.sid;
    } catch (error) {
      loggers.twilio.error('Error making call', { to, error: getErrorMessage(error) });
      throw new ExternalServiceError('twilio', `could not place call: ${getErrorMessage(error)}`);
    }
  }

  async sendSms(to: string, body: string): Promise<string> {
    try {
      const message = await this.client.messages.create({ to, from: this.fromNumber, body });
      loggers.twilio.info('Sent SMS', { to, messageSid: message.sid });
      return message.sid;
    } catch (error) {
      loggers.twilio.error('Error sending SMS', { to, error: getErrorMessage(error) });
      throw new ExternalServiceError('twilio', `could not send SMS: ${getErrorMessage(error)}`);
    }
  }

  private appendGather(response: TwimlResponse, actionPath: string, text: string): void {
    const gather = response.gather({
      input: ['speech'],
      action: this.getFullUrl(actionPath),
      method: 'POST',
      timeout: CALL.GATHER_TIMEOUT_SECONDS,
      speechTimeout: CALL.SPEECH_TIMEOUT,
      language: CALL.LANGUAGE,
      enhanced: true,
      speechModel: CALL.SPEECH_MODEL,
    });
    gather.say(text);
  }

  createWelcomeResponse(clinicName: string): string {
    const response = new VoiceResponse();
    response.say(`Hello! This is ${clinicName}'s appointment booking system. I need to collect some specific information to book your appointment.`);

    this.appendGather(response, WEBHOOK_PATHS.CONVERSATION, WELCOME_INSTRUCTIONS);

    response.say(WELCOME_NO_INPUT);
    response.hangup();

    return response.toString();
  }

  /**
   * Say `text` inside a speech gather, or say it and hang up.
   */
  createConversationResponse(text: string, options: ConversationResponseOptions = {}): string {
    const { actionPath = WEBHOOK_PATHS.CONVERSATION, gather = true } = options;
    const response = new VoiceResponse();

    if (gather) {
      this.appendGather(response, actionPath, text);
      response.say(CONVERSATION_NO_INPUT);
    } else {
      response.say(text);
    }
    response.hangup();

    return response.toString();
  }

  readSpeech(params: SpeechParams): SpeechReading {
    const speech = params.speechResult?.trim() ?? '';
    const parsed = params.confidence === undefined || params.confidence === ''
      ? Number.NaN
      : Number(params.confidence);
    const confidence = Number.isFinite(parsed) ? parsed : 1;

    if (!speech) {
      loggers.twilio.warn('No speech recognized');
      return { status: 'empty', speech, confidence };
    }

    if (confidence < CALL.MIN_SPEECH_CONFIDENCE) {
      loggers.twilio.warn('Low confidence speech', { confidence });
      return { status: 'low_confidence', speech, confidence };
    }

    loggers.twilio.debug('Speech recognized', { speech, confidence });
    return { status: 'ok', speech, confidence };
  }
}
