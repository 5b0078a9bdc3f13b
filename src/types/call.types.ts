/**
 * Call and Conversation Type Definitions
 */

import type { AppointmentDraft } from './appointment.types';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type ConfirmationIntent = 'confirm' | 'correct' | 'cancel' | 'unclear';

export interface CallSession {
  callSid: string;
  history: ConversationMessage[];
  draft: AppointmentDraft;
  awaitingConfirmation: boolean;
  createdAt: number;
  updatedAt: number;
}

/**
 * Parameters Twilio posts to voice webhooks, reduced to the ones the flow reads
 */
export interface VoiceWebhookParams {
  callSid: string;
  to?: string;
  from?: string;
  direction?: string;
  speechResult?: string;
  confidence?: string;
}

export type SpeechStatus = 'ok' | 'empty' | 'low_confidence';

export interface SpeechReading {
  status: SpeechStatus;
  speech: string;
  confidence: number;
}
