/**
 * Appointment Booking Flow
 * Drives one call from greeting to stored appointment. Every webhook handler
 * returns TwiML; failures are spoken to the caller instead of surfacing as
 * HTTP errors.
 */

import type {
  AppointmentDraft,
  CompleteAppointmentDraft,
  NewAppointment,
  RequiredField,
} from '../types/appointment.types';
import { getMissingFields, isCompleteDraft } from '../types/appointment.types';
import type { ConfirmationIntent, SpeechReading, VoiceWebhookParams } from '../types/call.types';
import { CALL, WEBHOOK_PATHS } from '../utils/constants';
import { normalizeAppointmentDate, normalizeAppointmentTime, tryNormalizeAppointmentDate } from '../utils/date-utils';
import { describeError, loggers } from '../utils/logger';
import type { CallSessionStore } from './call-session.store';
import type { DatabaseService } from './database.service';
import type { LlmService } from './llm.service';
import { captureFromSpeech } from './speech-extraction.service';
import type { TwilioService } from './twilio.service';

export type BookingTelephony = Pick<TwilioService,
  'makeCall' | 'sendSms' | 'getFullUrl' | 'createWelcomeResponse' | 'createConversationResponse' | 'readSpeech'>;

export type BookingLlm = Pick<LlmService,
  'extractAppointmentData' | 'generateFollowUpQuestion' | 'verifyAppointmentDetails' | 'analyzeUserResponse'>;

export type BookingDatabase = Pick<DatabaseService,
  'checkHospitalExists' | 'checkAppointmentAvailability' | 'createAppointment' | 'findUserByPhone'>;

export interface BookingFlowDependencies {
  telephony: BookingTelephony;
  llm: BookingLlm;
  database: BookingDatabase;
  sessions: CallSessionStore;
  clinicName: string;
}

export const MESSAGES = {
  NO_SPEECH: "I couldn't hear what you said. Please try speaking again clearly.",
  LOW_CONFIDENCE: "I heard you, but wasn't very confident. Could you please speak more clearly and try again?",
  NOT_UNDERSTOOD: "I'm sorry, I didn't understand that. Could you please try again?",
  TECHNICAL_DIFFICULTIES: "I'm sorry, we're experiencing technical difficulties. Please try again later.",
  LOST_INFORMATION: "I'm sorry, we seem to have lost your appointment information. Let's start over. What appointment would you like to book?",
  BOOKING_FAILED: "I'm sorry, there was a problem creating your appointment. Please try again later or call our office directly.",
  CORRECTION: 'I understand you want to make changes. What would you like to update about your appointment?',
  UNCLEAR_CONFIRMATION: "I'm sorry, I didn't understand your response. Please say 'yes' to confirm the appointment, 'no' to make changes, or 'cancel' to cancel.",
  SMS_SENT: " I've also sent you a text message with the details.",
} as const;

export const SINGLE_FIELD_PROMPTS: Record<RequiredField, string> = {
  patient: 'I still need your full name. Please clearly say: My name is, followed by your full name.',
  symptoms: "I need to know why you're booking this appointment. Please clearly say: My symptoms are, followed by your health concern.",
  date: 'I need the date for your appointment. Please clearly say: The date is, followed by a date like 2025-06-15.',
  time: 'I need the time for your appointment. Please clearly say: The time is, followed by a time like 10:00 AM.',
  hospitalId: 'I need the hospital ID number. Please clearly say: Hospital ID, followed by the number.',
};

const TERMINAL_STATUSES = new Set<string>(CALL.TERMINAL_STATUSES);

/**
 * The patient's side of the call: the caller on inbound calls, the dialed
 * number on outbound ones.
 */
export const resolvePatientNumber = (params: Pick<VoiceWebhookParams, 'to' | 'from' | 'direction'>): string | undefined => {
  const inbound = params.direction?.startsWith('inbound') ?? false;
  const number = inbound ? params.from : params.to ?? params.from;
  return number?.trim() || undefined;
};

/**
 * Fields from the LLM that may enter the draft. A patient name replaces the
 * current one only when longer; other fields only fill gaps.
 */
export const mergeExtraction = (
  draft: AppointmentDraft,
  extracted: Awaited<ReturnType<BookingLlm['extractAppointmentData']>>
): Partial<AppointmentDraft> => {
  const updates: Partial<AppointmentDraft> = {};

  if (extracted.patient && (!draft.patient || extracted.patient.length > draft.patient.length)) {
    updates.patient = extracted.patient;
  }
  if (extracted.symptoms && !draft.symptoms) updates.symptoms = extracted.symptoms;
  if (extracted.date && !draft.date) updates.date = extracted.date;
  if (extracted.time && !draft.time) updates.time = normalizeAppointmentTime(extracted.time);
  if (extracted.hospitalId !== null && draft.hospitalId === undefined) updates.hospitalId = extracted.hospitalId;

  return updates;
};

export const buildConfirmationSms = (
  clinicName: string,
  appointment: NewAppointment,
  hospitalName: string,
  appointmentId: string
): string => [
  `${clinicName} Appointment Confirmation`,
  `Patient: ${appointment.patient}`,
  `Date: ${appointment.date}`,
  `Time: ${appointment.time}`,
  `Hospital: ${hospitalName}`,
  `Symptoms: ${appointment.symptoms}`,
  `Appointment ID: ${appointmentId}`,
].join('\n');

export class AppointmentBookingFlow {
  private readonly telephony: BookingTelephony;
  private readonly llm: BookingLlm;
  private readonly database: BookingDatabase;
  private readonly sessions: CallSessionStore;
  private readonly clinicName: string;

  constructor(deps: BookingFlowDependencies) {
    this.telephony = deps.telephony;
    this.llm = deps.llm;
    this.database = deps.database;
    this.sessions = deps.sessions;
    this.clinicName = deps.clinicName;
  }

  /**
   * Dial the patient. Returns the CallSid; Twilio failures propagate.
   */
  async initiateCall(phone: string): Promise<string> {
    const trimmed = phone.trim();
    const to = trimmed.startsWith('+') ? trimmed : `+${trimmed}`;
    const callbackUrl = this.telephony.getFullUrl(WEBHOOK_PATHS.WELCOME);

    loggers.call.info('Initiating call', { to, callbackUrl });
    const callSid = await this.telephony.makeCall(to, callbackUrl);

    this.sessions.mergeDraft(callSid, { phone: to });
    return callSid;
  }

  async welcome(params: VoiceWebhookParams): Promise<string> {
    try {
      loggers.call.info('Call answered', { callSid: params.callSid, direction: params.direction });
      const session = this.sessions.getOrCreate(params.callSid);
      const patientNumber = resolvePatientNumber(params);

      if (patientNumber) {
        if (!session.draft.phone) {
          this.sessions.mergeDraft(params.callSid, { phone: patientNumber });
        }
        await this.prefillPatient(params.callSid, patientNumber);
      }

      return this.telephony.createWelcomeResponse(this.clinicName);
    } catch (error) {
      loggers.call.error('Error in welcome', { callSid: params.callSid, ...describeError(error) });
      return this.hangUp(MESSAGES.TECHNICAL_DIFFICULTIES);
    }
  }

  async conversationTurn(params: VoiceWebhookParams): Promise<string> {
    const { callSid } = params;
    const reading = this.telephony.readSpeech(params);
    if (reading.status !== 'ok') {
      return this.reprompt(reading, WEBHOOK_PATHS.CONVERSATION);
    }

    try {
      const speech = reading.speech;
      loggers.call.info('Conversation turn', { callSid });
      loggers.call.debug('Caller said', { callSid, speech });

      let session = this.sessions.appendMessage(callSid, { role: 'user', content: speech });

      const patientNumber = resolvePatientNumber(params);
      if (!session.draft.phone && patientNumber) {
        session = this.sessions.mergeDraft(callSid, { phone: patientNumber });
      }

      session = this.sessions.mergeDraft(callSid, captureFromSpeech(speech, session.draft));

      const extracted = await this.llm.extractAppointmentData(speech, session.history);
      session = this.sessions.mergeDraft(callSid, mergeExtraction(session.draft, extracted));

      const missing = getMissingFields(session.draft);
      loggers.call.info('Draft updated', { callSid, missing });

      if (!isCompleteDraft(session.draft)) {
        const followUp = missing.length === 1
          ? SINGLE_FIELD_PROMPTS[missing[0]]
          : await this.llm.generateFollowUpQuestion(session.draft, missing);

        this.sessions.appendMessage(callSid, { role: 'assistant', content: followUp });
        return this.telephony.createConversationResponse(followUp);
      }

      return await this.prepareConfirmation(callSid, session.draft);
    } catch (error) {
      loggers.call.error('Error in conversation', { callSid, ...describeError(error) });
      return this.telephony.createConversationResponse(MESSAGES.NOT_UNDERSTOOD);
    }
  }

  async confirmAppointment(params: VoiceWebhookParams): Promise<string> {
    const { callSid } = params;

    try {
      const session = this.sessions.get(callSid);
      if (!session?.awaitingConfirmation || !isCompleteDraft(session.draft)) {
        loggers.call.warn('No appointment awaiting confirmation', { callSid });
        this.sessions.setAwaitingConfirmation(callSid, false);
        return this.telephony.createConversationResponse(MESSAGES.LOST_INFORMATION);
      }

      const reading = this.telephony.readSpeech(params);
      if (reading.status !== 'ok') {
        return this.reprompt(reading, WEBHOOK_PATHS.CONFIRM);
      }

      const draft = session.draft;
      const intent: ConfirmationIntent = await this.llm.analyzeUserResponse(reading.speech);
      loggers.call.info('Confirmation answer', { callSid, intent });

      switch (intent) {
        case 'confirm':
          return await this.book(callSid, draft, draft.phone ?? resolvePatientNumber(params) ?? '');

        case 'correct':
          this.sessions.setAwaitingConfirmation(callSid, false);
          return this.telephony.createConversationResponse(MESSAGES.CORRECTION);

        case 'cancel':
          this.sessions.delete(callSid);
          return this.hangUp(`I understand you want to cancel. Your appointment has not been booked. Thank you for calling ${this.clinicName}.`);

        default:
          return this.telephony.createConversationResponse(MESSAGES.UNCLEAR_CONFIRMATION, {
            actionPath: WEBHOOK_PATHS.CONFIRM,
          });
      }
    } catch (error) {
      loggers.call.error('Error in confirm_appointment', { callSid, ...describeError(error) });
      return this.hangUp(MESSAGES.TECHNICAL_DIFFICULTIES);
    }
  }

  /**
   * Drop the session once Twilio reports the call finished.
   */
  callStatus(callSid: string, status: string): void {
    loggers.call.info('Call status', { callSid, status });

    if (TERMINAL_STATUSES.has(status) && this.sessions.delete(callSid)) {
      loggers.call.debug('Session cleared', { callSid });
    }
  }

  private async prefillPatient(callSid: string, phone: string): Promise<void> {
    try {
      const profile = await this.database.findUserByPhone(phone);
      const session = this.sessions.getOrCreate(callSid);
      if (profile && !session.draft.patient) {
        loggers.call.info('Known patient', { callSid, userId: profile.id });
        this.sessions.mergeDraft(callSid, { patient: profile.name });
      }
    } catch (error) {
      loggers.call.warn('Patient lookup failed', { callSid, ...describeError(error) });
    }
  }

  /**
   * Check the hospital, the date and the slot, then read the details back.
   */
  private async prepareConfirmation(callSid: string, draft: CompleteAppointmentDraft): Promise<string> {
    const hospital = await this.database.checkHospitalExists(draft.hospitalId);
    if (!hospital) {
      this.sessions.removeFields(callSid, ['hospitalId']);
      return this.telephony.createConversationResponse(
        `I'm sorry, the hospital with ID ${draft.hospitalId} doesn't exist in our system. Please say a different hospital ID.`
      );
    }

    const date = tryNormalizeAppointmentDate(draft.date);
    if (!date) {
      this.sessions.removeFields(callSid, ['date']);
      return this.telephony.createConversationResponse(
        `I'm sorry, I couldn't understand the date ${draft.date}. Please say the date again, for example 2025-06-15.`
      );
    }

    const time = normalizeAppointmentTime(draft.time);
    const available = await this.database.checkAppointmentAvailability(draft.hospitalId, date, time);
    if (!available) {
      this.sessions.removeFields(callSid, ['time']);
      return this.telephony.createConversationResponse(
        `I'm sorry, but the time slot at ${time} on ${date} is fully booked. Please suggest a different time.`
      );
    }

    const session = this.sessions.mergeDraft(callSid, { date, time });
    const confirmation = await this.llm.verifyAppointmentDetails(session.draft, hospital.name);

    this.sessions.setAwaitingConfirmation(callSid, true);
    this.sessions.appendMessage(callSid, { role: 'assistant', content: confirmation });

    return this.telephony.createConversationResponse(confirmation, { actionPath: WEBHOOK_PATHS.CONFIRM });
  }

  private async book(callSid: string, draft: CompleteAppointmentDraft, phone: string): Promise<string> {
    const created = await this.storeAppointment(callSid, draft, phone);
    if (!created) {
      return this.hangUp(MESSAGES.BOOKING_FAILED);
    }

    const { appointment, appointmentId } = created;
    const smsSent = await this.sendConfirmationSms(callSid, appointment, appointmentId);
    this.sessions.delete(callSid);

    const message = `Great! Your appointment has been confirmed. Your appointment ID is ${appointmentId}.`
      + (smsSent ? MESSAGES.SMS_SENT : '')
      + ` Thank you for using ${this.clinicName}'s appointment booking service!`;

    return this.hangUp(message);
  }

  private async storeAppointment(
    callSid: string,
    draft: CompleteAppointmentDraft,
    phone: string
  ): Promise<{ appointment: NewAppointment; appointmentId: string } | null> {
    try {
      const appointment: NewAppointment = {
        patient: draft.patient,
        phone,
        symptoms: draft.symptoms,
        date: normalizeAppointmentDate(draft.date),
        time: normalizeAppointmentTime(draft.time),
        hospitalId: draft.hospitalId,
        latitude: 0,
        longitude: 0,
        alert: [],
      };
      const appointmentId = await this.database.createAppointment(appointment);
      return { appointment, appointmentId };
    } catch (error) {
      loggers.call.error('Error creating appointment', { callSid, ...describeError(error) });
      return null;
    }
  }

  private async sendConfirmationSms(callSid: string, appointment: NewAppointment, appointmentId: string): Promise<boolean> {
    if (!appointment.phone) {
      loggers.call.warn('No patient number for confirmation SMS', { callSid });
      return false;
    }

    try {
      const hospital = await this.database.checkHospitalExists(appointment.hospitalId);
      const hospitalName = hospital?.name ?? `Hospital ${appointment.hospitalId}`;
      await this.telephony.sendSms(
        appointment.phone,
        buildConfirmationSms(this.clinicName, appointment, hospitalName, appointmentId)
      );
      return true;
    } catch (error) {
      loggers.call.error('Confirmation SMS failed', { callSid, ...describeError(error) });
      return false;
    }
  }

  private reprompt(reading: SpeechReading, actionPath: string): string {
    const message = reading.status === 'empty' ? MESSAGES.NO_SPEECH : MESSAGES.LOW_CONFIDENCE;
    return this.telephony.createConversationResponse(message, { actionPath });
  }

  private hangUp(message: string): string {
    return this.telephony.createConversationResponse(message, { gather: false });
  }
}
