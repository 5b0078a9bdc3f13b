import { beforeEach, describe, expect, it, vi } from 'vitest';
import { WebhookConfig } from '../src/config/webhook-urls.config';
import { ExternalServiceError } from '../src/middleware/error.middleware';
import {
  AppointmentBookingFlow,
  MESSAGES,
  SINGLE_FIELD_PROMPTS,
  buildConfirmationSms,
  mergeExtraction,
  resolvePatientNumber,
  type BookingDatabase,
  type BookingLlm,
} from '../src/services/booking-flow.service';
import { CallSessionStore } from '../src/services/call-session.store';
import { emptyExtraction } from '../src/services/llm.service';
import { TwilioService, type TwilioMessagingClient } from '../src/services/twilio.service';
import type { CompleteAppointmentDraft } from '../src/types/appointment.types';

const CALL_SID = 'CA0001';
const PATIENT_PHONE = '+15551234567';

const completeDraft: CompleteAppointmentDraft = {
  patient: 'Jane Doe',
  symptoms: 'fever',
  date: '2025-06-15',
  time: '10:00 AM',
  hospitalId: 2,
  phone: PATIENT_PHONE,
};

const setup = () => {
  const createCall = vi.fn<TwilioMessagingClient['calls']['create']>().mockResolvedValue({ sid: CALL_SID });
  const createMessage = vi.fn<TwilioMessagingClient['messages']['create']>().mockResolvedValue({ sid: 'SM0001' });
  const telephony = new TwilioService(
    { calls: { create: createCall }, messages: { create: createMessage } },
    '+15550000000',
    new WebhookConfig('https://calls.example.test')
  );

  const llm = {
    extractAppointmentData: vi.fn<BookingLlm['extractAppointmentData']>().mockResolvedValue(emptyExtraction()),
    generateFollowUpQuestion: vi.fn<BookingLlm['generateFollowUpQuestion']>().mockResolvedValue('What else can you tell me?'),
    verifyAppointmentDetails: vi.fn<BookingLlm['verifyAppointmentDetails']>().mockResolvedValue('Shall I book it for Jane Doe?'),
    analyzeUserResponse: vi.fn<BookingLlm['analyzeUserResponse']>().mockResolvedValue('unclear'),
  };

  const database = {
    checkHospitalExists: vi.fn<BookingDatabase['checkHospitalExists']>().mockResolvedValue({ id: 2, name: 'City General' }),
    checkAppointmentAvailability: vi.fn<BookingDatabase['checkAppointmentAvailability']>().mockResolvedValue(true),
    createAppointment: vi.fn<BookingDatabase['createAppointment']>().mockResolvedValue('42'),
    findUserByPhone: vi.fn<BookingDatabase['findUserByPhone']>().mockResolvedValue(null),
  };

  const sessions = new CallSessionStore();
  const flow = new AppointmentBookingFlow({ telephony, llm, database, sessions, clinicName: 'Medicare' });
  const respond = vi.spyOn(telephony, 'createConversationResponse');

  return { flow, llm, database, sessions, respond, createCall, createMessage };
};

describe('resolvePatientNumber', () => {
  it('uses the caller on inbound calls and the dialed number otherwise', () => {
    expect(resolvePatientNumber({ direction: 'inbound', from: '+15551111111', to: '+15550000000' })).toBe('+15551111111');
    expect(resolvePatientNumber({ direction: 'outbound-api', from: '+15550000000', to: '+15552222222' })).toBe('+15552222222');
    expect(resolvePatientNumber({ from: ' ' })).toBeUndefined();
  });
});

describe('mergeExtraction', () => {
  it('fills gaps and only replaces a shorter name', () => {
    const updates = mergeExtraction(
      { patient: 'Jo', date: '2025-01-01' },
      { patient: 'Joanna Smith', symptoms: 'cough', date: '2025-02-02', time: '3 pm', hospitalId: 4 }
    );

    expect(updates).toEqual({ patient: 'Joanna Smith', symptoms: 'cough', time: '3:00 PM', hospitalId: 4 });
  });

  it('keeps a longer name already captured', () => {
    expect(mergeExtraction({ patient: 'Joanna Smith' }, { ...emptyExtraction(), patient: 'Jo' })).toEqual({});
  });
});

describe('buildConfirmationSms', () => {
  it('lists the appointment on separate lines', () => {
    const sms = buildConfirmationSms('Medicare', {
      ...completeDraft,
      phone: PATIENT_PHONE,
      latitude: 0,
      longitude: 0,
      alert: [],
    }, 'City General', '42');

    expect(sms).toBe([
      'Medicare Appointment Confirmation',
      'Patient: Jane Doe',
      'Date: 2025-06-15',
      'Time: 10:00 AM',
      'Hospital: City General',
      'Symptoms: fever',
      'Appointment ID: 42',
    ].join('\n'));
  });
});

describe('AppointmentBookingFlow', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  describe('initiateCall', () => {
    it('dials the normalized number and remembers it', async () => {
      await expect(ctx.flow.initiateCall(' 15551234567 ')).resolves.toBe(CALL_SID);

      expect(ctx.createCall).toHaveBeenCalledWith(expect.objectContaining({
        to: PATIENT_PHONE,
        url: 'https://calls.example.test/api/welcome',
      }));
      expect(ctx.sessions.get(CALL_SID)?.draft).toEqual({ phone: PATIENT_PHONE });
    });

    it('propagates Twilio failures', async () => {
      ctx.createCall.mockRejectedValueOnce(new Error('invalid number'));

      await expect(ctx.flow.initiateCall('+1')).rejects.toBeInstanceOf(ExternalServiceError);
      expect(ctx.sessions.size()).toBe(0);
    });
  });

  describe('welcome', () => {
    const params = { callSid: CALL_SID, to: PATIENT_PHONE, from: '+15550000000', direction: 'outbound-api' };

    it('greets the caller and prefills a known patient', async () => {
      ctx.database.findUserByPhone.mockResolvedValueOnce({ id: '7', name: 'Jane Doe' });

      const xml = await ctx.flow.welcome(params);

      expect(xml).toContain("This is Medicare's appointment booking system.");
      expect(ctx.database.findUserByPhone).toHaveBeenCalledWith(PATIENT_PHONE);
      expect(ctx.sessions.get(CALL_SID)?.draft).toEqual({ phone: PATIENT_PHONE, patient: 'Jane Doe' });
    });

    it('still greets when the patient lookup fails', async () => {
      ctx.database.findUserByPhone.mockRejectedValueOnce(new Error('db down'));

      const xml = await ctx.flow.welcome(params);

      expect(xml).toContain('<Gather');
      expect(ctx.sessions.get(CALL_SID)?.draft).toEqual({ phone: PATIENT_PHONE });
    });
  });

  describe('conversationTurn', () => {
    it('asks again when no speech was recognized', async () => {
      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: '' });

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.NO_SPEECH, { actionPath: '/api/conversation' });
      expect(ctx.llm.extractAppointmentData).not.toHaveBeenCalled();
    });

    it('asks again on low confidence', async () => {
      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'mumble', confidence: '0.1' });

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.LOW_CONFIDENCE, { actionPath: '/api/conversation' });
    });

    it('uses the fixed prompt when one field is missing', async () => {
      const speech = 'My name is Alex Morgan, hospital ID 1, date 2025-06-15, time 10:00 AM';

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: speech, confidence: '0.95' });

      const session = ctx.sessions.get(CALL_SID);
      expect(session?.draft).toEqual({ patient: 'Alex Morgan', hospitalId: 1, date: '2025-06-15', time: '10:00 AM' });
      expect(session?.history).toEqual([
        { role: 'user', content: speech },
        { role: 'assistant', content: SINGLE_FIELD_PROMPTS.symptoms },
      ]);
      expect(ctx.llm.extractAppointmentData.mock.calls[0][0]).toBe(speech);
      expect(ctx.llm.generateFollowUpQuestion).not.toHaveBeenCalled();
      expect(ctx.respond).toHaveBeenCalledWith(SINGLE_FIELD_PROMPTS.symptoms);
    });

    it('asks the LLM for a follow-up when several fields are missing', async () => {
      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I need an appointment' });

      expect(ctx.llm.generateFollowUpQuestion).toHaveBeenCalledWith({}, ['patient', 'symptoms', 'date', 'time', 'hospitalId']);
      expect(ctx.respond).toHaveBeenCalledWith('What else can you tell me?');
    });

    it('reads the appointment back once every field is known', async () => {
      ctx.llm.extractAppointmentData.mockResolvedValueOnce({
        patient: 'Jane Doe',
        symptoms: 'fever',
        date: 'June 15, 2025',
        time: '10 am',
        hospitalId: 2,
      });

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I want to book an appointment' });

      expect(ctx.database.checkHospitalExists).toHaveBeenCalledWith(2);
      expect(ctx.database.checkAppointmentAvailability).toHaveBeenCalledWith(2, '2025-06-15', '10:00 AM');
      expect(ctx.llm.verifyAppointmentDetails).toHaveBeenCalledWith({
        patient: 'Jane Doe',
        symptoms: 'fever',
        date: '2025-06-15',
        time: '10:00 AM',
        hospitalId: 2,
      }, 'City General');
      expect(ctx.respond).toHaveBeenCalledWith('Shall I book it for Jane Doe?', { actionPath: '/api/confirm_appointment' });
      expect(ctx.sessions.get(CALL_SID)?.awaitingConfirmation).toBe(true);
    });

    it('drops an unknown hospital ID', async () => {
      ctx.llm.extractAppointmentData.mockResolvedValueOnce({ ...completeDraft, hospitalId: 9 });
      ctx.database.checkHospitalExists.mockResolvedValueOnce(null);

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I want to book an appointment' });

      expect(ctx.respond).toHaveBeenCalledWith(
        "I'm sorry, the hospital with ID 9 doesn't exist in our system. Please say a different hospital ID."
      );
      expect(ctx.sessions.get(CALL_SID)?.draft.hospitalId).toBeUndefined();
    });

    it('does not take a phone number for the hospital ID', async () => {
      ctx.sessions.mergeDraft(CALL_SID, { patient: 'Jane Doe', symptoms: 'fever', date: '2025-06-15', time: '10:00 AM' });

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'You can reach me on number 5551234567' });

      expect(ctx.sessions.get(CALL_SID)?.draft.hospitalId).toBeUndefined();
      expect(ctx.database.checkHospitalExists).not.toHaveBeenCalled();
      expect(ctx.respond).toHaveBeenCalledWith(SINGLE_FIELD_PROMPTS.hospitalId);
    });

    it('drops a date it cannot read', async () => {
      ctx.llm.extractAppointmentData.mockResolvedValueOnce({ ...completeDraft, date: 'someday' });

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I want to book an appointment' });

      expect(ctx.respond).toHaveBeenCalledWith(
        "I'm sorry, I couldn't understand the date someday. Please say the date again, for example 2025-06-15."
      );
      expect(ctx.sessions.get(CALL_SID)?.draft.date).toBeUndefined();
    });

    it('drops a fully booked time', async () => {
      ctx.llm.extractAppointmentData.mockResolvedValueOnce({ ...completeDraft });
      ctx.database.checkAppointmentAvailability.mockResolvedValueOnce(false);

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I want to book an appointment' });

      expect(ctx.respond).toHaveBeenCalledWith(
        "I'm sorry, but the time slot at 10:00 AM on 2025-06-15 is fully booked. Please suggest a different time."
      );
      expect(ctx.sessions.get(CALL_SID)?.draft.time).toBeUndefined();
    });

    it('apologizes when the turn fails', async () => {
      ctx.llm.extractAppointmentData.mockRejectedValueOnce(new Error('boom'));

      await ctx.flow.conversationTurn({ callSid: CALL_SID, speechResult: 'I want to book an appointment' });

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.NOT_UNDERSTOOD);
    });
  });

  describe('confirmAppointment', () => {
    const answer = (speechResult: string) => ({ callSid: CALL_SID, speechResult, confidence: '0.9' });

    beforeEach(() => {
      ctx.sessions.mergeDraft(CALL_SID, completeDraft);
      ctx.sessions.setAwaitingConfirmation(CALL_SID, true);
    });

    it('starts over when the appointment details are gone', async () => {
      ctx.sessions.delete(CALL_SID);

      await ctx.flow.confirmAppointment(answer('yes'));

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.LOST_INFORMATION);
      expect(ctx.llm.analyzeUserResponse).not.toHaveBeenCalled();
    });

    it('starts over when no read-back is awaiting an answer', async () => {
      ctx.sessions.setAwaitingConfirmation(CALL_SID, false);

      await ctx.flow.confirmAppointment(answer('yes'));

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.LOST_INFORMATION);
      expect(ctx.llm.analyzeUserResponse).not.toHaveBeenCalled();
      expect(ctx.database.createAppointment).not.toHaveBeenCalled();
    });

    it('asks again on low confidence', async () => {
      await ctx.flow.confirmAppointment({ callSid: CALL_SID, speechResult: 'yes', confidence: '0.2' });

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.LOW_CONFIDENCE, { actionPath: '/api/confirm_appointment' });
    });

    it('books the appointment and texts the details', async () => {
      ctx.llm.analyzeUserResponse.mockResolvedValueOnce('confirm');

      await ctx.flow.confirmAppointment(answer('yes'));

      expect(ctx.database.createAppointment).toHaveBeenCalledWith({
        patient: 'Jane Doe',
        phone: PATIENT_PHONE,
        symptoms: 'fever',
        date: '2025-06-15',
        time: '10:00 AM',
        hospitalId: 2,
        latitude: 0,
        longitude: 0,
        alert: [],
      });
      expect(ctx.createMessage).toHaveBeenCalledWith({
        to: PATIENT_PHONE,
        from: '+15550000000',
        body: 'Medicare Appointment Confirmation\nPatient: Jane Doe\nDate: 2025-06-15\nTime: 10:00 AM\nHospital: City General\nSymptoms: fever\nAppointment ID: 42',
      });
      expect(ctx.respond).toHaveBeenCalledWith(
        "Great! Your appointment has been confirmed. Your appointment ID is 42. I've also sent you a text message with the details. Thank you for using Medicare's appointment booking service!",
        { gather: false }
      );
      expect(ctx.sessions.get(CALL_SID)).toBeUndefined();
    });

    it('confirms without the SMS note when the text fails', async () => {
      ctx.llm.analyzeUserResponse.mockResolvedValueOnce('confirm');
      ctx.createMessage.mockRejectedValueOnce(new Error('unreachable'));

      await ctx.flow.confirmAppointment(answer('yes'));

      expect(ctx.respond).toHaveBeenCalledWith(
        "Great! Your appointment has been confirmed. Your appointment ID is 42. Thank you for using Medicare's appointment booking service!",
        { gather: false }
      );
    });

    it('hangs up with an apology when the insert fails', async () => {
      ctx.llm.analyzeUserResponse.mockResolvedValueOnce('confirm');
      ctx.database.createAppointment.mockRejectedValueOnce(new Error('insert failed'));

      await ctx.flow.confirmAppointment(answer('yes'));

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.BOOKING_FAILED, { gather: false });
      expect(ctx.createMessage).not.toHaveBeenCalled();
    });

    it('goes back to collecting details on a correction', async () => {
      ctx.llm.analyzeUserResponse.mockResolvedValueOnce('correct');

      await ctx.flow.confirmAppointment(answer('no, change the time'));

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.CORRECTION);
      expect(ctx.sessions.get(CALL_SID)?.awaitingConfirmation).toBe(false);
    });

    it('cancels and forgets the call', async () => {
      ctx.llm.analyzeUserResponse.mockResolvedValueOnce('cancel');

      await ctx.flow.confirmAppointment(answer('cancel it'));

      expect(ctx.respond).toHaveBeenCalledWith(
        'I understand you want to cancel. Your appointment has not been booked. Thank you for calling Medicare.',
        { gather: false }
      );
      expect(ctx.sessions.get(CALL_SID)).toBeUndefined();
    });

    it('repeats the options on an unclear answer', async () => {
      await ctx.flow.confirmAppointment(answer('what?'));

      expect(ctx.respond).toHaveBeenCalledWith(MESSAGES.UNCLEAR_CONFIRMATION, { actionPath: '/api/confirm_appointment' });
    });
  });

  describe('callStatus', () => {
    it('clears the session only when the call has ended', () => {
      ctx.sessions.getOrCreate(CALL_SID);

      ctx.flow.callStatus(CALL_SID, 'in-progress');
      expect(ctx.sessions.get(CALL_SID)).toBeDefined();

      ctx.flow.callStatus(CALL_SID, 'completed');
      expect(ctx.sessions.get(CALL_SID)).toBeUndefined();
    });
  });
});
