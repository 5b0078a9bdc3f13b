/**
 * LLM Service
 * Groq chat completions through the OpenAI SDK (Groq exposes an
 * OpenAI-compatible endpoint). Used for field extraction, follow-up questions,
 * the confirmation read-back and classifying the caller's answer.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { AppointmentDraft, ExtractedAppointmentData, RequiredField } from '../types/appointment.types';
import { FIELD_LABELS, toHospitalId } from '../types/appointment.types';
import type { ConfirmationIntent, ConversationMessage } from '../types/call.types';
import { LLM } from '../utils/constants';
import { describeError, loggers } from '../utils/logger';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  top_p: number;
}

/**
 * The part of a chat completion API the service needs
 */
export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<string | null>;
}

export interface GroqClientOptions {
  apiKey: string;
  baseUrl?: string;
}

export const createGroqClient = (options: GroqClientOptions): ChatCompletionClient => {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl ?? LLM.DEFAULT_BASE_URL,
  });

  return {
    async complete(request) {
      const completion = await openai.chat.completions.create({ ...request, stream: false });
      return completion.choices[0]?.message.content ?? null;
    },
  };
};

// ── Prompts ───────────────────────────────────────────────────────

const EXTRACTION_PROMPT = `You are an AI assistant for a healthcare appointment booking system.
Extract ONLY the following information from the user's input and conversation history:
- patient: The patient's full name (only the person's name, no titles or descriptions)
- symptoms: The reason for the appointment or symptoms
- date: The appointment date (in format YYYY-MM-DD)
- time: The appointment time (e.g., "10:00 AM")
- hospitalId: The ID of the hospital as an integer number

IMPORTANT INSTRUCTIONS:
1. Respond in JSON format with these fields. Use null for missing fields.
2. For hospitalId, extract ONLY the numeric ID value. Return it as a number, not a string.
3. For patient name, extract ONLY the person's name. Do not include words like "calling" or "speaking".
4. If you're uncertain about any field, set it to null rather than guessing.
5. Do NOT extract any other fields. The phone number is captured automatically.
6. For date, convert any date format to YYYY-MM-DD.
7. For time, standardize to a format like "10:00 AM" or "2:30 PM".

EXAMPLES:
Input: "My name is Jane Doe, I need an appointment for hospital 3 on 2025-05-15 at 10:00 AM for headache"
Output: {"patient": "Jane Doe", "hospitalId": 3, "date": "2025-05-15", "time": "10:00 AM", "symptoms": "headache"}

Input: "I'm Sam Lee calling"
Output: {"patient": "Sam Lee", "hospitalId": null, "date": null, "time": null, "symptoms": null}

Input: "hospital id is 5"
Output: {"patient": null, "hospitalId": 5, "date": null, "time": null, "symptoms": null}`;

const FOLLOW_UP_PROMPT = `You are an AI assistant for a healthcare appointment booking system.
Generate a natural, conversational follow-up question to gather missing information.
Your response should be friendly and direct, asking for specific missing information.
Focus ONLY on these fields: patient name, symptoms, date, time, or hospital ID.
For the hospital, ask directly for the numerical ID, not the hospital name.
Reply with the question only.`;

const CONFIRMATION_PROMPT = `You are an AI assistant for a healthcare appointment booking system.
Generate a detailed confirmation message that summarizes all appointment details.
Confirm the patient's name, symptoms, date, time, and hospital name.
Be conversational but clear, and ask the patient to confirm.
Reply with the message only.`;

const INTENT_PROMPT = `You are an AI assistant for a healthcare appointment booking system.
Analyze the user's response to determine if they are confirming, correcting, or canceling.
Respond with a JSON object that includes a 'response_type' field with one of these values:
- 'confirm' if the user is confirming the appointment
- 'correct' if the user wants to make corrections
- 'cancel' if the user wants to cancel
- 'unclear' if the user's intent is unclear`;

// ── Response parsing ──────────────────────────────────────────────

const jsonObjectSchema = z.record(z.unknown());
const intentSchema = z.object({
  response_type: z.enum(['confirm', 'correct', 'cancel', 'unclear']),
});

const NULL_LITERALS = new Set(['', 'null', 'NULL', 'None']);

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * First JSON object in a completion: the whole text, or the outermost
 * `{...}` block inside prose or a code fence.
 */
export const parseJsonObject = (text: string | null): Record<string, unknown> | null => {
  if (!text) return null;

  const candidates = [text.trim()];
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = jsonObjectSchema.safeParse(tryParseJson(candidate));
    if (parsed.success) return parsed.data;
  }
  return null;
};

const cleanText = (value: unknown): string | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  return NULL_LITERALS.has(trimmed) ? null : trimmed;
};

const cleanHospitalId = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? toHospitalId(Math.trunc(value)) : null;
  }
  if (typeof value === 'string') {
    const digits = /\d+/.exec(value);
    return digits ? toHospitalId(Number.parseInt(digits[0], 10)) : null;
  }
  return null;
};

export const emptyExtraction = (): ExtractedAppointmentData => ({
  patient: null,
  symptoms: null,
  date: null,
  time: null,
  hospitalId: null,
});

const toExtraction = (data: Record<string, unknown>): ExtractedAppointmentData => ({
  patient: cleanText(data.patient),
  symptoms: cleanText(data.symptoms),
  date: cleanText(data.date),
  time: cleanText(data.time),
  hospitalId: cleanHospitalId(data.hospitalId ?? data.hospital_id),
});

/**
 * Best effort for completions that ignored the JSON instruction.
 */
const scrapeExtraction = (text: string): ExtractedAppointmentData => {
  const result = emptyExtraction();

  const patient = /patient["\s:]+([^",\n]+)/i.exec(text);
  if (patient) result.patient = cleanText(patient[1]);

  const hospital = /hospital[_\s]*id["\s:]+(\d+)/i.exec(text);
  if (hospital) result.hospitalId = toHospitalId(Number.parseInt(hospital[1], 10));

  return result;
};

const CANCEL_WORDS = /\b(cancel|stop|never ?mind|don't book|do not book)\b/;
const CORRECT_WORDS = /\b(no|nope|change|wrong|incorrect|not (?:right|correct)|update|fix)\b/;
const CONFIRM_WORDS = /\b(yes|yeah|yep|confirm|correct|right|sure|okay|ok|sounds good)\b/;

/**
 * Keyword classification used when the LLM gives no usable answer.
 */
export const classifyByKeywords = (input: string): ConfirmationIntent => {
  const text = input.toLowerCase();
  if (CANCEL_WORDS.test(text)) return 'cancel';
  if (CORRECT_WORDS.test(text)) return 'correct';
  if (CONFIRM_WORDS.test(text)) return 'confirm';
  return 'unclear';
};

const formatList = (items: string[]): string => {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
};

// ── Service ───────────────────────────────────────────────────────

export class LlmService {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string = LLM.DEFAULT_MODEL
  ) {
    loggers.llm.info('LLM service initialized', { model });
  }

  /**
   * One completion; failures are logged and yield null.
   */
  async callLlm(messages: ChatMessage[], systemPrompt?: string): Promise<string | null> {
    const fullMessages: ChatMessage[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...messages]
      : messages;

    try {
      return await this.client.complete({
        model: this.model,
        messages: fullMessages,
        temperature: LLM.TEMPERATURE,
        max_tokens: LLM.MAX_TOKENS,
        top_p: LLM.TOP_P,
      });
    } catch (error) {
      loggers.llm.error('Error calling LLM', describeError(error));
      return null;
    }
  }

  /**
   * Ask twice and let the second answer fill fields the first left null.
   */
  async extractAppointmentData(
    userInput: string,
    history: ConversationMessage[]
  ): Promise<ExtractedAppointmentData> {
    const transcript = history.map((message) => `${message.role}: ${message.content}`).join('\n');
    const messages: ChatMessage[] = [{
      role: 'user',
      content: `Conversation history:\n${transcript}\n\nCurrent input: ${userInput}\n\nExtract the appointment information from the above conversation.`,
    }];

    const [first, second] = await Promise.all([
      this.callLlm(messages, EXTRACTION_PROMPT),
      this.callLlm(messages, EXTRACTION_PROMPT),
    ]);

    loggers.llm.debug('Extraction responses', { first, second });

    const primary = parseJsonObject(first);
    if (!primary) {
      if (first) {
        loggers.llm.warn('Extraction response was not JSON', { response: first });
        return scrapeExtraction(first);
      }
      return emptyExtraction();
    }

    const result = toExtraction(primary);
    const secondary = parseJsonObject(second);
    if (!secondary) return result;

    const backup = toExtraction(secondary);
    return {
      patient: result.patient ?? backup.patient,
      symptoms: result.symptoms ?? backup.symptoms,
      date: result.date ?? backup.date,
      time: result.time ?? backup.time,
      hospitalId: result.hospitalId ?? backup.hospitalId,
    };
  }

  async generateFollowUpQuestion(draft: AppointmentDraft, missing: RequiredField[]): Promise<string> {
    const labels = missing.map((field) => FIELD_LABELS[field]);
    const response = await this.callLlm([{
      role: 'user',
      content: `I need a follow-up question for a patient booking an appointment. Here's what I know so far: ${JSON.stringify(draft)}. The missing information is: ${labels.join(', ')}.`,
    }], FOLLOW_UP_PROMPT);

    return response?.trim() || `I still need your ${formatList(labels)}. Please provide this information.`;
  }

  async verifyAppointmentDetails(draft: AppointmentDraft, hospitalName: string): Promise<string> {
    const response = await this.callLlm([{
      role: 'user',
      content: `I need a confirmation message for a patient booking an appointment. Here are the appointment details: ${JSON.stringify({ ...draft, hospitalName })}.`,
    }], CONFIRMATION_PROMPT);

    return response?.trim()
      || `I'd like to confirm your appointment for ${draft.patient ?? 'you'} at ${hospitalName} on ${draft.date ?? 'the specified date'} at ${draft.time ?? 'the specified time'} for ${draft.symptoms ?? 'your health concern'}. Is this correct?`;
  }

  async analyzeUserResponse(input: string): Promise<ConfirmationIntent> {
    const response = await this.callLlm([{
      role: 'user',
      content: `Analyze this response to an appointment confirmation: '${input}'`,
    }], INTENT_PROMPT);

    const parsed = intentSchema.safeParse(parseJsonObject(response));
    if (parsed.success) {
      return parsed.data.response_type;
    }

    const intent = classifyByKeywords(input);
    loggers.llm.debug('Intent from keywords', { intent, response });
    return intent;
  }
}
