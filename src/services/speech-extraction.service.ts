/**
 * Speech Extraction Service
 * Pattern-based capture of appointment fields from a single utterance. Runs
 * before the LLM so clearly spoken values never depend on a completion.
 */

import { toHospitalId, type AppointmentDraft } from '../types/appointment.types';
import { normalizeAppointmentTime } from '../utils/date-utils';
import { loggers } from '../utils/logger';

const NAME_PATTERNS = [
  /(?:my name is|this is|i am|i'm|name is) ([a-z\s]+)/,
  /([a-z\s]+) (?:is my name)/,
  /patient(?:'s)? name (?:is )?([a-z\s]+)/,
];

// A name ends at the first of these
const NAME_STOP_WORDS = new Set([
  'calling', 'here', 'speaking', 'and', 'the', 'to', 'for', 'with', 'my', 'i', 'from', 'about',
  'a', 'an', 'at', 'on', 'hospital', 'id', 'symptoms', 'date', 'time', 'suffering', 'having',
  'looking', 'trying', 'booking', 'not',
]);

const NON_NAME_KEYWORDS = ['hospital', 'symptom', 'date', 'time', 'appointment', 'book'];

const HOSPITAL_ID_PATTERNS = [
  /hospital (?:id|number|#)?\s*(?:is)?\s*(\d+)/,
  /hospital(?:id)? (\d+)/,
  /(?:id|number) (\d+)/,
  /the number (\d+)/,
];

const MONTH = '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:tember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const DATE_PATTERNS = [
  /(20\d\d-\d{1,2}-\d{1,2})/,
  /(\d{1,2}[/-]\d{1,2}[/-]20\d\d)/,
  new RegExp(`\\b(${MONTH} \\d{1,2}(?:st|nd|rd|th)?,? 20\\d\\d)`),
];

const TIME_PATTERNS = [
  /(\d{1,2}(?::\d{2})?\s*(?:a\.m\.|p\.m\.|am|pm))(?![a-z])/,
  /(\d{1,2}(?::\d{2})?\s*in the (?:morning|afternoon|evening))/,
  /(\d{1,2} (?:o'clock|oclock))/,
];

const SYMPTOM_MARKERS = ['symptom', 'problem', 'issue', 'reason', 'suffering', 'pain', 'appointment for'];

const SYMPTOM_END = '(?:\\.|$|date|time|hospital)';
const SYMPTOM_PATTERNS = [
  'symptoms? (?:is|are) ',
  'problems? (?:is|are) ',
  'suffering from ',
  'reason (?:is|for) ',
  'issue (?:is|with) ',
  'appointment for ',
  'i have (?:a|an) ',
].map((lead) => new RegExp(`${lead}(.+?)${SYMPTOM_END}`));

const COMMON_PHRASES = [
  'my name is', 'this is', 'i am', "i'm", 'name is', 'hospital id', 'date is', 'time is',
  'i need', 'i want', 'to book', 'an appointment', 'appointment for',
];

// Field labels left over once their values are removed
const LEFTOVER_WORDS = new Set(['date', 'time', 'hospital', 'id', 'symptom', 'symptoms']);

const titleCase = (text: string): string => text
  .split(/\s+/)
  .filter(Boolean)
  .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
  .join(' ');

const firstMatch = (text: string, patterns: RegExp[]): string | null => {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[1].trim();
  }
  return null;
};

/**
 * Patient name from phrases like "my name is ..." or "... is my name".
 */
export const extractPatientName = (speech: string): string | null => {
  const text = speech.toLowerCase();

  for (const pattern of NAME_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const words: string[] = [];
    for (const word of match[1].split(/\s+/).filter(Boolean)) {
      if (NAME_STOP_WORDS.has(word)) break;
      words.push(word);
    }
    if (words.length > 0) {
      return titleCase(words.join(' '));
    }
  }

  return null;
};

/**
 * A short reply made only of letters ("John Smith") is taken as a name.
 */
export const extractBareName = (speech: string): string | null => {
  const text = speech.trim().toLowerCase();
  const words = text.split(/\s+/).filter(Boolean);

  if (words.length === 0 || words.length > 4) return null;
  if (!words.every((word) => /^[a-z]+$/.test(word))) return null;
  if (NON_NAME_KEYWORDS.some((keyword) => text.includes(keyword))) return null;

  return titleCase(text);
};

export const extractHospitalId = (speech: string): number | null => {
  const raw = firstMatch(speech.toLowerCase(), HOSPITAL_ID_PATTERNS);
  if (raw === null) return null;

  return toHospitalId(Number.parseInt(raw, 10));
};

/**
 * Date as spoken; normalization happens when the appointment is checked.
 */
export const extractDate = (speech: string): string | null => {
  return firstMatch(speech.toLowerCase(), DATE_PATTERNS);
};

/**
 * Time as spoken, e.g. "10 am" or "3 in the afternoon".
 */
export const extractTime = (speech: string): string | null => {
  return firstMatch(speech.toLowerCase(), TIME_PATTERNS);
};

export const extractSymptoms = (speech: string): string | null => {
  const text = speech.toLowerCase();
  if (!SYMPTOM_MARKERS.some((marker) => text.includes(marker))) return null;

  const raw = firstMatch(text, SYMPTOM_PATTERNS);
  if (raw === null) return null;

  const symptoms = raw.replace(/[\s,;]+$/, '');
  return symptoms.length > 0 ? symptoms : null;
};

/**
 * Whatever is left of the utterance once the known values and stock phrases
 * are removed, when more than three characters remain.
 */
export const extractRemainingSymptoms = (
  speech: string,
  draft: AppointmentDraft,
  spokenValues: string[] = []
): string | null => {
  const removals: string[] = [];

  if (draft.patient) {
    removals.push(...draft.patient.toLowerCase().split(/\s+/).filter(Boolean));
  }
  if (draft.hospitalId !== undefined) {
    removals.push(`hospital id ${draft.hospitalId}`, `hospital ${draft.hospitalId}`);
  }
  if (draft.date) removals.push(draft.date.toLowerCase());
  if (draft.time) removals.push(draft.time.toLowerCase());
  removals.push(...spokenValues.map((value) => value.toLowerCase()));
  removals.push(...COMMON_PHRASES);

  let remaining = speech.toLowerCase();
  for (const phrase of removals) {
    remaining = remaining.split(phrase).join(' ');
  }

  remaining = remaining
    .replace(/[,.!?]/g, ' ')
    .split(/\s+/)
    .filter((word) => word && !LEFTOVER_WORDS.has(word))
    .join(' ');
  if (remaining.length <= 3) return null;

  return remaining.charAt(0).toUpperCase() + remaining.slice(1);
};

/**
 * Run every pattern over the utterance and return only the fields it newly
 * supplies. Values already in the draft are replaced when the caller states
 * them again.
 */
export const captureFromSpeech = (speech: string, draft: AppointmentDraft = {}): Partial<AppointmentDraft> => {
  const captured: Partial<AppointmentDraft> = {};
  const spokenValues: string[] = [];

  const patient = extractPatientName(speech) ?? (draft.patient ? null : extractBareName(speech));
  if (patient) captured.patient = patient;

  const hospitalId = extractHospitalId(speech);
  if (hospitalId !== null) captured.hospitalId = hospitalId;

  const date = extractDate(speech);
  if (date) {
    captured.date = date;
    spokenValues.push(date);
  }

  const time = extractTime(speech);
  if (time) {
    captured.time = normalizeAppointmentTime(time);
    spokenValues.push(time);
  }

  const symptoms = extractSymptoms(speech);
  if (symptoms) {
    captured.symptoms = symptoms;
  } else {
    const merged: AppointmentDraft = { ...draft, ...captured };
    const complete = Boolean(merged.patient && merged.date && merged.time) && merged.hospitalId !== undefined;
    if (complete && !merged.symptoms) {
      const remaining = extractRemainingSymptoms(speech, merged, spokenValues);
      if (remaining) captured.symptoms = remaining;
    }
  }

  if (Object.keys(captured).length > 0) {
    loggers.call.debug('Direct capture', { captured });
  }

  return captured;
};
