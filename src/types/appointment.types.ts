/**
 * Appointment Type Definitions
 */

import { DATABASE } from '../utils/constants';

export const REQUIRED_FIELDS = ['patient', 'symptoms', 'date', 'time', 'hospitalId'] as const;

export type RequiredField = typeof REQUIRED_FIELDS[number];

/**
 * Appointment fields collected so far during a call
 */
export interface AppointmentDraft {
  patient?: string;
  symptoms?: string;
  date?: string;
  time?: string;
  hospitalId?: number;
  phone?: string;
}

/**
 * Row inserted into "Appointment"
 */
export interface NewAppointment {
  patient: string;
  phone: string;
  symptoms: string;
  date: string; // yyyy-MM-dd
  time: string;
  hospitalId: number;
  latitude: number;
  longitude: number;
  alert: string[];
}

/**
 * Appointment fields as returned by the LLM, null when not mentioned
 */
export interface ExtractedAppointmentData {
  patient: string | null;
  symptoms: string | null;
  date: string | null;
  time: string | null;
  hospitalId: number | null;
}

export interface Hospital {
  id: number;
  name: string;
}

export interface Doctor {
  id: number;
  name: string;
  specialization: string;
  hospitalId: number;
}

export interface PatientProfile {
  id: string;
  name: string;
}

/**
 * Words used when a field is named to the caller
 */
export const FIELD_LABELS: Record<RequiredField, string> = {
  patient: 'name',
  symptoms: 'symptoms',
  date: 'appointment date',
  time: 'appointment time',
  hospitalId: 'hospital ID',
};

export const getMissingFields = (draft: AppointmentDraft): RequiredField[] => {
  return REQUIRED_FIELDS.filter((field) => {
    const value = draft[field];
    return value === undefined || value === '';
  });
};

export type CompleteAppointmentDraft = AppointmentDraft & Required<Pick<AppointmentDraft, RequiredField>>;

export const isCompleteDraft = (draft: AppointmentDraft): draft is CompleteAppointmentDraft => {
  return getMissingFields(draft).length === 0;
};

/**
 * A spoken or extracted number as a hospital ID, or null when no row could
 * carry it.
 */
export const toHospitalId = (value: number): number | null => {
  return Number.isInteger(value) && value >= 1 && value <= DATABASE.MAX_ID ? value : null;
};
