/**
 * In-memory conversation state, keyed by Twilio CallSid.
 * State is lost on restart; calls in progress at that point start over.
 */

import type { AppointmentDraft, RequiredField } from '../types/appointment.types';
import type { CallSession, ConversationMessage } from '../types/call.types';
import { CALL } from '../utils/constants';

export class CallSessionStore {
  private sessions: Map<string, CallSession> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  get(callSid: string): CallSession | undefined {
    return this.sessions.get(callSid);
  }

  getOrCreate(callSid: string): CallSession {
    const existing = this.sessions.get(callSid);
    if (existing) return existing;

    const timestamp = this.now();
    const session: CallSession = {
      callSid,
      history: [],
      draft: {},
      awaitingConfirmation: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(callSid, session);
    return session;
  }

  delete(callSid: string): boolean {
    return this.sessions.delete(callSid);
  }

  appendMessage(callSid: string, message: ConversationMessage): CallSession {
    const session = this.getOrCreate(callSid);
    session.history.push(message);
    return this.touch(session);
  }

  mergeDraft(callSid: string, fields: Partial<AppointmentDraft>): CallSession {
    const session = this.getOrCreate(callSid);
    session.draft = { ...session.draft, ...fields };
    return this.touch(session);
  }

  removeFields(callSid: string, fields: RequiredField[]): CallSession {
    const session = this.getOrCreate(callSid);
    const draft = { ...session.draft };
    for (const field of fields) {
      delete draft[field];
    }
    session.draft = draft;
    return this.touch(session);
  }

  setAwaitingConfirmation(callSid: string, awaiting: boolean): CallSession {
    const session = this.getOrCreate(callSid);
    session.awaitingConfirmation = awaiting;
    return this.touch(session);
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Drop sessions idle for longer than maxAgeMs. Returns how many were removed.
   */
  sweep(maxAgeMs: number = CALL.SESSION_MAX_AGE_MS, now: number = this.now()): number {
    let removed = 0;
    for (const [callSid, session] of this.sessions) {
      if (now - session.updatedAt > maxAgeMs) {
        this.sessions.delete(callSid);
        removed++;
      }
    }
    return removed;
  }

  private touch(session: CallSession): CallSession {
    session.updatedAt = this.now();
    return session;
  }
}
