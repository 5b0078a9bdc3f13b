/**
 * Database Service
 * Hospital, doctor, appointment and patient lookups against PostgreSQL.
 * Tables use quoted camelCase names ("Appointment"."hospitalId").
 */

import { Pool } from 'pg';
import { z } from 'zod';
import { DatabaseError, getErrorMessage } from '../middleware/error.middleware';
import type { Doctor, Hospital, NewAppointment, PatientProfile } from '../types/appointment.types';
import { DATABASE } from '../utils/constants';
import { loggers } from '../utils/logger';

/**
 * The part of a pg Pool the service uses
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export const createPool = (connectionString: string): SqlClient => {
  const pool = new Pool({
    connectionString,
    max: DATABASE.MAX_CONNECTIONS,
    idleTimeoutMillis: DATABASE.IDLE_TIMEOUT,
    connectionTimeoutMillis: DATABASE.CONNECTION_TIMEOUT,
  });

  // Errors on idle clients are emitted, not thrown
  pool.on('error', (error) => {
    loggers.database.error('Idle client error', { error: error.message });
  });

  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    end: () => pool.end(),
  };
};

// ── Row schemas ───────────────────────────────────────────────────

const hospitalRow = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
});

const doctorRow = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  specialization: z.string(),
  hospitalId: z.coerce.number().int(),
});

const countRow = z.object({
  count: z.coerce.number().int(),
});

const insertedRow = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
});

const profileRow = z.object({
  userId: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
});

export class DatabaseService {
  constructor(private readonly client: SqlClient) {
    loggers.database.info('Database service initialized');
  }

  private async run<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, values: unknown[]): Promise<T[]> {
    let rows: unknown[];
    try {
      ({ rows } = await this.client.query(text, values));
    } catch (error) {
      loggers.database.error(`Error in ${operation}`, { error: getErrorMessage(error) });
      throw new DatabaseError(`Database query failed: ${operation}`);
    }

    const parsed = z.array(schema).safeParse(rows);
    if (!parsed.success) {
      loggers.database.error(`Unexpected row shape in ${operation}`, { issues: parsed.error.issues });
      throw new DatabaseError(`Unexpected result for ${operation}`);
    }
    return parsed.data;
  }

  async checkHospitalExists(hospitalId: number): Promise<Hospital | null> {
    const rows = await this.run(
      'checkHospitalExists',
      hospitalRow,
      'SELECT "id", "name" FROM "Hospital" WHERE "id" = $1',
      [hospitalId]
    );
    return rows[0] ?? null;
  }

  /**
   * Case-insensitive substring match on the doctor's name or specialization.
   */
  async findDoctorByNameOrSpecialty(term: string, hospitalId?: number): Promise<Doctor | null> {
    const pattern = `%${term.toLowerCase()}%`;

    const rows = hospitalId === undefined
      ? await this.run(
        'findDoctorByNameOrSpecialty',
        doctorRow,
        `SELECT "id", "name", "specialization", "hospitalId" FROM "Doctor"
         WHERE LOWER("name") LIKE $1 OR LOWER("specialization") LIKE $1
         LIMIT 1`,
        [pattern]
      )
      : await this.run(
        'findDoctorByNameOrSpecialty',
        doctorRow,
        `SELECT "id", "name", "specialization", "hospitalId" FROM "Doctor"
         WHERE (LOWER("name") LIKE $1 OR LOWER("specialization") LIKE $1) AND "hospitalId" = $2
         LIMIT 1`,
        [pattern, hospitalId]
      );

    return rows[0] ?? null;
  }

  /**
   * A slot is free while it holds fewer than MAX_APPOINTMENTS_PER_SLOT bookings.
   */
  async checkAppointmentAvailability(hospitalId: number, date: string, time: string): Promise<boolean> {
    const [row] = await this.run(
      'checkAppointmentAvailability',
      countRow,
      'SELECT COUNT(*) AS "count" FROM "Appointment" WHERE "hospitalId" = $1 AND "date" = $2 AND "time" = $3',
      [hospitalId, date, time]
    );
    const count = row?.count ?? 0;

    loggers.database.debug('Slot usage', { hospitalId, date, time, count });
    return count < DATABASE.MAX_APPOINTMENTS_PER_SLOT;
  }

  async createAppointment(appointment: NewAppointment): Promise<string> {
    const [row] = await this.run(
      'createAppointment',
      insertedRow,
      `INSERT INTO "Appointment" (
         "patient", "phone", "symptoms", "latitude", "longitude", "date", "time", "hospitalId", "alert"
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING "id"`,
      [
        appointment.patient,
        appointment.phone,
        appointment.symptoms,
        appointment.latitude,
        appointment.longitude,
        appointment.date,
        appointment.time,
        appointment.hospitalId,
        appointment.alert,
      ]
    );

    if (!row) {
      throw new DatabaseError('Appointment insert returned no id');
    }

    loggers.database.info('Created appointment', {
      appointmentId: row.id,
      hospitalId: appointment.hospitalId,
      date: appointment.date,
      time: appointment.time,
    });
    return row.id;
  }

  async findUserByPhone(phone: string): Promise<PatientProfile | null> {
    const rows = await this.run(
      'findUserByPhone',
      profileRow,
      `SELECT mp."userId", u."name" FROM "MedicalProfile" mp
       JOIN "User" u ON mp."userId" = u."id"
       WHERE mp."phone" = $1
       LIMIT 1`,
      [phone]
    );

    const row = rows[0];
    return row ? { id: row.userId, name: row.name } : null;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.query('SELECT 1');
      return true;
    } catch (error) {
      loggers.database.warn('Health check failed', { error: getErrorMessage(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
    loggers.database.info('Database pool closed');
  }
}
