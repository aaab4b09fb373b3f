import { PoolClient } from 'pg';
import { z } from 'zod';
import { query, withClientTransaction } from '../../config/database';
import { Appointment, AppointmentChanges, NewAppointment, WeekRange } from '../../types/appointment';
import { ConstraintViolationError } from '../../utils/errors';
import { AppointmentStore, AppointmentTransaction } from './appointment.store';

const UNIQUE_VIOLATION = '23505';

const uuidSchema = z.string().uuid();

// The id column is a uuid; Postgres rejects any other literal with 22P02
function isUuid(id: string): boolean {
  return uuidSchema.safeParse(id).success;
}

const UPDATABLE_COLUMNS = ['start_time', 'name', 'email', 'phone', 'reason', 'status', 'cancelled_at'] as const;

function toStoreError(error: unknown): unknown {
  if (error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION) {
    const constraint = 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined;
    return new ConstraintViolationError(constraint, error);
  }
  return error;
}

class PostgresAppointmentTransaction implements AppointmentTransaction {
  constructor(private client: PoolClient) {}

  async getAppointmentForUpdate(id: string): Promise<Appointment | null> {
    if (!isUuid(id)) return null;
    const result = await this.client.query<Appointment>(
      'SELECT * FROM appointments WHERE id = $1 FOR UPDATE',
      [id]
    );
    return result.rows[0] || null;
  }

  async findSlotOccupant(startTime: Date, excludeId?: string): Promise<string | null> {
    const result = await this.client.query<{ id: string }>(
      `SELECT id FROM appointments
       WHERE start_time = $1 AND status = 'active' AND ($2::uuid IS NULL OR id <> $2::uuid)
       LIMIT 1
       FOR UPDATE`,
      [startTime, excludeId !== undefined && isUuid(excludeId) ? excludeId : null]
    );
    return result.rows[0]?.id ?? null;
  }

  async insertAppointment(fields: NewAppointment): Promise<Appointment> {
    try {
      const result = await this.client.query<Appointment>(
        `INSERT INTO appointments (id, start_time, name, email, phone, reason, status)
         VALUES ($1, $2, $3, $4, $5, $6, 'active')
         RETURNING *`,
        [fields.id, fields.start_time, fields.name, fields.email, fields.phone, fields.reason]
      );
      return result.rows[0];
    } catch (error) {
      throw toStoreError(error);
    }
  }

  async updateAppointment(id: string, changes: AppointmentChanges, expectedVersion?: number): Promise<Appointment | null> {
    if (!isUuid(id)) return null;

    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value === undefined) continue;
      params.push(value);
      assignments.push(`${column} = $${params.length}`);
    }

    params.push(id);
    let sql = `UPDATE appointments
       SET ${[...assignments, 'version = version + 1', 'updated_at = NOW()'].join(', ')}
       WHERE id = $${params.length}`;

    if (expectedVersion !== undefined) {
      params.push(expectedVersion);
      sql += ` AND version = $${params.length}`;
    }

    try {
      const result = await this.client.query<Appointment>(`${sql} RETURNING *`, params);
      return result.rows[0] || null;
    } catch (error) {
      throw toStoreError(error);
    }
  }
}

export class PostgresAppointmentStore implements AppointmentStore {
  async findOccupiedSlots(range: WeekRange): Promise<Date[]> {
    const result = await query<{ start_time: Date }>(
      `SELECT start_time FROM appointments
       WHERE status = 'active' AND start_time >= $1 AND start_time < $2
       ORDER BY start_time`,
      [range.start, range.end]
    );
    return result.rows.map((row) => row.start_time);
  }

  async listAppointments(range: WeekRange): Promise<Appointment[]> {
    const result = await query<Appointment>(
      `SELECT * FROM appointments
       WHERE status = 'active' AND start_time >= $1 AND start_time < $2
       ORDER BY start_time`,
      [range.start, range.end]
    );
    return result.rows;
  }

  async getAppointment(id: string): Promise<Appointment | null> {
    if (!isUuid(id)) return null;
    const result = await query<Appointment>('SELECT * FROM appointments WHERE id = $1', [id]);
    return result.rows[0] || null;
  }

  withTransaction<T>(fn: (tx: AppointmentTransaction) => Promise<T>): Promise<T> {
    return withClientTransaction((client) => fn(new PostgresAppointmentTransaction(client)));
  }
}
