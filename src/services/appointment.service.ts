import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { TimeGrid } from './scheduling/timeGrid';
import { SlotValidator } from './scheduling/slotValidator';
import { ConflictGuard } from './scheduling/conflictGuard';
import { AppointmentStore } from './store/appointment.store';
import { assertValidPage, buildPageInfo } from './availability.service';
import {
  Appointment,
  AppointmentChanges,
  CreateAppointmentInput,
  NewAppointment,
  UpdateAppointmentInput,
  WeekAppointments,
} from '../types/appointment';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const REASON_MAX_LENGTH = 200;
export const PHONE_MAX_LENGTH = 50;

const emailSchema = z.string().email();

function requireText(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} cannot be blank.`);
  }
  return trimmed;
}

function normalizeEmail(value: string): string {
  const email = requireText(value, 'Email');
  if (!emailSchema.safeParse(email).success) {
    throw new ValidationError('Enter a valid email address.');
  }
  return email;
}

function normalizeReason(value: string): string {
  const reason = value.trim();
  if (reason.length > REASON_MAX_LENGTH) {
    throw new ValidationError(`Reason cannot exceed ${REASON_MAX_LENGTH} characters.`);
  }
  return reason;
}

function normalizePhone(value: string): string {
  const phone = value.trim();
  if (phone.length > PHONE_MAX_LENGTH) {
    throw new ValidationError(`Phone cannot exceed ${PHONE_MAX_LENGTH} characters.`);
  }
  return phone;
}

function assertValidDate(value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new ValidationError('start_time must be a valid timestamp.');
  }
}

/**
 * Appointment lifecycle: active on creation, updated in place, cancelled for
 * good. Cancelled appointments are kept in the store but are never returned;
 * every lookup treats them as missing.
 */
export class AppointmentService {
  private validator: SlotValidator;
  private guard: ConflictGuard;

  constructor(
    private store: AppointmentStore,
    private grid: TimeGrid
  ) {
    this.validator = new SlotValidator(grid);
    this.guard = new ConflictGuard();
  }

  async create(input: CreateAppointmentInput, now: Date): Promise<Appointment> {
    assertValidDate(input.start_time);
    const fields: NewAppointment = {
      id: uuidv4(),
      start_time: input.start_time,
      name: requireText(input.name, 'Name'),
      email: normalizeEmail(input.email),
      phone: normalizePhone(input.phone ?? ''),
      reason: normalizeReason(input.reason ?? ''),
    };

    this.validator.validate(fields.start_time, now);

    const appointment = await this.store.withTransaction((tx) =>
      this.guard.claim(tx, fields.start_time, () => tx.insertAppointment(fields))
    );

    logger.info('Appointment booked', {
      appointmentId: appointment.id,
      startTime: appointment.start_time.toISOString(),
    });
    return appointment;
  }

  async update(id: string, input: UpdateAppointmentInput, now: Date): Promise<Appointment> {
    const changes: AppointmentChanges = {};
    if (input.start_time !== undefined) {
      assertValidDate(input.start_time);
      changes.start_time = input.start_time;
    }
    if (input.name !== undefined) changes.name = requireText(input.name, 'Name');
    if (input.email !== undefined) changes.email = normalizeEmail(input.email);
    if (input.phone !== undefined) changes.phone = normalizePhone(input.phone);
    if (input.reason !== undefined) changes.reason = normalizeReason(input.reason);

    const updated = await this.store.withTransaction(async (tx) => {
      const current = await tx.getAppointmentForUpdate(id);
      if (!current || current.status !== 'active') {
        throw new NotFoundError();
      }
      if (Object.keys(changes).length === 0) {
        return current;
      }

      const write = async () => {
        const result = await tx.updateAppointment(id, changes, current.version);
        if (!result) throw new NotFoundError();
        return result;
      };

      const startTime = changes.start_time;
      if (!startTime) {
        return write();
      }

      this.validator.validate(startTime, now);
      return this.guard.claim(tx, startTime, write, id);
    });

    if (changes.start_time) {
      logger.info('Appointment rescheduled', {
        appointmentId: id,
        startTime: updated.start_time.toISOString(),
      });
    } else {
      logger.debug('Appointment details updated', { appointmentId: id, fields: Object.keys(changes) });
    }
    return updated;
  }

  async cancel(id: string, now: Date): Promise<void> {
    await this.store.withTransaction(async (tx) => {
      const current = await tx.getAppointmentForUpdate(id);
      if (!current || current.status !== 'active') {
        throw new NotFoundError();
      }
      const result = await tx.updateAppointment(id, { status: 'cancelled', cancelled_at: now }, current.version);
      if (!result) throw new NotFoundError();
    });

    logger.info('Appointment cancelled', { appointmentId: id });
  }

  async get(id: string): Promise<Appointment> {
    const appointment = await this.store.getAppointment(id);
    if (!appointment || appointment.status !== 'active') {
      throw new NotFoundError();
    }
    return appointment;
  }

  async listWeek(page: number, now: Date): Promise<WeekAppointments> {
    assertValidPage(page);
    const week = this.grid.weekRange(page, now);
    const appointments = await this.store.listAppointments(week);
    return {
      ...buildPageInfo(this.grid, week, appointments.length),
      appointments,
    };
  }
}
