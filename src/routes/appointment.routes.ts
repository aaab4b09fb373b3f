import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DateTime } from 'luxon';
import { AppointmentService } from '../services/appointment.service';
import { AvailabilityService } from '../services/availability.service';
import { TimeGrid } from '../services/scheduling/timeGrid';
import { Appointment, UpdateAppointmentInput } from '../types/appointment';
import { InvalidPageError, NotFoundError, ValidationError } from '../utils/errors';

export interface AppointmentRouteDeps {
  appointments: AppointmentService;
  availability: AvailabilityService;
  grid: TimeGrid;
  clock?: () => Date;
}

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value === null ? '' : value));

const createSchema = z.object({
  start_time: z.string({ required_error: 'start_time is required' }).min(1, 'start_time is required'),
  name: z.string({ required_error: 'name is required' }),
  email: z.string({ required_error: 'email is required' }),
  phone: optionalText,
  reason: optionalText,
});

const updateSchema = z
  .object({
    start_time: z.string().min(1, 'start_time cannot be blank').optional(),
    name: z.string().optional(),
    email: z.string().optional(),
    phone: optionalText,
    reason: optionalText,
  })
  .strict();

const idSchema = z.string().uuid();

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join(', ');
}

export function parsePage(raw: unknown): number {
  if (raw === undefined) return 0;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    throw new InvalidPageError();
  }
  const page = Number(raw);
  if (!Number.isSafeInteger(page)) {
    throw new InvalidPageError();
  }
  return page;
}

/** ISO-8601 with offset; a timestamp without one is read in the business zone. */
export function parseTimestamp(raw: string, timezone: string): Date {
  const parsed = DateTime.fromISO(raw.trim(), { zone: timezone });
  if (!parsed.isValid) {
    throw new ValidationError('Invalid datetime format. Use ISO 8601 (e.g. 2024-01-01T13:30:00Z).');
  }
  return parsed.toJSDate();
}

function parseId(raw: string): string {
  // Anything that is not a UUID can never name an appointment
  const parsed = idSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError();
  }
  return parsed.data;
}

export function serializeAppointment(grid: TimeGrid, appointment: Appointment) {
  const end = new Date(appointment.start_time.getTime() + grid.slotMinutes * 60 * 1000);
  return {
    id: appointment.id,
    start_time: grid.formatTimestamp(appointment.start_time),
    end_time: grid.formatTimestamp(end),
    name: appointment.name,
    email: appointment.email,
    phone: appointment.phone,
    reason: appointment.reason,
    created_at: grid.formatTimestamp(appointment.created_at),
    updated_at: grid.formatTimestamp(appointment.updated_at),
  };
}

export function createAppointmentRoutes(deps: AppointmentRouteDeps): Router {
  const { appointments, availability, grid } = deps;
  const clock = deps.clock ?? (() => new Date());
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = parsePage(req.query.page);
      const week = await appointments.listWeek(page, clock());
      res.json({
        ...week,
        appointments: week.appointments.map((appointment) => serializeAppointment(grid, appointment)),
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = createSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(describeIssues(parsed.error));
      }

      const appointment = await appointments.create(
        {
          start_time: parseTimestamp(parsed.data.start_time, grid.timezone),
          name: parsed.data.name,
          email: parsed.data.email,
          phone: parsed.data.phone,
          reason: parsed.data.reason,
        },
        clock()
      );
      res.status(201).json(serializeAppointment(grid, appointment));
    } catch (error) {
      next(error);
    }
  });

  router.get('/available', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const page = parsePage(req.query.page);
      const week = await availability.weekAvailability(page, clock());
      res.json({
        ...week,
        available_slots: week.available_slots.map((slot) => grid.formatTimestamp(slot)),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const appointment = await appointments.get(parseId(req.params.id));
      res.json(serializeAppointment(grid, appointment));
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const parsed = updateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(describeIssues(parsed.error));
      }

      const { start_time, ...details } = parsed.data;
      const changes: UpdateAppointmentInput = { ...details };
      if (start_time !== undefined) {
        changes.start_time = parseTimestamp(start_time, grid.timezone);
      }

      const appointment = await appointments.update(id, changes, clock());
      res.json(serializeAppointment(grid, appointment));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await appointments.cancel(parseId(req.params.id), clock());
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
