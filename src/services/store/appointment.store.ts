import { Appointment, AppointmentChanges, NewAppointment, WeekRange } from '../../types/appointment';

/**
 * Writes available inside a single store transaction. Both write methods throw
 * ConstraintViolationError when they would leave two active appointments on
 * the same start time.
 */
export interface AppointmentTransaction {
  getAppointmentForUpdate(id: string): Promise<Appointment | null>;
  /** Id of the active appointment holding `startTime`, ignoring `excludeId`. Locks the row. */
  findSlotOccupant(startTime: Date, excludeId?: string): Promise<string | null>;
  insertAppointment(fields: NewAppointment): Promise<Appointment>;
  /** Null when the row is gone or its version no longer matches `expectedVersion`. */
  updateAppointment(id: string, changes: AppointmentChanges, expectedVersion?: number): Promise<Appointment | null>;
}

export interface AppointmentStore {
  findOccupiedSlots(range: WeekRange): Promise<Date[]>;
  listAppointments(range: WeekRange): Promise<Appointment[]>;
  getAppointment(id: string): Promise<Appointment | null>;
  withTransaction<T>(fn: (tx: AppointmentTransaction) => Promise<T>): Promise<T>;
}
