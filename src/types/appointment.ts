import { BusinessHoursConfig } from '../utils/businessHours';

export type AppointmentStatus = 'active' | 'cancelled';

export interface Appointment {
  id: string;
  start_time: Date;
  name: string;
  email: string;
  phone: string;
  reason: string;
  status: AppointmentStatus;
  version: number;
  created_at: Date;
  updated_at: Date;
  cancelled_at: Date | null;
}

export interface NewAppointment {
  id: string;
  start_time: Date;
  name: string;
  email: string;
  phone: string;
  reason: string;
}

export type AppointmentChanges = Partial<Pick<Appointment, 'start_time' | 'name' | 'email' | 'phone' | 'reason' | 'status' | 'cancelled_at'>>;

export interface CreateAppointmentInput {
  start_time: Date;
  name: string;
  email: string;
  phone?: string;
  reason?: string;
}

export interface UpdateAppointmentInput {
  start_time?: Date;
  name?: string;
  email?: string;
  phone?: string;
  reason?: string;
}

/** Half-open `[start, end)` range of one booking week. */
export interface WeekRange {
  page: number;
  start: Date;
  end: Date;
}

export interface ScheduleConfig {
  timezone: string;
  slotMinutes: number;
  hours: BusinessHoursConfig;
}

export interface PageInfo {
  page: number;
  week_start: string;
  week_end: string;
  count: number;
  has_previous: boolean;
  previous_page: number | null;
  next_page: number;
}

export interface WeekAvailability extends PageInfo {
  available_slots: Date[];
  has_more: boolean;
}

export interface WeekAppointments extends PageInfo {
  appointments: Appointment[];
}
