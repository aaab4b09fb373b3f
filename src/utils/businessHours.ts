export interface DayHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: DayHours | null;
  tuesday: DayHours | null;
  wednesday: DayHours | null;
  thursday: DayHours | null;
  friday: DayHours | null;
  saturday: DayHours | null;
  sunday: DayHours | null;
}

export type DayName = keyof BusinessHoursConfig;

export const DAY_NAMES: readonly DayName[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  monday: { open: '09:00', close: '17:00' },
  tuesday: { open: '09:00', close: '17:00' },
  wednesday: { open: '09:00', close: '17:00' },
  thursday: { open: '09:00', close: '17:00' },
  friday: { open: '09:00', close: '17:00' },
  saturday: null,
  sunday: null,
};

export function isDayName(value: string): value is DayName {
  return DAY_NAMES.some((day) => day === value);
}

/** Minutes since midnight for an `HH:mm` clock string. */
export function parseClock(value: string): number {
  const match = /^(\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid clock time: ${value}`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 24 || minutes > 59 || (hours === 24 && minutes !== 0)) {
    throw new Error(`Invalid clock time: ${value}`);
  }
  return hours * 60 + minutes;
}

/**
 * Hours for the given ISO weekday (Mon=1 … Sun=7), as minutes since midnight.
 */
export function hoursForWeekday(
  config: BusinessHoursConfig,
  weekday: number
): { open: number; close: number } | null {
  const dayName = DAY_NAMES[weekday - 1];
  const dayHours = dayName ? config[dayName] : null;
  if (!dayHours) return null;
  return { open: parseClock(dayHours.open), close: parseClock(dayHours.close) };
}

/** Same window on each of `days`, closed on every other day. */
export function buildBusinessHours(days: readonly DayName[], open: string, close: string): BusinessHoursConfig {
  const hours: BusinessHoursConfig = {
    monday: null,
    tuesday: null,
    wednesday: null,
    thursday: null,
    friday: null,
    saturday: null,
    sunday: null,
  };
  for (const day of days) {
    hours[day] = { open, close };
  }
  return hours;
}
