import { ScheduleConfig } from '../types/appointment';
import { buildBusinessHours, DayName, isDayName } from '../utils/businessHours';

export const SLOT_MINUTES = 30;

export interface ScheduleSettings {
  BUSINESS_TIMEZONE: string;
  BUSINESS_OPEN: string;
  BUSINESS_CLOSE: string;
  BUSINESS_DAYS: string;
}

/** Builds the immutable grid configuration once, at process start. */
export function buildScheduleConfig(settings: ScheduleSettings): ScheduleConfig {
  const days: DayName[] = [];
  for (const raw of settings.BUSINESS_DAYS.split(',')) {
    const day = raw.trim().toLowerCase();
    if (!day) continue;
    if (!isDayName(day)) {
      throw new Error(`Unknown business day: ${raw.trim()}`);
    }
    if (!days.includes(day)) days.push(day);
  }

  return Object.freeze({
    timezone: settings.BUSINESS_TIMEZONE,
    slotMinutes: SLOT_MINUTES,
    hours: Object.freeze(buildBusinessHours(days, settings.BUSINESS_OPEN, settings.BUSINESS_CLOSE)),
  });
}
