import { DateTime } from 'luxon';
import { ScheduleConfig, WeekRange } from '../../types/appointment';
import { BusinessHoursConfig, DAY_NAMES, hoursForWeekday, parseClock } from '../../utils/businessHours';

/**
 * Business-hours grid of fixed-length slots in a single reference zone.
 *
 * Grid lines sit on whole multiples of the slot length from local midnight
 * (:00 and :30 for 30-minute slots). A slot is bookable when it starts on a
 * grid line and ends no later than closing time, so on a 09:00–17:00 day the
 * last slot starts at 16:30.
 */
export class TimeGrid {
  readonly config: ScheduleConfig;

  constructor(config: ScheduleConfig) {
    assertValidConfig(config);
    this.config = Object.freeze({
      timezone: config.timezone,
      slotMinutes: config.slotMinutes,
      hours: freezeHours(config.hours),
    });
  }

  get timezone(): string {
    return this.config.timezone;
  }

  get slotMinutes(): number {
    return this.config.slotMinutes;
  }

  toZoned(t: Date): DateTime {
    return DateTime.fromJSDate(t).setZone(this.config.timezone);
  }

  /** Monday 00:00 of the week holding `now`, moved forward by `page` weeks. */
  weekRange(page: number, now: Date): WeekRange {
    const start = this.toZoned(now).startOf('week').plus({ weeks: page });
    const end = start.plus({ weeks: 1 });
    return { page, start: start.toJSDate(), end: end.toJSDate() };
  }

  slotBoundaries(week: WeekRange): Date[] {
    const slots: Date[] = [];
    const weekStart = this.toZoned(week.start).startOf('day');

    for (let i = 0; i < 7; i++) {
      const day = weekStart.plus({ days: i });
      const hours = hoursForWeekday(this.config.hours, day.weekday);
      if (!hours) continue;

      for (let minute = hours.open; minute + this.config.slotMinutes <= hours.close; minute += this.config.slotMinutes) {
        const slot = day.set({ hour: Math.floor(minute / 60), minute: minute % 60, second: 0, millisecond: 0 });
        const slotDate = slot.toJSDate();
        if (slotDate >= week.start && slotDate < week.end) {
          slots.push(slotDate);
        }
      }
    }

    return slots;
  }

  isAligned(t: Date): boolean {
    if (Number.isNaN(t.getTime())) return false;

    const local = this.toZoned(t);
    if (local.second !== 0 || local.millisecond !== 0) return false;

    const hours = hoursForWeekday(this.config.hours, local.weekday);
    if (!hours) return false;

    const minuteOfDay = local.hour * 60 + local.minute;
    if (minuteOfDay < hours.open || minuteOfDay + this.config.slotMinutes > hours.close) return false;

    return minuteOfDay % this.config.slotMinutes === 0;
  }

  /** Calendar date (YYYY-MM-DD) of `t` in the reference zone. */
  localDate(t: Date): string {
    return this.toZoned(t).toISODate() ?? '';
  }

  /** ISO-8601 in the reference zone, with offset, truncated to seconds. */
  formatTimestamp(t: Date): string {
    return this.toZoned(t).startOf('second').toISO({ suppressMilliseconds: true }) ?? t.toISOString();
  }
}

function freezeHours(hours: BusinessHoursConfig): Readonly<BusinessHoursConfig> {
  const copy: BusinessHoursConfig = { ...hours };
  for (const day of DAY_NAMES) {
    const dayHours = hours[day];
    copy[day] = dayHours ? Object.freeze({ open: dayHours.open, close: dayHours.close }) : null;
  }
  return Object.freeze(copy);
}

function assertValidConfig(config: ScheduleConfig): void {
  if (!DateTime.now().setZone(config.timezone).isValid) {
    throw new Error(`Invalid schedule timezone: ${config.timezone}`);
  }
  if (!Number.isInteger(config.slotMinutes) || config.slotMinutes <= 0) {
    throw new Error(`slotMinutes must be a positive integer, got ${config.slotMinutes}`);
  }

  let businessDays = 0;
  for (const day of DAY_NAMES) {
    const hours = config.hours[day];
    if (!hours) continue;
    const open = parseClock(hours.open);
    const close = parseClock(hours.close);
    if (close <= open) {
      throw new Error(`Closing time must be after opening time on ${day}: ${hours.open}-${hours.close}`);
    }
    if (open % config.slotMinutes !== 0 || close % config.slotMinutes !== 0) {
      throw new Error(
        `Business hours on ${day} must fall on ${config.slotMinutes}-minute boundaries: ${hours.open}-${hours.close}`
      );
    }
    businessDays++;
  }

  if (businessDays === 0) {
    throw new Error('At least one business day must be configured');
  }
}
