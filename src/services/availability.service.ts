import { TimeGrid } from './scheduling/timeGrid';
import { AppointmentStore } from './store/appointment.store';
import { PageInfo, WeekAvailability, WeekRange } from '../types/appointment';
import { InvalidPageError } from '../utils/errors';

export function assertValidPage(page: number): void {
  if (!Number.isSafeInteger(page) || page < 0) {
    throw new InvalidPageError();
  }
}

export function buildPageInfo(grid: TimeGrid, week: WeekRange, count: number): PageInfo {
  const lastInstant = new Date(week.end.getTime() - 1000);
  return {
    page: week.page,
    week_start: grid.localDate(week.start),
    week_end: grid.localDate(lastInstant),
    count,
    has_previous: week.page > 0,
    previous_page: week.page > 0 ? week.page - 1 : null,
    next_page: week.page + 1,
  };
}

export class AvailabilityService {
  constructor(
    private grid: TimeGrid,
    private store: Pick<AppointmentStore, 'findOccupiedSlots'>
  ) {}

  /**
   * Bookable slot starts for the week `page` weeks after the one holding
   * `now`: every grid slot after `now` that none of `occupied` holds, ascending.
   */
  available(page: number, now: Date, occupied: Iterable<Date>): Date[] {
    assertValidPage(page);
    const week = this.grid.weekRange(page, now);
    return this.freeSlots(week, now, occupied);
  }

  async weekAvailability(page: number, now: Date): Promise<WeekAvailability> {
    assertValidPage(page);
    const week = this.grid.weekRange(page, now);
    const nextWeek = this.grid.weekRange(page + 1, now);

    const [occupied, nextOccupied] = await Promise.all([
      this.store.findOccupiedSlots(week),
      this.store.findOccupiedSlots(nextWeek),
    ]);

    const slots = this.freeSlots(week, now, occupied);
    const hasMore = this.freeSlots(nextWeek, now, nextOccupied).length > 0;

    return {
      ...buildPageInfo(this.grid, week, slots.length),
      available_slots: slots,
      has_more: hasMore,
    };
  }

  private freeSlots(week: WeekRange, now: Date, occupied: Iterable<Date>): Date[] {
    const taken = new Set<number>();
    for (const slot of occupied) {
      taken.add(slot.getTime());
    }
    const cutoff = now.getTime();
    return this.grid
      .slotBoundaries(week)
      .filter((slot) => slot.getTime() > cutoff && !taken.has(slot.getTime()));
  }
}
