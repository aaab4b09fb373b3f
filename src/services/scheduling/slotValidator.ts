import { TimeGrid } from './timeGrid';
import { InvalidSlotError, PastBookingError } from '../../utils/errors';

export class SlotValidator {
  constructor(private grid: TimeGrid) {}

  /**
   * Throws InvalidSlotError when `startTime` is off the grid and PastBookingError
   * when it is not strictly after `now`. Alignment is checked first.
   */
  validate(startTime: Date, now: Date): void {
    if (!this.grid.isAligned(startTime)) {
      throw new InvalidSlotError();
    }
    if (startTime.getTime() <= now.getTime()) {
      throw new PastBookingError();
    }
  }
}
