import { AppointmentTransaction } from '../store/appointment.store';
import { ConflictError, ConstraintViolationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export type Reservation =
  | { status: 'reserved' }
  | { status: 'conflict'; occupantId: string };

/**
 * Admits a slot only when no other active appointment holds it. Every check
 * and the write that follows it run on the same transaction.
 */
export class ConflictGuard {
  async tryReserve(tx: AppointmentTransaction, startTime: Date, excludeAppointmentId?: string): Promise<Reservation> {
    const occupantId = await tx.findSlotOccupant(startTime, excludeAppointmentId);
    if (occupantId) {
      return { status: 'conflict', occupantId };
    }
    return { status: 'reserved' };
  }

  /**
   * Reserves `startTime` and performs `write` in the caller's transaction.
   * The unique index still catches a concurrent winner that the occupancy
   * lookup could not see; that surfaces as ConflictError too.
   */
  async claim<T>(
    tx: AppointmentTransaction,
    startTime: Date,
    write: () => Promise<T>,
    excludeAppointmentId?: string
  ): Promise<T> {
    const reservation = await this.tryReserve(tx, startTime, excludeAppointmentId);
    if (reservation.status === 'conflict') {
      logger.warn('Slot already booked', {
        startTime: startTime.toISOString(),
        occupantId: reservation.occupantId,
        excludeAppointmentId,
      });
      throw new ConflictError();
    }

    try {
      return await write();
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        logger.warn('Slot claimed by a concurrent booking', {
          startTime: startTime.toISOString(),
          constraint: error.constraint,
        });
        throw new ConflictError();
      }
      throw error;
    }
  }
}
