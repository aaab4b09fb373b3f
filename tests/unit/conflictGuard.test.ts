jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { ConflictGuard } from '../../src/services/scheduling/conflictGuard';
import { AppointmentTransaction } from '../../src/services/store/appointment.store';
import { ConflictError, ConstraintViolationError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';
import { MemoryAppointmentStore } from '../helpers/memoryStore';

const SLOT = new Date('2025-11-11T09:00:00Z');

function newFields(id: string, start: Date = SLOT) {
  return { id, start_time: start, name: 'Dana Client', email: 'dana@example.com', phone: '', reason: '' };
}

describe('ConflictGuard', () => {
  const guard = new ConflictGuard();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('tryReserve', () => {
    it('should reserve a free slot', async () => {
      const store = new MemoryAppointmentStore();
      const result = await store.withTransaction((tx) => guard.tryReserve(tx, SLOT));
      expect(result).toEqual({ status: 'reserved' });
    });

    it('should report the occupant of a taken slot', async () => {
      const store = new MemoryAppointmentStore();
      store.seed({ id: 'holder', start_time: SLOT });
      const result = await store.withTransaction((tx) => guard.tryReserve(tx, SLOT));
      expect(result).toEqual({ status: 'conflict', occupantId: 'holder' });
    });

    it('should treat a slot held only by the excluded appointment as free', async () => {
      const store = new MemoryAppointmentStore();
      store.seed({ id: 'holder', start_time: SLOT });
      const result = await store.withTransaction((tx) => guard.tryReserve(tx, SLOT, 'holder'));
      expect(result).toEqual({ status: 'reserved' });
    });

    it('should ignore cancelled occupants', async () => {
      const store = new MemoryAppointmentStore();
      store.seed({ id: 'gone', start_time: SLOT, status: 'cancelled' });
      const result = await store.withTransaction((tx) => guard.tryReserve(tx, SLOT));
      expect(result).toEqual({ status: 'reserved' });
    });
  });

  describe('claim', () => {
    it('should run the write when the slot is free', async () => {
      const store = new MemoryAppointmentStore();
      const created = await store.withTransaction((tx) =>
        guard.claim(tx, SLOT, () => tx.insertAppointment(newFields('first')))
      );
      expect(created.id).toBe('first');
      expect(store.rows.size).toBe(1);
    });

    it('should not run the write when the slot is taken', async () => {
      const store = new MemoryAppointmentStore();
      store.seed({ id: 'holder', start_time: SLOT });
      const write = jest.fn();

      await expect(store.withTransaction((tx) => guard.claim(tx, SLOT, write))).rejects.toThrow(ConflictError);
      expect(write).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith('Slot already booked', expect.objectContaining({ occupantId: 'holder' }));
    });

    it('should translate a unique-index violation into a conflict', async () => {
      const store = new MemoryAppointmentStore({ blindOccupancyLookups: true });
      store.seed({ id: 'holder', start_time: SLOT });

      await expect(
        store.withTransaction((tx) => guard.claim(tx, SLOT, () => tx.insertAppointment(newFields('late'))))
      ).rejects.toThrow(ConflictError);
      expect(store.rows.has('late')).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        'Slot claimed by a concurrent booking',
        expect.objectContaining({ constraint: 'appointments_active_start_time_key' })
      );
    });

    it('should pass other write errors through unchanged', async () => {
      const tx: AppointmentTransaction = {
        getAppointmentForUpdate: jest.fn(),
        findSlotOccupant: jest.fn().mockResolvedValue(null),
        insertAppointment: jest.fn(),
        updateAppointment: jest.fn(),
      };
      const failure = new Error('connection reset');

      await expect(guard.claim(tx, SLOT, () => Promise.reject(failure))).rejects.toBe(failure);
    });

    it('should never leak a ConstraintViolationError', async () => {
      const tx: AppointmentTransaction = {
        getAppointmentForUpdate: jest.fn(),
        findSlotOccupant: jest.fn().mockResolvedValue(null),
        insertAppointment: jest.fn(),
        updateAppointment: jest.fn(),
      };
      const violation = new ConstraintViolationError('appointments_active_start_time_key', new Error('duplicate key'));

      const outcome = guard.claim(tx, SLOT, () => Promise.reject(violation));
      await expect(outcome).rejects.toBeInstanceOf(ConflictError);
      await expect(outcome).rejects.not.toBeInstanceOf(ConstraintViolationError);
    });

    it('should look up occupants excluding the rescheduled appointment', async () => {
      const findSlotOccupant = jest.fn().mockResolvedValue(null);
      const tx: AppointmentTransaction = {
        getAppointmentForUpdate: jest.fn(),
        findSlotOccupant,
        insertAppointment: jest.fn(),
        updateAppointment: jest.fn(),
      };

      await guard.claim(tx, SLOT, () => Promise.resolve('ok'), 'appt-7');
      expect(findSlotOccupant).toHaveBeenCalledWith(SLOT, 'appt-7');
    });
  });
});
