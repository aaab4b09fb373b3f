jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('@sentry/node', () => ({
  setupExpressErrorHandler: jest.fn(),
}));

import { Server } from 'http';
import { AddressInfo } from 'net';
import { createApp } from '../../src/app';
import { MemoryAppointmentStore } from '../helpers/memoryStore';
import { makeGrid, MONDAY_NOON } from '../helpers/grid';

const APPT_ID = '3f2b8c1e-5d4a-4e6b-9c7d-2a1b0c9d8e7f';
const OTHER_ID = '7a6b5c4d-3e2f-4a1b-8c9d-0e1f2a3b4c5d';

describe('Appointments API', () => {
  let store: MemoryAppointmentStore;
  let server: Server;
  let baseUrl: string;
  const checkHealth = jest.fn();

  beforeEach((done) => {
    store = new MemoryAppointmentStore();
    checkHealth.mockResolvedValue({ status: 'healthy' });
    const app = createApp({ store, grid: makeGrid(), checkHealth, clock: () => MONDAY_NOON });
    server = app.listen(0, '127.0.0.1', () => {
      const { port } = server.address() as AddressInfo;
      baseUrl = `http://127.0.0.1:${port}`;
      done();
    });
  });

  afterEach((done) => {
    server.close(() => done());
  });

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  describe('POST /api/appointments', () => {
    it('should book a slot', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-11T09:00:00Z',
        name: 'Dana Client',
        email: 'dana@example.com',
        reason: 'Consultation',
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        start_time: '2025-11-11T09:00:00Z',
        end_time: '2025-11-11T09:30:00Z',
        name: 'Dana Client',
        email: 'dana@example.com',
        phone: '',
        reason: 'Consultation',
        created_at: '2025-11-01T00:00:00Z',
      });
    });

    it('should answer 409 for a slot that is taken', async () => {
      store.seed({ id: APPT_ID, start_time: new Date('2025-11-11T09:00:00Z') });

      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-11T09:00:00Z',
        name: 'Second',
        email: 'second@example.com',
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        success: false,
        error: 'This time slot has already been booked.',
        code: 'CONFLICT',
      });
    });

    it('should read explicit offsets', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-11T11:30:00+01:00',
        name: 'Offset Client',
        email: 'offset@example.com',
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ start_time: '2025-11-11T10:30:00Z' });
    });

    it('should read timestamps without offset in the business zone', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-11T11:00:00',
        name: 'Local Client',
        email: 'local@example.com',
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ start_time: '2025-11-11T11:00:00Z' });
    });

    it('should answer 422 for a slot starting at closing time', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-11T17:00:00Z',
        name: 'Late Client',
        email: 'late@example.com',
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ code: 'INVALID_SLOT' });
    });

    it('should answer 422 for a slot in the past', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: '2025-11-10T10:00:00Z',
        name: 'Early Client',
        email: 'early@example.com',
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Cannot book an appointment in the past.',
        code: 'PAST_BOOKING',
      });
    });

    it('should list every missing required field', async () => {
      const res = await send('POST', '/api/appointments', {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: 'start_time is required, name is required, email is required',
        code: 'VALIDATION',
      });
    });

    it('should reject an unparseable timestamp', async () => {
      const res = await send('POST', '/api/appointments', {
        start_time: 'next tuesday',
        name: 'Vague Client',
        email: 'vague@example.com',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Invalid datetime format. Use ISO 8601 (e.g. 2024-01-01T13:30:00Z).',
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await fetch(`${baseUrl}/api/appointments`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"start_time":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Request body must be valid JSON.' });
    });
  });

  describe('GET /api/appointments/available', () => {
    it('should list free slots of the current week', async () => {
      store.seed({ id: APPT_ID, start_time: new Date('2025-11-11T09:00:00Z') });

      const res = await send('GET', '/api/appointments/available');

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        page: 0,
        week_start: '2025-11-10',
        week_end: '2025-11-16',
        count: 72,
        has_previous: false,
        previous_page: null,
        next_page: 1,
        has_more: true,
      });
      expect(body).toMatchObject({ available_slots: expect.arrayContaining(['2025-11-10T12:30:00Z']) });
      expect(body).not.toMatchObject({ available_slots: expect.arrayContaining(['2025-11-11T09:00:00Z']) });
    });

    it('should page forward by week', async () => {
      const res = await send('GET', '/api/appointments/available?page=1');
      expect(await res.json()).toMatchObject({ page: 1, count: 80, week_start: '2025-11-17', previous_page: 0 });
    });

    it('should answer 400 for a negative page', async () => {
      const res = await send('GET', '/api/appointments/available?page=-1');
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'INVALID_PAGE' });
    });

    it('should answer 400 for a malformed page', async () => {
      const res = await send('GET', '/api/appointments/available?page=two');
      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/appointments', () => {
    it('should list the week of active appointments', async () => {
      store.seed({ id: APPT_ID, start_time: new Date('2025-11-12T10:00:00Z'), name: 'Robin' });
      store.seed({ id: OTHER_ID, start_time: new Date('2025-11-11T10:00:00Z'), status: 'cancelled' });

      const res = await send('GET', '/api/appointments?page=0');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        page: 0,
        count: 1,
        appointments: [{ id: APPT_ID, name: 'Robin', start_time: '2025-11-12T10:00:00Z' }],
      });
    });
  });

  describe('/api/appointments/:id', () => {
    beforeEach(() => {
      store.seed({ id: APPT_ID, start_time: new Date('2025-11-11T09:00:00Z'), name: 'Robin' });
    });

    it('should return an appointment', async () => {
      const res = await send('GET', `/api/appointments/${APPT_ID}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: APPT_ID, name: 'Robin' });
    });

    it('should answer 404 for an id that is not a UUID', async () => {
      const res = await send('GET', '/api/appointments/42');
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: 'Appointment not found.', code: 'NOT_FOUND' });
    });

    it('should reschedule with PATCH', async () => {
      const res = await send('PATCH', `/api/appointments/${APPT_ID}`, { start_time: '2025-11-12T15:30:00Z' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: APPT_ID, start_time: '2025-11-12T15:30:00Z' });
    });

    it('should refuse a PATCH to a past slot and keep the appointment', async () => {
      const res = await send('PATCH', `/api/appointments/${APPT_ID}`, { start_time: '2025-11-10T09:00:00Z' });
      expect(res.status).toBe(422);
      expect(store.rows.get(APPT_ID)?.start_time.toISOString()).toBe('2025-11-11T09:00:00.000Z');
    });

    it('should refuse unknown fields', async () => {
      const res = await send('PATCH', `/api/appointments/${APPT_ID}`, { color: 'blue' });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Unrecognized key(s) in object: 'color'" });
    });

    it('should cancel with DELETE and hide the appointment afterwards', async () => {
      const res = await send('DELETE', `/api/appointments/${APPT_ID}`);
      expect(res.status).toBe(204);

      expect((await send('GET', `/api/appointments/${APPT_ID}`)).status).toBe(404);
      expect((await send('DELETE', `/api/appointments/${APPT_ID}`)).status).toBe(404);
      expect((await send('PATCH', `/api/appointments/${APPT_ID}`, { name: 'Again' })).status).toBe(404);
      expect(store.rows.get(APPT_ID)?.status).toBe('cancelled');
    });
  });

  describe('GET /health', () => {
    it('should report a healthy database', async () => {
      const res = await send('GET', '/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', database: { status: 'healthy' } });
    });

    it('should report a degraded database', async () => {
      checkHealth.mockResolvedValue({ status: 'unhealthy', error: 'ECONNREFUSED' });
      const res = await send('GET', '/health');
      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ status: 'degraded' });
    });
  });
});
