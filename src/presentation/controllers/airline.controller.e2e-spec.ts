/**
 * E2E TEST - Airlines API
 *
 * Runs the real AppModule on Fastify with the in-memory store.
 * Only the id generator, the clock and the logger are replaced:
 * - ids come out as airline-1, airline-2, ...
 * - time only moves when the test advances the clock
 *
 * What we test here:
 * - HTTP Request → Controller → Use case → Repository
 * - DTO validation and domain errors mapped to 400
 * - HTTP status codes and JSON response shapes
 */

import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '@/app.module';
import { configureApp, createFastifyAdapter } from '@/app.setup';
import { CLOCK, ID_GENERATOR, LOGGER_SERVICE } from '@/domain/services';
import { DeterministicIdGenerator, FixedClock } from '@/test/fixtures';

describe('Airlines API (E2E)', () => {
  let app: NestFastifyApplication;
  let clock: FixedClock;

  const mockLogger = {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const delta = {
    name: 'Delta',
    iata_code: 'DL',
    icao_code: 'DAL',
    country: 'United States',
  };

  const server = () => app.getHttpServer();

  beforeEach(async () => {
    clock = new FixedClock(new Date('2024-06-01T12:00:00.000Z'));

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(ID_GENERATOR)
      .useValue(new DeterministicIdGenerator('airline'))
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(LOGGER_SERVICE)
      .useValue(mockLogger)
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(createFastifyAdapter(), { logger: false });
    configureApp(app, []);

    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app?.close();
    jest.clearAllMocks();
  });

  // ============================================================
  // POST /api/v1/airlines/
  // ============================================================

  describe('POST /api/v1/airlines/', () => {
    it('should create an airline and return 201', async () => {
      const response = await request(server()).post('/api/v1/airlines/').send(delta);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: 'airline-1',
        name: 'Delta',
        iata_code: 'DL',
        icao_code: 'DAL',
        country: 'United States',
        active: true,
        created_at: '2024-06-01T12:00:00.000Z',
        updated_at: '2024-06-01T12:00:00.000Z',
      });
    });

    it('should accept the route without a trailing slash', async () => {
      const response = await request(server()).post('/api/v1/airlines').send(delta);

      expect(response.status).toBe(201);
    });

    it('should upper-case codes', async () => {
      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, iata_code: 'dl', icao_code: 'dal' });

      expect(response.status).toBe(201);
      expect(response.body.iata_code).toBe('DL');
      expect(response.body.icao_code).toBe('DAL');
    });

    it('should return 400 Conflict for a duplicate IATA code', async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);

      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, icao_code: 'XYZ' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Conflict');
      expect(response.body.message).toBe('Airline with IATA code DL already exists');
    });

    it('should return 400 Conflict for a duplicate ICAO code', async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);

      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, iata_code: 'XX', icao_code: 'dal' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Airline with ICAO code DAL already exists');
    });

    it('should return 400 when the IATA code has 3 characters', async () => {
      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, iata_code: 'DLX' });

      expect(response.status).toBe(400);
      expect(response.body.message).toEqual(['iata_code must be exactly 2 characters']);
    });

    it('should return 400 when the ICAO code has 2 characters', async () => {
      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, icao_code: 'DA' });

      expect(response.status).toBe(400);
      expect(response.body.message).toEqual(['icao_code must have 3 or 4 characters']);
    });

    it('should return 400 Validation Error when the name is only whitespace', async () => {
      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, name: '   ' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation Error');
      expect(response.body.message).toBe('Airline name cannot be empty');
    });

    it('should accept a 300-character name', async () => {
      const name = 'A'.repeat(300);

      const response = await request(server()).post('/api/v1/airlines/').send({ ...delta, name });

      expect(response.status).toBe(201);
      expect(response.body.name).toBe(name);
    });

    it('should return 400 when country is missing', async () => {
      const response = await request(server()).post('/api/v1/airlines/').send({
        name: 'Delta',
        iata_code: 'DL',
        icao_code: 'DAL',
      });

      expect(response.status).toBe(400);
    });

    it('should return 400 for unknown fields', async () => {
      const response = await request(server())
        .post('/api/v1/airlines/')
        .send({ ...delta, alliance: 'SkyTeam' });

      expect(response.status).toBe(400);
    });
  });

  // ============================================================
  // GET /api/v1/airlines/
  // ============================================================

  describe('GET /api/v1/airlines/', () => {
    beforeEach(async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);
      await request(server())
        .post('/api/v1/airlines/')
        .send({ name: 'Lufthansa', iata_code: 'LH', icao_code: 'DLH', country: 'Germany', active: false });
      await request(server())
        .post('/api/v1/airlines/')
        .send({ name: 'Air France', iata_code: 'AF', icao_code: 'AFR', country: 'France' });
    });

    it('should list every airline by default', async () => {
      const response = await request(server()).get('/api/v1/airlines/');

      expect(response.status).toBe(200);
      expect(response.body.map((a: { id: string }) => a.id)).toEqual(['airline-1', 'airline-2', 'airline-3']);
    });

    it('should list only active airlines when active_only=true', async () => {
      const response = await request(server()).get('/api/v1/airlines/?active_only=true');

      expect(response.status).toBe(200);
      expect(response.body.map((a: { iata_code: string }) => a.iata_code)).toEqual(['DL', 'AF']);
    });

    it('should list every airline when active_only=false', async () => {
      const response = await request(server()).get('/api/v1/airlines?active_only=false');

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(3);
    });

    it.each(['1', 'True', 'yes', 'ON'])('should treat active_only=%s as true', async (flag) => {
      const response = await request(server()).get(`/api/v1/airlines/?active_only=${flag}`);

      expect(response.status).toBe(200);
      expect(response.body.map((a: { iata_code: string }) => a.iata_code)).toEqual(['DL', 'AF']);
    });

    it.each(['0', 'False', 'no', 'off'])('should treat active_only=%s as false', async (flag) => {
      const response = await request(server()).get(`/api/v1/airlines/?active_only=${flag}`);

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(3);
    });

    it('should return 400 for a non-boolean active_only', async () => {
      const response = await request(server()).get('/api/v1/airlines/?active_only=sometimes');

      expect(response.status).toBe(400);
    });
  });

  // ============================================================
  // GET / PUT / DELETE /api/v1/airlines/{id}
  // ============================================================

  describe('GET /api/v1/airlines/:id', () => {
    it('should return 404 for an unknown id', async () => {
      const response = await request(server()).get('/api/v1/airlines/unknown-id');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Airline not found');
    });
  });

  describe('PUT /api/v1/airlines/:id', () => {
    it('should return 404 for an unknown id', async () => {
      const response = await request(server()).put('/api/v1/airlines/unknown-id').send({ active: false });

      expect(response.status).toBe(404);
    });

    it('should reject attempts to change codes', async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);

      const response = await request(server()).put('/api/v1/airlines/airline-1').send({ iata_code: 'XX' });

      expect(response.status).toBe(400);
    });

    it('should update name and country', async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);

      const response = await request(server())
        .put('/api/v1/airlines/airline-1')
        .send({ name: 'Delta Air Lines', country: 'USA' });

      expect(response.status).toBe(200);
      expect(response.body.name).toBe('Delta Air Lines');
      expect(response.body.country).toBe('USA');
      expect(response.body.active).toBe(true);
    });
  });

  describe('DELETE /api/v1/airlines/:id', () => {
    it('should return 404 for an unknown id', async () => {
      const response = await request(server()).delete('/api/v1/airlines/unknown-id');

      expect(response.status).toBe(404);
    });

    it('should return 404 on the second delete', async () => {
      await request(server()).post('/api/v1/airlines/').send(delta);

      expect((await request(server()).delete('/api/v1/airlines/airline-1')).status).toBe(204);
      expect((await request(server()).delete('/api/v1/airlines/airline-1')).status).toBe(404);
    });
  });

  // ============================================================
  // Full lifecycle
  // ============================================================

  describe('lifecycle', () => {
    it('should create, read, deactivate, delete and then miss an airline', async () => {
      const created = await request(server()).post('/api/v1/airlines/').send(delta);
      expect(created.status).toBe(201);
      const id: string = created.body.id;
      expect(id).toBe('airline-1');

      const fetched = await request(server()).get(`/api/v1/airlines/${id}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual(created.body);

      clock.advance(60_000);
      const updated = await request(server()).put(`/api/v1/airlines/${id}`).send({ active: false });
      expect(updated.status).toBe(200);
      expect(updated.body).toEqual({
        ...created.body,
        active: false,
        updated_at: '2024-06-01T12:01:00.000Z',
      });

      const deleted = await request(server()).delete(`/api/v1/airlines/${id}`);
      expect(deleted.status).toBe(204);

      const missing = await request(server()).get(`/api/v1/airlines/${id}`);
      expect(missing.status).toBe(404);
    });
  });

  // ============================================================
  // Correlation id
  // ============================================================

  describe('correlation id', () => {
    it('should echo the X-Correlation-ID header', async () => {
      const response = await request(server()).get('/api/v1/airlines/').set('X-Correlation-ID', 'corr-e2e-1');

      expect(response.headers['x-correlation-id']).toBe('corr-e2e-1');
    });

    it('should echo the header on unknown routes', async () => {
      const response = await request(server()).get('/nope').set('X-Correlation-ID', 'corr-e2e-404');

      expect(response.status).toBe(404);
      expect(response.headers['x-correlation-id']).toBe('corr-e2e-404');
    });

    it('should echo the header on 404 responses from the API', async () => {
      const response = await request(server())
        .get('/api/v1/airlines/unknown-id')
        .set('X-Correlation-ID', 'corr-e2e-miss');

      expect(response.status).toBe(404);
      expect(response.headers['x-correlation-id']).toBe('corr-e2e-miss');
    });

    it('should generate an id when none is sent', async () => {
      const response = await request(server()).get('/nope');

      expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});
