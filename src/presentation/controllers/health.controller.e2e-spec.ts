import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '@/app.module';
import { configureApp, createFastifyAdapter } from '@/app.setup';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import { LOGGER_SERVICE } from '@/domain/services';
import { InMemoryAirlineRepository } from '@/infrastructure/repositories';

describe('Health API (E2E)', () => {
  let app: NestFastifyApplication;
  let repository: InMemoryAirlineRepository;

  beforeEach(async () => {
    repository = new InMemoryAirlineRepository();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(AIRLINE_REPOSITORY)
      .useValue(repository)
      .overrideProvider(LOGGER_SERVICE)
      .useValue({ log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() })
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(createFastifyAdapter(), { logger: false });
    configureApp(app, []);

    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app?.close();
    jest.restoreAllMocks();
  });

  it('should return 200 {"status":"healthy"}', async () => {
    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'healthy' });
  });

  it('should return 503 when the store cannot be read', async () => {
    jest.spyOn(repository, 'count').mockRejectedValue(new Error('store unavailable'));

    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      statusCode: 503,
      message: 'Airline store unavailable',
      error: 'Service Unavailable',
      path: '/health',
    });
  });
});
