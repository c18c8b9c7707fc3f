import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import request from 'supertest';
import { JwtService } from '@nestjs/jwt';
import { DataSource } from 'typeorm';
import { configureApp } from '../src/setup-app';
import { AuthModule } from '../src/auth/auth.module';
import { AuditModule } from '../src/audit/audit.module';
import { CatalogModule } from '../src/catalog/catalog.module';
import { MetricsModule } from '../src/metrics/metrics.module';
import { OperationsModule } from '../src/operations/operations.module';
import { CapabilityGuard } from '../src/auth/guards/capability.guard';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { UserAccount } from '../src/auth/entities/user-account.entity';
import { testDatabaseModules } from './utils/test-database';
import { TestHelpers, TEST_PASSWORD } from './utils/test-helpers';

describe('Production records API (e2e)', () => {
  let app: INestApplication;
  let dataSource: DataSource;
  const tokens: Record<string, string> = {};

  const login = async (username: string): Promise<string> => {
    const response = await request(app.getHttpServer())
      .post('/api/v1/auth/login')
      .send({ username, password: TEST_PASSWORD })
      .expect(200);
    return response.body.tokens.access_token;
  };

  const bearer = (username: string) => `Bearer ${tokens[username]}`;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [...testDatabaseModules(), AuditModule, AuthModule, CatalogModule, MetricsModule, OperationsModule],
      providers: [
        { provide: APP_GUARD, useClass: CapabilityGuard },
        { provide: APP_FILTER, useClass: HttpExceptionFilter },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    configureApp(app);
    await app.init();

    dataSource = moduleFixture.get<DataSource>(DataSource);
    await TestHelpers.seedUser(dataSource, 'root', 'admin');
    await TestHelpers.seedUser(dataSource, 'mona', 'manager');
    await TestHelpers.seedUser(dataSource, 'vic', 'viewer');

    for (const username of ['root', 'mona', 'vic']) {
      tokens[username] = await login(username);
    }
  });

  afterAll(async () => {
    await app.close();
  });

  describe('capability checks', () => {
    it('should let a viewer read films', async () => {
      await request(app.getHttpServer()).get('/api/v1/catalog/films').set('Authorization', bearer('vic')).expect(200);
    });

    it('should refuse a viewer write', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/catalog/films')
        .set('Authorization', bearer('vic'))
        .send({ title: 'Forbidden', budget: 200000 })
        .expect(403);

      expect(response.body.errorCode).toBe('AUTHORIZATION_ERROR');
      expect(response.body.message).toBe('Role viewer cannot write film');
    });

    it('should reject a request without an access token', async () => {
      const response = await request(app.getHttpServer()).get('/api/v1/catalog/films').expect(401);

      expect(response.body.errorCode).toBe('UNAUTHORIZED');
      expect(response.body.message).toBe('Missing or invalid access token');
    });

    it('should not take the caller from a request header', async () => {
      await request(app.getHttpServer())
        .post('/api/v1/users')
        .set('x-username', 'root')
        .send({ username: 'mallory', full_name: 'Mallory', email: 'mallory@studio.test', password: 'x', role: 'admin' })
        .expect(401);

      expect(await dataSource.getRepository(UserAccount).countBy({ username: 'mallory' })).toBe(0);
    });

    it('should reject a token signed with another secret', async () => {
      const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 'root', role: 'admin' });

      await request(app.getHttpServer())
        .get('/api/v1/users')
        .set('Authorization', `Bearer ${forged}`)
        .expect(401);
    });

    it('should refuse the token of a deactivated account', async () => {
      await TestHelpers.seedUser(dataSource, 'leaver', 'manager');
      const token = await login('leaver');
      await dataSource.getRepository(UserAccount).update({ username: 'leaver' }, { is_active: false });

      const response = await request(app.getHttpServer())
        .get('/api/v1/catalog/films')
        .set('Authorization', `Bearer ${token}`)
        .expect(403);

      expect(response.body.message).toBe('Caller is not an active user');
    });

    it('should let an admin create users with a valid token', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/users')
        .set('Authorization', bearer('root'))
        .send({ username: 'nina', full_name: 'Nina Park', email: 'nina@studio.test', password: TEST_PASSWORD })
        .expect(201);

      expect(response.body.user).toMatchObject({ username: 'nina', role: 'viewer', created_by: 'root' });
    });

    it('should give audit access to managers but not viewers', async () => {
      await request(app.getHttpServer()).get('/api/v1/audit/films').set('Authorization', bearer('mona')).expect(200);
      await request(app.getHttpServer()).get('/api/v1/audit/films').set('Authorization', bearer('vic')).expect(403);
    });
  });

  describe('write validation', () => {
    it('should reject a film below the minimum budget', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/catalog/films')
        .set('Authorization', bearer('mona'))
        .send({ title: 'Shoestring', budget: 5000 })
        .expect(400);

      expect(response.body.errorCode).toBe('VALIDATION_ERROR');
      expect(response.body.message).toBe('Minimum film budget is $100,000');
      expect(response.body.details).toMatchObject({ rule: 'film.min_budget', budget: 5000 });
    });

    it('should reject unknown properties', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/catalog/films')
        .set('Authorization', bearer('mona'))
        .send({ title: 'Extra', budget: 200000, mood: 'sunny' })
        .expect(400);

      expect(response.body.message).toBe('Validation failed');
    });
  });

  describe('operations', () => {
    it('should add a shooting location to a film', async () => {
      const created = await request(app.getHttpServer())
        .post('/api/v1/operations/films')
        .set('Authorization', bearer('mona'))
        .send({ title: 'Harbour Lights', budget: 750000, genres: 'Drama, Mystery' })
        .expect(201);

      const response = await request(app.getHttpServer())
        .post('/api/v1/operations/shooting-locations')
        .set('Authorization', bearer('mona'))
        .send({
          film_id: created.body.film_id,
          location_name: 'Lighthouse',
          city: 'Capeview',
          shooting_start: '2024-03-01',
          shooting_end: '2024-03-05',
          cost_per_day: 1000,
        })
        .expect(201);

      expect(response.body).toMatchObject({ total_days: 5, total_cost: 5000 });
    });
  });

  describe('accounts', () => {
    it('should answer a wrong password with 401', async () => {
      await request(app.getHttpServer())
        .post('/api/v1/auth/login')
        .send({ username: 'mona', password: 'wrong-secret' })
        .expect(401);
    });

    it('should log in with valid credentials', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/auth/login')
        .send({ username: 'mona', password: TEST_PASSWORD })
        .expect(200);

      expect(response.body.status).toBe('AUTHORIZED');
      expect(response.body.user.password_hash).toBeUndefined();
      expect(response.body.tokens).toMatchObject({ token_type: 'Bearer', expires_in: 900 });
    });

    it('should refuse to delete the last active administrator', async () => {
      const response = await request(app.getHttpServer())
        .delete('/api/v1/users/root')
        .set('Authorization', bearer('root'))
        .expect(422);

      expect(response.body.errorCode).toBe('INVARIANT_ERROR');
      expect(response.body.message).toBe('Cannot delete the last active administrator');
    });
  });
});
