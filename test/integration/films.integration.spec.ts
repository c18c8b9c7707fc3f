import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CatalogModule } from '../../src/catalog/catalog.module';
import { FilmsService } from '../../src/catalog/films/films.service';
import { AuditService } from '../../src/audit/audit.service';
import { Film } from '../../src/catalog/films/entities/film.entity';
import { FilmGenre } from '../../src/catalog/films/entities/film-genre.entity';
import { FilmAudit } from '../../src/audit/entities/film-audit.entity';
import { ValidationException } from '../../src/common/exceptions/validation.exception';
import { RecordConflictException } from '../../src/common/exceptions/record-conflict.exception';
import { RecordNotFoundException } from '../../src/common/exceptions/record-not-found.exception';
import { testDatabaseModules } from '../utils/test-database';
import { TestHelpers } from '../utils/test-helpers';

describe('Films (integration)', () => {
  let module: TestingModule;
  let filmsService: FilmsService;
  let auditService: AuditService;
  let dataSource: DataSource;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [...testDatabaseModules(), CatalogModule],
    }).compile();

    filmsService = module.get<FilmsService>(FilmsService);
    auditService = module.get<AuditService>(AuditService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(async () => {
    await TestHelpers.clearTables(dataSource, [FilmAudit, Film]);
  });

  describe('budget rule', () => {
    it('should reject a film below the minimum budget and write nothing', async () => {
      await expect(filmsService.create({ title: 'Shoestring', budget: 99999 })).rejects.toThrow(
        'Minimum film budget is $100,000',
      );

      expect(await dataSource.getRepository(Film).count()).toBe(0);
    });

    it('should accept the minimum budget and default to pre-production', async () => {
      const film = await filmsService.create({ title: 'Exactly Enough', budget: 100000 });

      const stored = await filmsService.findOne(film.film_id);
      expect(stored.budget).toBe(100000);
      expect(stored.production_status).toBe('Pre-Production');
      expect(stored.boxoffice_collection).toBe(0);
    });

    it('should reject an update that lowers the budget and keep the stored value', async () => {
      const film = await filmsService.create({ title: 'Cutbacks', budget: 300000 });

      await expect(filmsService.update(film.film_id, { budget: 50000 })).rejects.toBeInstanceOf(ValidationException);

      expect((await filmsService.findOne(film.film_id)).budget).toBe(300000);
    });

    it('should check the merged record when the stored budget is already below the minimum', async () => {
      const film = await TestHelpers.seedFilm(dataSource, { title: 'Legacy', budget: 1000 });

      await expect(filmsService.update(film.film_id, { title: 'Legacy (Restored)' })).rejects.toThrow(
        'Minimum film budget is $100,000',
      );
    });
  });

  describe('status audit', () => {
    it('should record a status change with old and new budgets', async () => {
      const film = await filmsService.create({ title: 'Harbour Lights', budget: 200000 });

      await filmsService.update(film.film_id, { production_status: 'In Progress', budget: 250000 });

      const { logs, total } = await auditService.queryFilmAudit({ film_id: film.film_id });
      expect(total).toBe(1);
      expect(logs[0]).toMatchObject({
        film_id: film.film_id,
        film_title: 'Harbour Lights',
        old_status: 'Pre-Production',
        new_status: 'In Progress',
        old_budget: 200000,
        new_budget: 250000,
        action: 'STATUS_CHANGE',
      });
    });

    it('should not audit an update that keeps the status', async () => {
      const film = await filmsService.create({ title: 'Same Old', budget: 200000 });

      await filmsService.update(film.film_id, { budget: 210000 });

      expect((await auditService.queryFilmAudit({ film_id: film.film_id })).total).toBe(0);
    });

    it('should roll back the status write when the guard rejects the update', async () => {
      const film = await filmsService.create({ title: 'Stalled', budget: 200000 });

      await expect(
        filmsService.update(film.film_id, { production_status: 'Released', budget: 10 }),
      ).rejects.toBeInstanceOf(ValidationException);

      expect((await filmsService.findOne(film.film_id)).production_status).toBe('Pre-Production');
      expect((await auditService.queryFilmAudit({ film_id: film.film_id })).total).toBe(0);
    });
  });

  describe('genres', () => {
    it('should flag the first genre as primary', async () => {
      const film = await filmsService.create({ title: 'Mixed Bag', budget: 150000 });

      await filmsService.addGenres(film.film_id, ['Comedy', ' Romance ', 'comedy']);

      const genres = await filmsService.listGenres(film.film_id);
      expect(genres.map((g) => [g.genre, g.is_primary])).toEqual([
        ['Comedy', true],
        ['Romance', false],
      ]);
    });

    it('should reject a genre the film already has', async () => {
      const film = await filmsService.create({ title: 'Twice Told', budget: 150000 });
      await filmsService.addGenres(film.film_id, ['Horror']);

      await expect(filmsService.addGenres(film.film_id, ['Horror'])).rejects.toBeInstanceOf(RecordConflictException);
    });

    it('should delete genres together with their film', async () => {
      const film = await filmsService.create({ title: 'Short Lived', budget: 150000 });
      await filmsService.addGenres(film.film_id, ['Western']);

      await filmsService.remove(film.film_id);

      expect(await dataSource.getRepository(FilmGenre).count({ where: { film_id: film.film_id } })).toBe(0);
    });
  });

  describe('certificate and scenes', () => {
    it('should allow one certificate per film', async () => {
      const film = await filmsService.create({ title: 'Rated', budget: 150000 });
      const certificate = {
        rating_board: 'Test Board',
        certificate_rating: 'PG',
        issue_date: '2024-01-10',
      };

      await filmsService.setCertificate(film.film_id, certificate);

      await expect(filmsService.setCertificate(film.film_id, certificate)).rejects.toBeInstanceOf(
        RecordConflictException,
      );
      expect((await filmsService.getCertificate(film.film_id)).certificate_rating).toBe('PG');
    });

    it('should refuse a filming record for a scene of another film', async () => {
      const film = await filmsService.create({ title: 'First', budget: 150000 });
      const other = await filmsService.create({ title: 'Second', budget: 150000 });
      const crew = await TestHelpers.seedCrew(dataSource);
      const scene = await filmsService.addScene(other.film_id, { description: 'Rooftop chase' });

      await expect(
        filmsService.recordFilming(film.film_id, { scene_id: scene.scene_id, crew_id: crew.crew_id }),
      ).rejects.toThrow('Scene does not belong to this film');
    });

    it('should report a missing film as not found', async () => {
      await expect(filmsService.findOne(424242)).rejects.toBeInstanceOf(RecordNotFoundException);
    });
  });
});
