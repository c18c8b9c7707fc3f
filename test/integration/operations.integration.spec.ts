import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { OperationsModule } from '../../src/operations/operations.module';
import { ProductionOperationsService } from '../../src/operations/production-operations.service';
import { FilmsService } from '../../src/catalog/films/films.service';
import { AuditService } from '../../src/audit/audit.service';
import { Film } from '../../src/catalog/films/entities/film.entity';
import { FilmAudit } from '../../src/audit/entities/film-audit.entity';
import { EquipmentAudit } from '../../src/audit/entities/equipment-audit.entity';
import { RoleAudit } from '../../src/audit/entities/role-audit.entity';
import { CrewMember } from '../../src/catalog/crew/entities/crew-member.entity';
import { Equipment } from '../../src/catalog/equipment/entities/equipment.entity';
import { ShootingLocation } from '../../src/catalog/locations/entities/shooting-location.entity';
import { LocationBooking } from '../../src/catalog/assignments/entities/location-booking.entity';
import { Actor } from '../../src/catalog/talent/entities/actor.entity';
import { RecordNotFoundException } from '../../src/common/exceptions/record-not-found.exception';
import { ValidationException } from '../../src/common/exceptions/validation.exception';
import { testDatabaseModules } from '../utils/test-database';
import { TestHelpers } from '../utils/test-helpers';

describe('Production operations (integration)', () => {
  let module: TestingModule;
  let operations: ProductionOperationsService;
  let filmsService: FilmsService;
  let auditService: AuditService;
  let dataSource: DataSource;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [...testDatabaseModules(), OperationsModule],
    }).compile();

    operations = module.get<ProductionOperationsService>(ProductionOperationsService);
    filmsService = module.get<FilmsService>(FilmsService);
    auditService = module.get<AuditService>(AuditService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(async () => {
    await TestHelpers.clearTables(dataSource, [
      FilmAudit,
      EquipmentAudit,
      RoleAudit,
      Film,
      Actor,
      CrewMember,
      Equipment,
      ShootingLocation,
    ]);
  });

  describe('addFilmWithGenres', () => {
    it('should make the first genre primary and drop repeats', async () => {
      const filmId = await operations.addFilmWithGenres({
        title: 'Night Train',
        budget: 2000000,
        genres: 'Action, Drama, action',
      });

      const film = await filmsService.findOne(filmId);
      expect(film.primary_genre).toBe('Action');
      expect(film.production_status).toBe('Pre-Production');

      const genres = await filmsService.listGenres(filmId);
      expect(genres.map((g) => [g.genre, g.is_primary])).toEqual([
        ['Action', true],
        ['Drama', false],
      ]);
    });

    it('should default the primary genre when none are given', async () => {
      const filmId = await operations.addFilmWithGenres({ title: 'Quiet Room', budget: 150000 });

      expect((await filmsService.findOne(filmId)).primary_genre).toBe('Drama');
      expect(await filmsService.listGenres(filmId)).toEqual([]);
    });

    it('should leave nothing behind when the budget is too low', async () => {
      await expect(
        operations.addFilmWithGenres({ title: 'Shoestring', budget: 5000, genres: ['Comedy'] }),
      ).rejects.toBeInstanceOf(ValidationException);

      expect(await dataSource.getRepository(Film).count()).toBe(0);
    });
  });

  describe('castActorInFilm', () => {
    it('should cast with zero screen time and audit the role', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const actor = await TestHelpers.seedActor(dataSource);

      const role = await operations.castActorInFilm({
        actor_id: actor.actor_id,
        film_id: film.film_id,
        character_name: 'Conductor',
        importance: 'Lead',
        salary: 120000,
      });

      expect(role).toMatchObject({ screen_time: 0, importance: 'Lead', salary: 120000 });
      expect((await auditService.queryRoleAudit({ film_id: film.film_id })).total).toBe(1);
    });

    it('should report an unknown actor', async () => {
      const film = await TestHelpers.seedFilm(dataSource);

      await expect(
        operations.castActorInFilm({ actor_id: 4242, film_id: film.film_id, character_name: 'Nobody', salary: 1 }),
      ).rejects.toThrow("Actor with ID '4242' not found");
    });

    it('should report an unknown film', async () => {
      const actor = await TestHelpers.seedActor(dataSource);

      await expect(
        operations.castActorInFilm({ actor_id: actor.actor_id, film_id: 4242, character_name: 'Nobody', salary: 1 }),
      ).rejects.toBeInstanceOf(RecordNotFoundException);
    });
  });

  describe('allocateCrewToFilm', () => {
    it('should take the department from the crew member', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const crew = await TestHelpers.seedCrew(dataSource, { department: 'Lighting' });

      const assignment = await operations.allocateCrewToFilm({
        crew_id: crew.crew_id,
        film_id: film.film_id,
        start_date: '2024-04-01',
      });

      expect(assignment).toMatchObject({ department: 'Lighting', start_date: '2024-04-01', end_date: null });
    });
  });

  describe('addShootingLocation', () => {
    it('should create the location and price the booking per inclusive day', async () => {
      const film = await TestHelpers.seedFilm(dataSource);

      const result = await operations.addShootingLocation({
        film_id: film.film_id,
        location_name: 'Harbour Pier',
        city: 'Portside',
        country: 'Nowhere',
        shooting_start: '2024-03-01',
        shooting_end: '2024-03-05',
        cost_per_day: 1000,
      });

      expect(result).toEqual({ location_id: expect.any(Number), total_days: 5, total_cost: 5000 });
    });

    it('should reuse a location with the same name and city', async () => {
      const first = await TestHelpers.seedFilm(dataSource, { title: 'First' });
      const second = await TestHelpers.seedFilm(dataSource, { title: 'Second' });
      const booking = {
        location_name: 'Old Mill',
        city: 'Riverton',
        shooting_start: '2024-05-10',
        shooting_end: '2024-05-10',
        cost_per_day: 700,
      };

      const a = await operations.addShootingLocation({ ...booking, film_id: first.film_id });
      const b = await operations.addShootingLocation({ ...booking, film_id: second.film_id });

      expect(b.location_id).toBe(a.location_id);
      expect(b).toMatchObject({ total_days: 1, total_cost: 700 });
      expect(await dataSource.getRepository(ShootingLocation).count()).toBe(1);
    });

    it('should reject a negative daily rate when reusing a location', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const booking = { location_name: 'Dock', city: 'Port', shooting_start: '2024-06-01', shooting_end: '2024-06-02' };
      await operations.addShootingLocation({ ...booking, film_id: film.film_id, cost_per_day: 400 });
      const other = await TestHelpers.seedFilm(dataSource, { title: 'Other' });

      await expect(
        operations.addShootingLocation({ ...booking, film_id: other.film_id, cost_per_day: -500 }),
      ).rejects.toThrow('Location cost per day cannot be negative');

      expect(await dataSource.getRepository(LocationBooking).countBy({ film_id: other.film_id })).toBe(0);
    });

    it('should roll back the new location when the dates are reversed', async () => {
      const film = await TestHelpers.seedFilm(dataSource);

      await expect(
        operations.addShootingLocation({
          film_id: film.film_id,
          location_name: 'Desert Flats',
          shooting_start: '2024-03-05',
          shooting_end: '2024-03-01',
          cost_per_day: 300,
        }),
      ).rejects.toThrow('Shooting end date cannot be before start date');

      expect(await dataSource.getRepository(ShootingLocation).count()).toBe(0);
    });
  });

  describe('updateProductionStatus', () => {
    it('should write both the status change and the operation entry', async () => {
      const film = await TestHelpers.seedFilm(dataSource, { title: 'Long Road' });

      const result = await operations.updateProductionStatus(film.film_id, 'Filming');

      expect(result.film.production_status).toBe('Filming');
      expect(result.message).toBe('Film status updated from Pre-Production to Filming');

      const { logs } = await auditService.queryFilmAudit({ film_id: film.film_id });
      expect(logs.map((log) => log.action).sort()).toEqual(['STATUS_CHANGE', 'STATUS_UPDATE']);
    });

    it('should write only the operation entry when the status is unchanged', async () => {
      const film = await TestHelpers.seedFilm(dataSource);

      const result = await operations.updateProductionStatus(film.film_id, 'Pre-Production');

      expect(result.message).toBe('Film status updated from Pre-Production to Pre-Production');
      const { logs } = await auditService.queryFilmAudit({ film_id: film.film_id });
      expect(logs.map((log) => log.action)).toEqual(['STATUS_UPDATE']);
    });
  });

  describe('updateEquipmentStatus', () => {
    it('should audit the availability transition', async () => {
      const equipment = await TestHelpers.seedEquipment(dataSource, { name: 'Steadicam' });

      const updated = await operations.updateEquipmentStatus(equipment.equipment_id, 'Under Maintenance');

      expect(updated.availability).toBe('Under Maintenance');
      const { logs } = await auditService.queryEquipmentAudit({ equipment_id: equipment.equipment_id });
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        equipment_name: 'Steadicam',
        old_availability: 'Available',
        new_availability: 'Under Maintenance',
      });
    });
  });
});
