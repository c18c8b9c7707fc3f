import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { MetricsModule } from '../../src/metrics/metrics.module';
import { MetricsService } from '../../src/metrics/metrics.service';
import { ReportsService } from '../../src/metrics/reports.service';
import { Film } from '../../src/catalog/films/entities/film.entity';
import { Scene } from '../../src/catalog/films/entities/scene.entity';
import { SceneFilming } from '../../src/catalog/films/entities/scene-filming.entity';
import { CastRole } from '../../src/catalog/casting/entities/cast-role.entity';
import { FilmProducer } from '../../src/catalog/assignments/entities/film-producer.entity';
import { FilmDistribution } from '../../src/catalog/assignments/entities/film-distribution.entity';
import { CrewAssignment } from '../../src/catalog/assignments/entities/crew-assignment.entity';
import { EquipmentUsage } from '../../src/catalog/equipment/entities/equipment-usage.entity';
import { Actor } from '../../src/catalog/talent/entities/actor.entity';
import { Director } from '../../src/catalog/talent/entities/director.entity';
import { Producer } from '../../src/catalog/talent/entities/producer.entity';
import { CrewMember } from '../../src/catalog/crew/entities/crew-member.entity';
import { Equipment } from '../../src/catalog/equipment/entities/equipment.entity';
import { Distributor } from '../../src/catalog/partners/entities/distributor.entity';
import { RecordNotFoundException } from '../../src/common/exceptions/record-not-found.exception';
import { testDatabaseModules } from '../utils/test-database';
import { TestHelpers } from '../utils/test-helpers';

describe('Metrics and reports (integration)', () => {
  let module: TestingModule;
  let metrics: MetricsService;
  let reports: ReportsService;
  let dataSource: DataSource;

  const addRole = (film: Film, actor: Actor, character_name: string, salary: number, screen_time = 0) =>
    dataSource.getRepository(CastRole).save({
      film_id: film.film_id,
      actor_id: actor.actor_id,
      character_name,
      salary,
      screen_time,
      importance: 'Supporting' as const,
    });

  const addFilming = async (film: Film, crew: CrewMember, duration_minutes: number | null, equipment?: Equipment) => {
    const scene = await dataSource.getRepository(Scene).save({ film_id: film.film_id, location: 'Stage 1' });
    return dataSource.getRepository(SceneFilming).save({
      film_id: film.film_id,
      scene_id: scene.scene_id,
      crew_id: crew.crew_id,
      equipment_id: equipment?.equipment_id ?? null,
      duration_minutes,
    });
  };

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [...testDatabaseModules(), MetricsModule],
    }).compile();

    metrics = module.get<MetricsService>(MetricsService);
    reports = module.get<ReportsService>(ReportsService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(async () => {
    await TestHelpers.clearTables(dataSource, [Film, Actor, Director, Producer, CrewMember, Equipment, Distributor]);
  });

  describe('MetricsService', () => {
    it('should compute profit and ROI', async () => {
      const film = await TestHelpers.seedFilm(dataSource, { budget: 1000000, boxoffice_collection: 3500000 });

      expect(await metrics.profit(film.film_id)).toBe(2500000);
      expect(await metrics.roi(film.film_id)).toBe(250);
    });

    it('should report zero ROI for a film without budget', async () => {
      const film = await TestHelpers.seedFilm(dataSource, { budget: 0, boxoffice_collection: 1000 });

      expect(await metrics.profit(film.film_id)).toBe(1000);
      expect(await metrics.roi(film.film_id)).toBe(0);
    });

    it('should return neutral defaults for missing subjects', async () => {
      expect(await metrics.profit(999)).toBe(0);
      expect(await metrics.roi(999)).toBe(0);
      expect(await metrics.actorAge(999)).toBe(0);
      expect(await metrics.producerTotalInvestment(999)).toBe(0);
      expect(await metrics.filmAverageCastSalary(999)).toBe(0);
      expect(await metrics.equipmentAvailability(999)).toBe('Unknown');
    });

    it('should compute an actor age by calendar year', async () => {
      const actor = await TestHelpers.seedActor(dataSource, { dob: '1990-12-31' });

      expect(await metrics.actorAge(actor.actor_id, new Date(2024, 0, 1))).toBe(34);
    });

    it('should count the films of a director', async () => {
      const director = await TestHelpers.seedDirector(dataSource);
      await TestHelpers.seedFilm(dataSource, { title: 'One', director_id: director.director_id });
      await TestHelpers.seedFilm(dataSource, { title: 'Two', director_id: director.director_id });
      await TestHelpers.seedFilm(dataSource, { title: 'Other' });

      expect(await metrics.directorFilmCount(director.director_id)).toBe(2);
    });

    it('should sum a producer investment across films', async () => {
      const producer = await TestHelpers.seedProducer(dataSource);
      const first = await TestHelpers.seedFilm(dataSource, { title: 'First' });
      const second = await TestHelpers.seedFilm(dataSource, { title: 'Second' });
      await dataSource.getRepository(FilmProducer).save([
        { film_id: first.film_id, producer_id: producer.producer_id, investment: 100000.5 },
        { film_id: second.film_id, producer_id: producer.producer_id, investment: 250000 },
      ]);

      expect(await metrics.producerTotalInvestment(producer.producer_id)).toBe(350000.5);
    });

    it('should sum filming minutes and ignore filmings without a duration', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const crew = await TestHelpers.seedCrew(dataSource);
      await addFilming(film, crew, 45);
      await addFilming(film, crew, 30);
      await addFilming(film, crew, null);

      expect(await metrics.filmTotalCrewMinutes(film.film_id)).toBe(75);
      expect(await metrics.filmSceneCount(film.film_id)).toBe(3);
    });

    it('should average cast salaries to cents', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const actor = await TestHelpers.seedActor(dataSource);
      await addRole(film, actor, 'A', 1000);
      await addRole(film, actor, 'B', 2000);
      await addRole(film, actor, 'C', 4000);

      expect(await metrics.filmAverageCastSalary(film.film_id)).toBe(2333.33);
    });

    it('should total screen time across every character the actor plays', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const actor = await TestHelpers.seedActor(dataSource);
      await addRole(film, actor, 'Before', 0, 12);
      await addRole(film, actor, 'After', 0, 20);

      expect(await metrics.actorScreenTime(actor.actor_id, film.film_id)).toBe(32);
    });

    it('should report equipment availability', async () => {
      const equipment = await TestHelpers.seedEquipment(dataSource, { availability: 'In Use' });

      expect(await metrics.equipmentAvailability(equipment.equipment_id)).toBe('In Use');
    });
  });

  describe('ReportsService', () => {
    it('should summarize a film production', async () => {
      const director = await TestHelpers.seedDirector(dataSource, { name: 'Mara Quill' });
      const film = await TestHelpers.seedFilm(dataSource, { director_id: director.director_id });
      const actor = await TestHelpers.seedActor(dataSource);
      const crew = await TestHelpers.seedCrew(dataSource);
      await addRole(film, actor, 'Twin A', 10);
      await addRole(film, actor, 'Twin B', 10);
      await addFilming(film, crew, 10);
      await dataSource.getRepository(CrewAssignment).save({ film_id: film.film_id, crew_id: crew.crew_id });

      expect(await reports.filmProductionSummary(film.film_id)).toMatchObject({
        director: 'Mara Quill',
        total_actors: 1,
        total_scenes: 1,
        total_crew: 1,
        total_locations: 0,
      });
    });

    it('should reject a summary for a missing film', async () => {
      await expect(reports.filmProductionSummary(999)).rejects.toBeInstanceOf(RecordNotFoundException);
    });

    it('should order films by profit and list only earners at the box office', async () => {
      await TestHelpers.seedFilm(dataSource, { title: 'Flop', budget: 500000, boxoffice_collection: 0 });
      const hit = await TestHelpers.seedFilm(dataSource, { title: 'Hit', budget: 500000, boxoffice_collection: 900000 });

      expect((await reports.filmProfitability()).map((row) => [row.title, row.profit])).toEqual([
        ['Hit', 400000],
        ['Flop', -500000],
      ]);

      const boxOffice = await reports.boxOfficeAnalysis();
      expect(boxOffice.map((row) => row.film_id)).toEqual([hit.film_id]);
      expect(boxOffice[0]).toMatchObject({ roi_percentage: 80, cast_size: 0, director: null });
    });

    it('should list a filmography newest first with undated films last', async () => {
      const director = await TestHelpers.seedDirector(dataSource);
      const id = director.director_id;
      await TestHelpers.seedFilm(dataSource, { title: 'Undated', director_id: id });
      await TestHelpers.seedFilm(dataSource, { title: 'Early', director_id: id, release_date: '2001-05-01' });
      await TestHelpers.seedFilm(dataSource, { title: 'Late', director_id: id, release_date: '2019-09-20' });

      expect((await reports.directorFilmography(id)).map((row) => row.title)).toEqual(['Late', 'Early', 'Undated']);
    });

    it('should summarize a producer investment', async () => {
      const producer = await TestHelpers.seedProducer(dataSource, { name: 'Ada Finch' });
      const first = await TestHelpers.seedFilm(dataSource, { title: 'First' });
      const second = await TestHelpers.seedFilm(dataSource, { title: 'Second' });
      await dataSource.getRepository(FilmProducer).save([
        { film_id: first.film_id, producer_id: producer.producer_id, investment: 100000 },
        { film_id: second.film_id, producer_id: producer.producer_id, investment: 300000 },
      ]);

      expect(await reports.producerInvestment(producer.producer_id)).toMatchObject({
        name: 'Ada Finch',
        total_films: 2,
        total_investment: 400000,
        avg_investment: 200000,
        max_investment: 300000,
        min_investment: 100000,
      });
    });

    it('should build the crew payroll from assignments and filmings', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const crew = await TestHelpers.seedCrew(dataSource, { name: 'Sol Reyes', department: 'Sound' });
      await dataSource.getRepository(CrewAssignment).save({
        film_id: film.film_id,
        crew_id: crew.crew_id,
        start_date: '2024-02-01',
        end_date: '2024-02-10',
        department: null,
      });
      await addFilming(film, crew, 90);
      await addFilming(film, crew, 60);

      expect(await reports.crewPayroll(film.film_id)).toEqual([
        {
          crew_id: crew.crew_id,
          name: 'Sol Reyes',
          role: 'Grip',
          department: 'Sound',
          start_date: '2024-02-01',
          end_date: '2024-02-10',
          working_days: 10,
          shoots: 2,
          total_minutes: 150,
        },
      ]);
    });

    it('should rank distributors by total fees', async () => {
      const small = await TestHelpers.seedDistributor(dataSource, { name: 'Small Reels' });
      const big = await TestHelpers.seedDistributor(dataSource, { name: 'Big Screens' });
      const film = await TestHelpers.seedFilm(dataSource, { boxoffice_collection: 800000 });
      await dataSource.getRepository(FilmDistribution).save([
        { film_id: film.film_id, distributor_id: small.distributor_id, distribution_fee: 1000 },
        { film_id: film.film_id, distributor_id: big.distributor_id, distribution_fee: 50000 },
      ]);

      const rows = await reports.distributorPerformance();
      expect(rows.map((row) => [row.name, row.total_fees, row.films_distributed, row.avg_boxoffice])).toEqual([
        ['Big Screens', 50000, 1, 800000],
        ['Small Reels', 1000, 1, 800000],
      ]);
    });

    it('should count how often assigned equipment was used', async () => {
      const film = await TestHelpers.seedFilm(dataSource);
      const crewA = await TestHelpers.seedCrew(dataSource, { name: 'A' });
      const crewB = await TestHelpers.seedCrew(dataSource, { name: 'B' });
      const camera = await TestHelpers.seedEquipment(dataSource, { name: 'Camera A' });
      await dataSource.getRepository(EquipmentUsage).save({ film_id: film.film_id, equipment_id: camera.equipment_id });
      await addFilming(film, crewA, 20, camera);
      await addFilming(film, crewB, 20, camera);
      await addFilming(film, crewB, 20, camera);

      expect(await reports.equipmentUsage(film.film_id)).toEqual([
        expect.objectContaining({ name: 'Camera A', times_used: 3, crew_members_used: 2 }),
      ]);
    });
  });
});
