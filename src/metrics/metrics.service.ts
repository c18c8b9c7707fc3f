import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ObjectLiteral, Repository, SelectQueryBuilder } from 'typeorm';
import { Film } from '../catalog/films/entities/film.entity';
import { Scene } from '../catalog/films/entities/scene.entity';
import { SceneFilming } from '../catalog/films/entities/scene-filming.entity';
import { Actor } from '../catalog/talent/entities/actor.entity';
import { CastRole } from '../catalog/casting/entities/cast-role.entity';
import { FilmProducer } from '../catalog/assignments/entities/film-producer.entity';
import { Equipment } from '../catalog/equipment/entities/equipment.entity';
import { CalendarUtil } from '../common/utils/calendar.util';
import { roundCurrency, roundPercentage } from '../common/utils/money.util';

export type EquipmentAvailabilityResult = Equipment['availability'] | 'Unknown';

/**
 * Box office minus budget
 */
export function filmProfit(film: Pick<Film, 'budget' | 'boxoffice_collection'>): number {
  return roundCurrency((film.boxoffice_collection ?? 0) - (film.budget ?? 0));
}

/**
 * Profit as a percentage of budget; 0 when there is no positive budget
 */
export function filmRoi(film: Pick<Film, 'budget' | 'boxoffice_collection'>): number {
  if (!(film.budget > 0)) {
    return 0;
  }
  return roundPercentage((filmProfit(film) / film.budget) * 100);
}

/**
 * Metrics Service - derived values over the production records
 *
 * Read-only. A missing subject yields a neutral default (0 or 'Unknown')
 * instead of an error.
 */
@Injectable()
export class MetricsService {
  constructor(
    @InjectRepository(Film)
    private filmRepository: Repository<Film>,
    @InjectRepository(Actor)
    private actorRepository: Repository<Actor>,
    @InjectRepository(Scene)
    private sceneRepository: Repository<Scene>,
    @InjectRepository(SceneFilming)
    private filmingRepository: Repository<SceneFilming>,
    @InjectRepository(CastRole)
    private roleRepository: Repository<CastRole>,
    @InjectRepository(FilmProducer)
    private producerLinkRepository: Repository<FilmProducer>,
    @InjectRepository(Equipment)
    private equipmentRepository: Repository<Equipment>,
  ) {}

  async profit(filmId: number): Promise<number> {
    const film = await this.filmRepository.findOne({ where: { film_id: filmId } });
    return film ? filmProfit(film) : 0;
  }

  async roi(filmId: number): Promise<number> {
    const film = await this.filmRepository.findOne({ where: { film_id: filmId } });
    return film ? filmRoi(film) : 0;
  }

  /**
   * Calendar-year age, matching the minimum-age rule
   */
  async actorAge(actorId: number, now: Date = new Date()): Promise<number> {
    const actor = await this.actorRepository.findOne({ where: { actor_id: actorId } });
    return actor ? CalendarUtil.yearsSince(actor.dob, now) : 0;
  }

  async directorFilmCount(directorId: number): Promise<number> {
    return this.filmRepository.count({ where: { director_id: directorId } });
  }

  async producerTotalInvestment(producerId: number): Promise<number> {
    const query = this.producerLinkRepository
      .createQueryBuilder('link')
      .select('COALESCE(SUM(link.investment), 0)', 'value')
      .where('link.producer_id = :producerId', { producerId });
    return roundCurrency(await scalar(query));
  }

  /**
   * Sum of scene-filming minutes recorded for the film
   */
  async filmTotalCrewMinutes(filmId: number): Promise<number> {
    const query = this.filmingRepository
      .createQueryBuilder('filming')
      .select('COALESCE(SUM(filming.duration_minutes), 0)', 'value')
      .where('filming.film_id = :filmId', { filmId });
    return scalar(query);
  }

  async filmSceneCount(filmId: number): Promise<number> {
    return this.sceneRepository.count({ where: { film_id: filmId } });
  }

  async filmAverageCastSalary(filmId: number): Promise<number> {
    const query = this.roleRepository
      .createQueryBuilder('role')
      .select('COALESCE(AVG(role.salary), 0)', 'value')
      .where('role.film_id = :filmId', { filmId });
    return roundCurrency(await scalar(query));
  }

  /**
   * Total screen time across every character the actor plays in the film
   */
  async actorScreenTime(actorId: number, filmId: number): Promise<number> {
    const query = this.roleRepository
      .createQueryBuilder('role')
      .select('COALESCE(SUM(role.screen_time), 0)', 'value')
      .where('role.actor_id = :actorId', { actorId })
      .andWhere('role.film_id = :filmId', { filmId });
    return scalar(query);
  }

  async equipmentAvailability(equipmentId: number): Promise<EquipmentAvailabilityResult> {
    const equipment = await this.equipmentRepository.findOne({ where: { equipment_id: equipmentId } });
    return equipment?.availability ?? 'Unknown';
  }
}

async function scalar<T extends ObjectLiteral>(query: SelectQueryBuilder<T>): Promise<number> {
  const row = await query.getRawOne<{ value: string | number | null }>();
  return Number(row?.value ?? 0);
}
