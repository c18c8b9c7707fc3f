import { Injectable, Logger } from '@nestjs/common';
import { ValidationException } from '../common/exceptions/validation.exception';
import { CalendarUtil } from '../common/utils/calendar.util';
import type { Film } from '../catalog/films/entities/film.entity';
import type { Actor } from '../catalog/talent/entities/actor.entity';
import type { Equipment } from '../catalog/equipment/entities/equipment.entity';
import type { ShootingLocation } from '../catalog/locations/entities/shooting-location.entity';
import type { CrewMember } from '../catalog/crew/entities/crew-member.entity';
import type { CastRole } from '../catalog/casting/entities/cast-role.entity';
import type { LocationBooking } from '../catalog/assignments/entities/location-booking.entity';
import type { Distributor } from '../catalog/partners/entities/distributor.entity';

export const MINIMUM_FILM_BUDGET = 100_000;
export const MINIMUM_ACTOR_AGE = 18;
export const MAXIMUM_FILM_RATING = 10;

export type FilmCandidate = Pick<Film, 'budget'> & Partial<Pick<Film, 'rating' | 'duration' | 'title'>>;
export type CrewCandidate = Pick<CrewMember, 'experience_years'> &
  Partial<Pick<CrewMember, 'crew_id' | 'supervisor_id' | 'name'>>;

/**
 * Write Guard Service - business rules enforced before a governed record is written
 *
 * Each guard inspects only the proposed record and throws a ValidationException
 * carrying a stable rule id and the reason surfaced to the caller. Guards never
 * touch the store, so a rejected write leaves no trace and no audit row.
 */
@Injectable()
export class WriteGuardService {
  private readonly logger = new Logger(WriteGuardService.name);

  /**
   * Age is whole calendar years: current year minus birth year, month and day ignored
   */
  assertActorInsert(actor: Pick<Actor, 'dob'> & Partial<Pick<Actor, 'first_name' | 'last_name'>>, now: Date = new Date()): void {
    const age = CalendarUtil.yearsSince(actor.dob, now);
    if (age < MINIMUM_ACTOR_AGE) {
      this.reject('actor.min_age', 'Actor must be at least 18 years old', 'Actor', { dob: actor.dob, age });
    }
  }

  assertFilmInsert(film: FilmCandidate): void {
    this.assertFilmRecord(film);
  }

  /**
   * Checked against the merged record, so an update that leaves the budget untouched
   * still fails when the stored budget is below the minimum.
   */
  assertFilmUpdate(before: Pick<Film, 'film_id'>, after: FilmCandidate): void {
    this.assertFilmRecord(after, before.film_id);
  }

  assertEquipmentInsert(equipment: Pick<Equipment, 'cost'> & Partial<Pick<Equipment, 'name'>>): void {
    if (equipment.cost < 0) {
      this.reject('equipment.cost', 'Equipment cost cannot be negative', 'Equipment', { cost: equipment.cost });
    }
  }

  assertLocationInsert(location: Pick<ShootingLocation, 'cost_per_day'> & Partial<Pick<ShootingLocation, 'name'>>): void {
    if (location.cost_per_day < 0) {
      this.reject('location.cost_per_day', 'Location cost per day cannot be negative', 'ShootingLocation', {
        cost_per_day: location.cost_per_day,
      });
    }
  }

  assertCrewInsert(crew: CrewCandidate): void {
    this.assertExperience(crew);
    this.assertSupervision(crew);
  }

  assertCrewUpdate(crew: CrewCandidate): void {
    this.assertExperience(crew);
    this.assertSupervision(crew);
  }

  assertRoleInsert(role: Pick<CastRole, 'salary'> & Partial<Pick<CastRole, 'actor_id' | 'film_id' | 'character_name'>>): void {
    if (role.salary < 0) {
      this.reject('role.salary', 'Role salary cannot be negative', 'Role', { salary: role.salary });
    }
  }

  assertShotAtInsert(booking: Pick<LocationBooking, 'shooting_start' | 'shooting_end'>): void {
    if (!CalendarUtil.isCalendarDate(booking.shooting_start) || !CalendarUtil.isCalendarDate(booking.shooting_end)) {
      this.reject('shot_at.dates', 'Shooting dates must be valid calendar dates', 'ShotAt', {
        shooting_start: booking.shooting_start,
        shooting_end: booking.shooting_end,
      });
    }
    if (CalendarUtil.isBefore(booking.shooting_end, booking.shooting_start)) {
      this.reject('shot_at.dates', 'Shooting end date cannot be before start date', 'ShotAt', {
        shooting_start: booking.shooting_start,
        shooting_end: booking.shooting_end,
      });
    }
  }

  assertDistributorWrite(distributor: Pick<Distributor, 'market_share'>): void {
    if (distributor.market_share < 0 || distributor.market_share > 100) {
      this.reject('distributor.market_share', 'Market share must be between 0 and 100', 'Distributor', {
        market_share: distributor.market_share,
      });
    }
  }

  private assertFilmRecord(film: FilmCandidate, filmId?: number): void {
    const context = filmId === undefined ? {} : { film_id: filmId };

    if (film.budget < MINIMUM_FILM_BUDGET) {
      this.reject('film.min_budget', 'Minimum film budget is $100,000', 'Film', { ...context, budget: film.budget });
    }
    if (film.rating !== undefined && film.rating !== null && (film.rating < 0 || film.rating > MAXIMUM_FILM_RATING)) {
      this.reject('film.rating', 'Film rating must be between 0 and 10', 'Film', { ...context, rating: film.rating });
    }
    if (film.duration !== undefined && film.duration !== null && film.duration <= 0) {
      this.reject('film.duration', 'Film duration must be positive', 'Film', { ...context, duration: film.duration });
    }
  }

  private assertExperience(crew: CrewCandidate): void {
    if (crew.experience_years < 0) {
      this.reject('crew.experience', 'Experience years cannot be negative', 'Crew', {
        experience_years: crew.experience_years,
      });
    }
  }

  private assertSupervision(crew: CrewCandidate): void {
    if (crew.crew_id !== undefined && crew.supervisor_id !== undefined && crew.supervisor_id === crew.crew_id) {
      this.reject('crew.self_supervision', 'Crew member cannot supervise themselves', 'Crew', {
        crew_id: crew.crew_id,
      });
    }
  }

  private reject(rule: string, message: string, entity: string, context: Record<string, unknown>): never {
    this.logger.warn(`Rejected ${entity} write: ${message} (${rule})`);
    throw new ValidationException(rule, message, { entity, ...context });
  }
}
