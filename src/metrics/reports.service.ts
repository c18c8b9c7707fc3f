import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThan, Repository } from 'typeorm';
import { Film, ProductionStatus } from '../catalog/films/entities/film.entity';
import { Scene } from '../catalog/films/entities/scene.entity';
import { SceneFilming } from '../catalog/films/entities/scene-filming.entity';
import { CastRole, RoleImportance } from '../catalog/casting/entities/cast-role.entity';
import { Producer } from '../catalog/talent/entities/producer.entity';
import { Distributor } from '../catalog/partners/entities/distributor.entity';
import { FilmProducer } from '../catalog/assignments/entities/film-producer.entity';
import { FilmDistribution } from '../catalog/assignments/entities/film-distribution.entity';
import { CrewAssignment } from '../catalog/assignments/entities/crew-assignment.entity';
import { LocationBooking } from '../catalog/assignments/entities/location-booking.entity';
import { EquipmentUsage } from '../catalog/equipment/entities/equipment-usage.entity';
import { RecordNotFoundException } from '../common/exceptions/record-not-found.exception';
import { CalendarUtil } from '../common/utils/calendar.util';
import { roundCurrency } from '../common/utils/money.util';
import { filmProfit, filmRoi } from './metrics.service';

export interface FilmProductionSummary {
  film_id: number;
  title: string;
  production_status: ProductionStatus;
  budget: number;
  duration: number | null;
  director: string | null;
  total_actors: number;
  total_scenes: number;
  total_crew: number;
  total_locations: number;
}

export interface FilmProfitabilityRow {
  film_id: number;
  title: string;
  release_date: string | null;
  budget: number;
  boxoffice_collection: number;
  profit: number;
  roi_percentage: number;
  rating: number | null;
  production_status: ProductionStatus;
}

export interface BoxOfficeRow extends FilmProfitabilityRow {
  director: string | null;
  cast_size: number;
}

export interface ActorFilmographyRow {
  film_id: number;
  title: string;
  release_date: string | null;
  duration: number | null;
  language: string | null;
  character_name: string;
  screen_time: number;
  importance: RoleImportance;
  salary: number;
  director_name: string | null;
}

export interface ProducerInvestmentReport {
  producer_id: number;
  name: string;
  company: string | null;
  total_films: number;
  total_investment: number;
  avg_investment: number;
  max_investment: number;
  min_investment: number;
}

export interface CrewPayrollRow {
  crew_id: number;
  name: string;
  role: string;
  department: string | null;
  start_date: string | null;
  end_date: string | null;
  working_days: number | null;
  shoots: number;
  total_minutes: number;
}

export interface DistributorPerformanceRow {
  distributor_id: number;
  name: string;
  region: string | null;
  market_share: number;
  films_distributed: number;
  total_fees: number;
  avg_boxoffice: number;
}

export interface EquipmentUsageRow {
  equipment_id: number;
  name: string;
  type: string | null;
  cost: number;
  usage_start: string | null;
  usage_end: string | null;
  times_used: number;
  crew_members_used: number;
}

/**
 * Reports Service - read-only production reports
 */
@Injectable()
export class ReportsService {
  constructor(
    @InjectRepository(Film)
    private filmRepository: Repository<Film>,
    @InjectRepository(Scene)
    private sceneRepository: Repository<Scene>,
    @InjectRepository(SceneFilming)
    private filmingRepository: Repository<SceneFilming>,
    @InjectRepository(CastRole)
    private roleRepository: Repository<CastRole>,
    @InjectRepository(Producer)
    private producerRepository: Repository<Producer>,
    @InjectRepository(Distributor)
    private distributorRepository: Repository<Distributor>,
    @InjectRepository(FilmProducer)
    private producerLinkRepository: Repository<FilmProducer>,
    @InjectRepository(FilmDistribution)
    private distributionRepository: Repository<FilmDistribution>,
    @InjectRepository(CrewAssignment)
    private crewAssignmentRepository: Repository<CrewAssignment>,
    @InjectRepository(LocationBooking)
    private locationBookingRepository: Repository<LocationBooking>,
    @InjectRepository(EquipmentUsage)
    private usageRepository: Repository<EquipmentUsage>,
  ) {}

  async filmProductionSummary(filmId: number): Promise<FilmProductionSummary> {
    const film = await this.filmRepository.findOne({ where: { film_id: filmId }, relations: { director: true } });
    if (!film) {
      throw new RecordNotFoundException('Film', filmId);
    }

    const roles = await this.roleRepository.find({ where: { film_id: filmId } });

    return {
      film_id: film.film_id,
      title: film.title,
      production_status: film.production_status,
      budget: film.budget,
      duration: film.duration,
      director: film.director?.name ?? null,
      total_actors: new Set(roles.map((role) => role.actor_id)).size,
      total_scenes: await this.sceneRepository.count({ where: { film_id: filmId } }),
      total_crew: await this.crewAssignmentRepository.count({ where: { film_id: filmId } }),
      total_locations: await this.locationBookingRepository.count({ where: { film_id: filmId } }),
    };
  }

  /**
   * Every film with profit and ROI, most profitable first
   */
  async filmProfitability(): Promise<FilmProfitabilityRow[]> {
    const films = await this.filmRepository.find({ order: { film_id: 'ASC' } });
    return films.map(toProfitabilityRow).sort((a, b) => b.profit - a.profit);
  }

  /**
   * Films that have earned at the box office, highest grossing first
   */
  async boxOfficeAnalysis(): Promise<BoxOfficeRow[]> {
    const films = await this.filmRepository.find({
      where: { boxoffice_collection: MoreThan(0) },
      relations: { director: true },
      order: { boxoffice_collection: 'DESC', film_id: 'ASC' },
    });

    const rows: BoxOfficeRow[] = [];
    for (const film of films) {
      const roles = await this.roleRepository.find({ where: { film_id: film.film_id } });
      rows.push({
        ...toProfitabilityRow(film),
        director: film.director?.name ?? null,
        cast_size: new Set(roles.map((role) => role.actor_id)).size,
      });
    }
    return rows;
  }

  /**
   * A director's films with profitability, most recent release first
   */
  async directorFilmography(directorId: number): Promise<FilmProfitabilityRow[]> {
    const films = await this.filmRepository.find({ where: { director_id: directorId }, order: { film_id: 'ASC' } });
    return films.map(toProfitabilityRow).sort((a, b) => compareReleaseDesc(a.release_date, b.release_date));
  }

  async actorFilmography(actorId: number): Promise<ActorFilmographyRow[]> {
    const roles = await this.roleRepository.find({
      where: { actor_id: actorId },
      relations: { film: { director: true } },
      order: { role_id: 'ASC' },
    });

    return roles
      .filter((role): role is CastRole & { film: Film } => role.film !== undefined)
      .map((role) => ({
        film_id: role.film.film_id,
        title: role.film.title,
        release_date: role.film.release_date,
        duration: role.film.duration,
        language: role.film.language,
        character_name: role.character_name,
        screen_time: role.screen_time,
        importance: role.importance,
        salary: role.salary,
        director_name: role.film.director?.name ?? null,
      }))
      .sort((a, b) => compareReleaseDesc(a.release_date, b.release_date));
  }

  async producerInvestment(producerId: number): Promise<ProducerInvestmentReport> {
    const producer = await this.producerRepository.findOne({ where: { producer_id: producerId } });
    if (!producer) {
      throw new RecordNotFoundException('Producer', producerId);
    }

    const investments = (await this.producerLinkRepository.find({ where: { producer_id: producerId } })).map(
      (link) => link.investment,
    );
    const total = investments.reduce((sum, value) => sum + value, 0);

    return {
      producer_id: producer.producer_id,
      name: producer.name,
      company: producer.company,
      total_films: investments.length,
      total_investment: roundCurrency(total),
      avg_investment: investments.length ? roundCurrency(total / investments.length) : 0,
      max_investment: investments.length ? Math.max(...investments) : 0,
      min_investment: investments.length ? Math.min(...investments) : 0,
    };
  }

  /**
   * Crew working on a film with their assignment span and recorded filming time
   */
  async crewPayroll(filmId: number): Promise<CrewPayrollRow[]> {
    const assignments = await this.crewAssignmentRepository.find({
      where: { film_id: filmId },
      relations: { crew: true },
      order: { crew_id: 'ASC' },
    });
    const filmings = await this.filmingRepository.find({ where: { film_id: filmId } });

    return assignments
      .filter((assignment): assignment is CrewAssignment & { crew: NonNullable<CrewAssignment['crew']> } =>
        assignment.crew !== undefined,
      )
      .map((assignment) => {
        const shoots = filmings.filter((filming) => filming.crew_id === assignment.crew_id);
        return {
          crew_id: assignment.crew_id,
          name: assignment.crew.name,
          role: assignment.crew.role,
          department: assignment.department ?? assignment.crew.department,
          start_date: assignment.start_date,
          end_date: assignment.end_date,
          working_days:
            assignment.start_date && assignment.end_date
              ? CalendarUtil.inclusiveDayCount(assignment.start_date, assignment.end_date)
              : null,
          shoots: shoots.length,
          total_minutes: shoots.reduce((sum, filming) => sum + (filming.duration_minutes ?? 0), 0),
        };
      });
  }

  /**
   * Distributors with their distribution totals, highest fees first
   */
  async distributorPerformance(): Promise<DistributorPerformanceRow[]> {
    const distributors = await this.distributorRepository.find({ order: { distributor_id: 'ASC' } });
    const links = await this.distributionRepository.find({ relations: { film: true } });

    return distributors
      .map((distributor) => {
        const own = links.filter((link) => link.distributor_id === distributor.distributor_id);
        const grosses = own.map((link) => link.film?.boxoffice_collection ?? 0);
        return {
          distributor_id: distributor.distributor_id,
          name: distributor.name,
          region: distributor.region,
          market_share: distributor.market_share,
          films_distributed: new Set(own.map((link) => link.film_id)).size,
          total_fees: roundCurrency(own.reduce((sum, link) => sum + link.distribution_fee, 0)),
          avg_boxoffice: grosses.length
            ? roundCurrency(grosses.reduce((sum, value) => sum + value, 0) / grosses.length)
            : 0,
        };
      })
      .sort((a, b) => b.total_fees - a.total_fees);
  }

  /**
   * Equipment assigned to a film and how often each piece appears in its scene filmings
   */
  async equipmentUsage(filmId: number): Promise<EquipmentUsageRow[]> {
    const usages = await this.usageRepository.find({
      where: { film_id: filmId },
      relations: { equipment: true },
      order: { equipment_id: 'ASC' },
    });
    const filmings = await this.filmingRepository.find({ where: { film_id: filmId } });

    return usages
      .filter((usage): usage is EquipmentUsage & { equipment: NonNullable<EquipmentUsage['equipment']> } =>
        usage.equipment !== undefined,
      )
      .map((usage) => {
        const shots = filmings.filter((filming) => filming.equipment_id === usage.equipment_id);
        return {
          equipment_id: usage.equipment_id,
          name: usage.equipment.name,
          type: usage.equipment.type,
          cost: usage.equipment.cost,
          usage_start: usage.usage_start,
          usage_end: usage.usage_end,
          times_used: shots.length,
          crew_members_used: new Set(shots.map((filming) => filming.crew_id)).size,
        };
      });
  }
}

function toProfitabilityRow(film: Film): FilmProfitabilityRow {
  return {
    film_id: film.film_id,
    title: film.title,
    release_date: film.release_date,
    budget: film.budget,
    boxoffice_collection: film.boxoffice_collection,
    profit: filmProfit(film),
    roi_percentage: filmRoi(film),
    rating: film.rating,
    production_status: film.production_status,
  };
}

// unreleased films sort last
function compareReleaseDesc(a: string | null, b: string | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a < b ? 1 : -1;
}
