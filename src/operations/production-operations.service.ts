import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { FilmsService, normalizeGenres } from '../catalog/films/films.service';
import { CastingService } from '../catalog/casting/casting.service';
import { AssignmentsService } from '../catalog/assignments/assignments.service';
import { LocationsService } from '../catalog/locations/locations.service';
import { EquipmentService } from '../catalog/equipment/equipment.service';
import { Film, ProductionStatus } from '../catalog/films/entities/film.entity';
import { Actor } from '../catalog/talent/entities/actor.entity';
import { CastRole } from '../catalog/casting/entities/cast-role.entity';
import { CrewAssignment } from '../catalog/assignments/entities/crew-assignment.entity';
import { Equipment, Availability } from '../catalog/equipment/entities/equipment.entity';
import { CreateFilmDto } from '../catalog/films/dto/create-film.dto';
import { AuditService } from '../audit/audit.service';
import {
  AccessControlService,
  AccountWithCapabilities,
  CreateUserInput,
} from '../auth/access-control.service';
import { RecordNotFoundException } from '../common/exceptions/record-not-found.exception';
import { CastActorInFilmDto } from './dto/cast-actor-in-film.dto';
import { AllocateCrewDto } from './dto/allocate-crew.dto';
import { AddShootingLocationDto } from './dto/add-shooting-location.dto';

export const DEFAULT_PRIMARY_GENRE = 'Drama';

export type AddFilmWithGenresInput = Omit<CreateFilmDto, 'primary_genre' | 'production_status'> & {
  genres?: string | string[];
};

export interface ShootingLocationResult {
  location_id: number;
  total_days: number;
  total_cost: number;
}

export interface ProductionStatusResult {
  film: Film;
  message: string;
}

/**
 * Production Operations Service - composed production use cases
 *
 * Every operation runs in a single transaction: a failed guard or write leaves
 * neither records nor audit rows behind.
 */
@Injectable()
export class ProductionOperationsService {
  private readonly logger = new Logger(ProductionOperationsService.name);

  constructor(
    private dataSource: DataSource,
    private filmsService: FilmsService,
    private castingService: CastingService,
    private assignmentsService: AssignmentsService,
    private locationsService: LocationsService,
    private equipmentService: EquipmentService,
    private auditService: AuditService,
    private accessControlService: AccessControlService,
  ) {}

  /**
   * Create a film in pre-production with its genres; the first genre becomes the primary one
   */
  async addFilmWithGenres(input: AddFilmWithGenresInput): Promise<number> {
    const { genres, ...film } = input;
    const list = normalizeGenres(typeof genres === 'string' ? genres.split(',') : genres ?? []);

    const filmId = await this.dataSource.transaction(async (tx) => {
      const created = await this.filmsService.create(
        { ...film, primary_genre: list[0] ?? DEFAULT_PRIMARY_GENRE, production_status: 'Pre-Production' },
        tx,
      );
      await this.filmsService.addGenres(created.film_id, list, tx);
      return created.film_id;
    });

    this.logger.log(`Film ${filmId} added with ${list.length} genre(s)`);
    return filmId;
  }

  async castActorInFilm(dto: CastActorInFilmDto): Promise<CastRole> {
    return this.dataSource.transaction(async (tx) => {
      const actor = await tx.findOne(Actor, { where: { actor_id: dto.actor_id } });
      if (!actor) {
        throw new RecordNotFoundException('Actor', dto.actor_id);
      }
      await this.filmsService.findOne(dto.film_id, tx);

      return this.castingService.cast(
        {
          actor_id: dto.actor_id,
          film_id: dto.film_id,
          character_name: dto.character_name,
          importance: dto.importance,
          salary: dto.salary,
          screen_time: 0,
        },
        tx,
      );
    });
  }

  /**
   * Assign a crew member to a film under the department recorded on the crew member
   */
  async allocateCrewToFilm(dto: AllocateCrewDto): Promise<CrewAssignment> {
    return this.dataSource.transaction(async (tx) => {
      await this.filmsService.findOne(dto.film_id, tx);
      return this.assignmentsService.assignCrew(
        dto.film_id,
        { crew_id: dto.crew_id, start_date: dto.start_date, end_date: dto.end_date },
        tx,
      );
    });
  }

  /**
   * Book a location for a film, reusing a location with the same name and city
   * or creating it first
   */
  async addShootingLocation(dto: AddShootingLocationDto): Promise<ShootingLocationResult> {
    return this.dataSource.transaction(async (tx) => {
      await this.filmsService.findOne(dto.film_id, tx);

      const location =
        (await this.locationsService.findByNameAndCity(dto.location_name, dto.city, tx)) ??
        (await this.locationsService.create(
          { name: dto.location_name, city: dto.city, country: dto.country, cost_per_day: dto.cost_per_day },
          tx,
        ));

      const { booking, total_days } = await this.assignmentsService.bookLocation(
        dto.film_id,
        {
          location_id: location.location_id,
          shooting_start: dto.shooting_start,
          shooting_end: dto.shooting_end,
          cost_per_day: dto.cost_per_day,
        },
        tx,
      );

      return { location_id: location.location_id, total_days, total_cost: booking.total_cost };
    });
  }

  /**
   * Move a film to a new production status. The write records a STATUS_CHANGE
   * entry when the status differs; the operation always records a STATUS_UPDATE entry.
   */
  async updateProductionStatus(filmId: number, newStatus: ProductionStatus): Promise<ProductionStatusResult> {
    return this.dataSource.transaction(async (tx) => {
      const current = await this.filmsService.findOne(filmId, tx);
      const oldStatus = current.production_status;

      const film = await this.filmsService.update(filmId, { production_status: newStatus }, tx);
      const entry = await this.auditService.recordStatusUpdate(tx, film, oldStatus, newStatus);

      return { film, message: entry.message ?? `Film status updated from ${oldStatus} to ${newStatus}` };
    });
  }

  async updateEquipmentStatus(equipmentId: number, availability: Availability): Promise<Equipment> {
    return this.dataSource.transaction((tx) => this.equipmentService.updateAvailability(equipmentId, availability, tx));
  }

  async createUser(caller: string, input: CreateUserInput): Promise<AccountWithCapabilities> {
    return this.dataSource.transaction((tx) => this.accessControlService.createUser(caller, input, tx));
  }

  async updateLogin(username: string, success: boolean, ipAddress?: string): Promise<void> {
    await this.dataSource.transaction((tx) => this.accessControlService.recordLogin(username, success, ipAddress, tx));
  }
}
