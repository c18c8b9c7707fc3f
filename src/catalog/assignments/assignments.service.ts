import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { FilmProducer } from './entities/film-producer.entity';
import { FilmDistribution } from './entities/film-distribution.entity';
import { StudioBooking } from './entities/studio-booking.entity';
import { CrewAssignment } from './entities/crew-assignment.entity';
import { LocationBooking } from './entities/location-booking.entity';
import { CrewMember } from '../crew/entities/crew-member.entity';
import { ShootingLocation } from '../locations/entities/shooting-location.entity';
import { CreateFilmProducerDto } from './dto/create-film-producer.dto';
import { CreateFilmDistributionDto } from './dto/create-film-distribution.dto';
import { CreateStudioBookingDto } from './dto/create-studio-booking.dto';
import { CreateCrewAssignmentDto } from './dto/create-crew-assignment.dto';
import { CreateLocationBookingDto } from './dto/create-location-booking.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { CalendarUtil } from '../../common/utils/calendar.util';
import { roundCurrency } from '../../common/utils/money.util';
import { inTransaction } from '../../common/utils/transaction.util';
import { withStoreErrors } from '../../common/utils/store-error.util';

export interface LocationBookingResult {
  booking: LocationBooking;
  total_days: number;
}

/**
 * Assignments Service - link records between a film and the people, partners and
 * places that work on it
 *
 * Each link is keyed by its two endpoints; repeating a link is a conflict.
 */
@Injectable()
export class AssignmentsService {
  constructor(
    @InjectRepository(FilmProducer)
    private producerLinkRepository: Repository<FilmProducer>,
    @InjectRepository(FilmDistribution)
    private distributionRepository: Repository<FilmDistribution>,
    @InjectRepository(StudioBooking)
    private studioBookingRepository: Repository<StudioBooking>,
    @InjectRepository(CrewAssignment)
    private crewAssignmentRepository: Repository<CrewAssignment>,
    @InjectRepository(LocationBooking)
    private locationBookingRepository: Repository<LocationBooking>,
    private dataSource: DataSource,
    private writeGuard: WriteGuardService,
  ) {}

  async addProducer(filmId: number, dto: CreateFilmProducerDto): Promise<FilmProducer> {
    const link = this.producerLinkRepository.create({ ...dto, film_id: filmId, investment: dto.investment ?? 0 });
    await withStoreErrors({ entity: 'Producer link', key: { film_id: filmId, producer_id: dto.producer_id } }, () =>
      this.producerLinkRepository.insert(link),
    );
    return link;
  }

  async listProducers(filmId: number): Promise<FilmProducer[]> {
    return this.producerLinkRepository.find({
      where: { film_id: filmId },
      relations: { producer: true },
      order: { producer_id: 'ASC' },
    });
  }

  async removeProducer(filmId: number, producerId: number): Promise<void> {
    const result = await this.producerLinkRepository.delete({ film_id: filmId, producer_id: producerId });
    if (!result.affected) {
      throw new RecordNotFoundException('Producer link', `${filmId}/${producerId}`);
    }
  }

  async addDistribution(filmId: number, dto: CreateFilmDistributionDto): Promise<FilmDistribution> {
    const link = this.distributionRepository.create({
      ...dto,
      film_id: filmId,
      distribution_fee: dto.distribution_fee ?? 0,
    });
    await withStoreErrors(
      { entity: 'Distribution', key: { film_id: filmId, distributor_id: dto.distributor_id } },
      () => this.distributionRepository.insert(link),
    );
    return link;
  }

  async listDistributions(filmId: number): Promise<FilmDistribution[]> {
    return this.distributionRepository.find({
      where: { film_id: filmId },
      relations: { distributor: true },
      order: { distributor_id: 'ASC' },
    });
  }

  async removeDistribution(filmId: number, distributorId: number): Promise<void> {
    const result = await this.distributionRepository.delete({ film_id: filmId, distributor_id: distributorId });
    if (!result.affected) {
      throw new RecordNotFoundException('Distribution', `${filmId}/${distributorId}`);
    }
  }

  async bookStudio(filmId: number, dto: CreateStudioBookingDto): Promise<StudioBooking> {
    const booking = this.studioBookingRepository.create({ ...dto, film_id: filmId, rental_cost: dto.rental_cost ?? 0 });
    await withStoreErrors({ entity: 'Studio booking', key: { film_id: filmId, studio_id: dto.studio_id } }, () =>
      this.studioBookingRepository.insert(booking),
    );
    return booking;
  }

  async listStudioBookings(filmId: number): Promise<StudioBooking[]> {
    return this.studioBookingRepository.find({
      where: { film_id: filmId },
      relations: { studio: true },
      order: { studio_id: 'ASC' },
    });
  }

  async removeStudioBooking(filmId: number, studioId: number): Promise<void> {
    const result = await this.studioBookingRepository.delete({ film_id: filmId, studio_id: studioId });
    if (!result.affected) {
      throw new RecordNotFoundException('Studio booking', `${filmId}/${studioId}`);
    }
  }

  /**
   * Department defaults to the crew member's own department
   */
  async assignCrew(filmId: number, dto: CreateCrewAssignmentDto, manager?: EntityManager): Promise<CrewAssignment> {
    return inTransaction(this.dataSource, manager, async (tx) => {
      const member = await tx.findOne(CrewMember, { where: { crew_id: dto.crew_id } });
      if (!member) {
        throw new RecordNotFoundException('Crew member', dto.crew_id);
      }

      const assignment = tx.create(CrewAssignment, {
        crew_id: dto.crew_id,
        film_id: filmId,
        start_date: dto.start_date ?? null,
        end_date: dto.end_date ?? null,
        department: dto.department ?? member.department,
      });
      await withStoreErrors({ entity: 'Crew assignment', key: { film_id: filmId, crew_id: dto.crew_id } }, () =>
        tx.insert(CrewAssignment, assignment),
      );
      return assignment;
    });
  }

  async listCrewAssignments(filmId: number): Promise<CrewAssignment[]> {
    return this.crewAssignmentRepository.find({
      where: { film_id: filmId },
      relations: { crew: true },
      order: { crew_id: 'ASC' },
    });
  }

  async removeCrewAssignment(filmId: number, crewId: number): Promise<void> {
    const result = await this.crewAssignmentRepository.delete({ film_id: filmId, crew_id: crewId });
    if (!result.affected) {
      throw new RecordNotFoundException('Crew assignment', `${filmId}/${crewId}`);
    }
  }

  /**
   * Book a location over an inclusive date range; total cost is days times the daily rate
   */
  async bookLocation(
    filmId: number,
    dto: CreateLocationBookingDto,
    manager?: EntityManager,
  ): Promise<LocationBookingResult> {
    this.writeGuard.assertShotAtInsert(dto);
    if (dto.cost_per_day !== undefined) {
      this.writeGuard.assertLocationInsert({ cost_per_day: dto.cost_per_day });
    }

    return inTransaction(this.dataSource, manager, async (tx) => {
      const location = await tx.findOne(ShootingLocation, { where: { location_id: dto.location_id } });
      if (!location) {
        throw new RecordNotFoundException('Shooting location', dto.location_id);
      }

      const totalDays = CalendarUtil.inclusiveDayCount(dto.shooting_start, dto.shooting_end);
      const dailyRate = dto.cost_per_day ?? location.cost_per_day;

      const booking = tx.create(LocationBooking, {
        film_id: filmId,
        location_id: dto.location_id,
        shooting_start: dto.shooting_start,
        shooting_end: dto.shooting_end,
        total_cost: roundCurrency(totalDays * dailyRate),
      });
      await withStoreErrors({ entity: 'Location booking', key: { film_id: filmId, location_id: dto.location_id } }, () =>
        tx.insert(LocationBooking, booking),
      );
      return { booking, total_days: totalDays };
    });
  }

  async listLocationBookings(filmId: number): Promise<LocationBooking[]> {
    return this.locationBookingRepository.find({
      where: { film_id: filmId },
      relations: { location: true },
      order: { shooting_start: 'ASC' },
    });
  }

  async removeLocationBooking(filmId: number, locationId: number): Promise<void> {
    const result = await this.locationBookingRepository.delete({ film_id: filmId, location_id: locationId });
    if (!result.affected) {
      throw new RecordNotFoundException('Location booking', `${filmId}/${locationId}`);
    }
  }
}
