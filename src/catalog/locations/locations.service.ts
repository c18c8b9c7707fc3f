import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, IsNull, Repository } from 'typeorm';
import { ShootingLocation } from './entities/shooting-location.entity';
import { CreateShootingLocationDto } from './dto/create-shooting-location.dto';
import { UpdateShootingLocationDto } from './dto/update-shooting-location.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { inTransaction } from '../../common/utils/transaction.util';

@Injectable()
export class LocationsService {
  constructor(
    @InjectRepository(ShootingLocation)
    private locationRepository: Repository<ShootingLocation>,
    private dataSource: DataSource,
    private writeGuard: WriteGuardService,
  ) {}

  async create(dto: CreateShootingLocationDto, manager?: EntityManager): Promise<ShootingLocation> {
    this.writeGuard.assertLocationInsert(dto);
    return inTransaction(this.dataSource, manager, (tx) => tx.save(ShootingLocation, tx.create(ShootingLocation, dto)));
  }

  async findAll(filters: { city?: string; country?: string } = {}): Promise<ShootingLocation[]> {
    const where: FindOptionsWhere<ShootingLocation> = {};

    if (filters.city) {
      where.city = filters.city;
    }

    if (filters.country) {
      where.country = filters.country;
    }

    return this.locationRepository.find({ where, order: { location_id: 'ASC' } });
  }

  async findOne(id: number): Promise<ShootingLocation> {
    const location = await this.locationRepository.findOne({ where: { location_id: id } });
    if (!location) {
      throw new RecordNotFoundException('Shooting location', id);
    }
    return location;
  }

  /**
   * Location with exactly this name and city; a missing city only matches locations without one
   */
  async findByNameAndCity(name: string, city: string | undefined, manager?: EntityManager): Promise<ShootingLocation | null> {
    const repository = manager ? manager.getRepository(ShootingLocation) : this.locationRepository;
    return repository.findOne({
      where: { name, city: city ?? IsNull() },
      order: { location_id: 'ASC' },
    });
  }

  async update(id: number, dto: UpdateShootingLocationDto): Promise<ShootingLocation> {
    const location = await this.findOne(id);
    Object.assign(location, dto);
    return this.locationRepository.save(location);
  }

  async remove(id: number): Promise<void> {
    const location = await this.findOne(id);
    await this.locationRepository.remove(location);
  }
}
