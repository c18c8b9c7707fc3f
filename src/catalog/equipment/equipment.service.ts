import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Equipment, Availability } from './entities/equipment.entity';
import { EquipmentUsage } from './entities/equipment-usage.entity';
import { CreateEquipmentDto } from './dto/create-equipment.dto';
import { UpdateEquipmentDto } from './dto/update-equipment.dto';
import { CreateEquipmentUsageDto } from './dto/create-equipment-usage.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { AuditService } from '../../audit/audit.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { inTransaction } from '../../common/utils/transaction.util';
import { withStoreErrors } from '../../common/utils/store-error.util';

/**
 * Equipment Service - inventory, availability and per-film usage
 *
 * Every write that moves `availability` appends to the equipment audit trail
 * in the same transaction.
 */
@Injectable()
export class EquipmentService {
  constructor(
    @InjectRepository(Equipment)
    private equipmentRepository: Repository<Equipment>,
    @InjectRepository(EquipmentUsage)
    private usageRepository: Repository<EquipmentUsage>,
    private dataSource: DataSource,
    private writeGuard: WriteGuardService,
    private auditService: AuditService,
  ) {}

  async create(dto: CreateEquipmentDto): Promise<Equipment> {
    this.writeGuard.assertEquipmentInsert(dto);
    return this.equipmentRepository.save(this.equipmentRepository.create(dto));
  }

  async findAll(filters: { availability?: Availability } = {}): Promise<Equipment[]> {
    return this.equipmentRepository.find({
      where: filters.availability ? { availability: filters.availability } : {},
      order: { equipment_id: 'ASC' },
    });
  }

  async findOne(id: number, manager?: EntityManager): Promise<Equipment> {
    const repository = manager ? manager.getRepository(Equipment) : this.equipmentRepository;
    const equipment = await repository.findOne({ where: { equipment_id: id } });
    if (!equipment) {
      throw new RecordNotFoundException('Equipment', id);
    }
    return equipment;
  }

  async update(id: number, dto: UpdateEquipmentDto, manager?: EntityManager): Promise<Equipment> {
    return inTransaction(this.dataSource, manager, async (tx) => {
      const equipment = await this.findOne(id, tx);
      if (Object.keys(dto).length === 0) {
        return equipment;
      }
      const before = { ...equipment };

      await tx.update(Equipment, { equipment_id: id }, dto);
      await this.auditService.recordEquipmentAvailability(tx, before, {
        availability: dto.availability ?? before.availability,
      });

      return this.findOne(id, tx);
    });
  }

  async updateAvailability(id: number, availability: Availability, manager?: EntityManager): Promise<Equipment> {
    return this.update(id, { availability }, manager);
  }

  async remove(id: number): Promise<void> {
    const equipment = await this.findOne(id);
    await this.equipmentRepository.remove(equipment);
  }

  async recordUsage(filmId: number, dto: CreateEquipmentUsageDto): Promise<EquipmentUsage> {
    return withStoreErrors(
      { entity: 'Equipment usage', key: { film_id: filmId, equipment_id: dto.equipment_id } },
      async () => {
        const usage = this.usageRepository.create({ ...dto, film_id: filmId });
        await this.usageRepository.insert(usage);
        return usage;
      },
    );
  }

  async listUsage(filmId: number): Promise<EquipmentUsage[]> {
    return this.usageRepository.find({
      where: { film_id: filmId },
      relations: { equipment: true },
      order: { equipment_id: 'ASC' },
    });
  }
}
