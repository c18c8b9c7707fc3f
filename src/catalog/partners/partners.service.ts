import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Studio } from './entities/studio.entity';
import { Distributor } from './entities/distributor.entity';
import { CreateStudioDto } from './dto/create-studio.dto';
import { UpdateStudioDto } from './dto/update-studio.dto';
import { CreateDistributorDto } from './dto/create-distributor.dto';
import { UpdateDistributorDto } from './dto/update-distributor.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';

/**
 * Partners Service - studios that host productions and distributors that release them
 */
@Injectable()
export class PartnersService {
  constructor(
    @InjectRepository(Studio)
    private studioRepository: Repository<Studio>,
    @InjectRepository(Distributor)
    private distributorRepository: Repository<Distributor>,
    private writeGuard: WriteGuardService,
  ) {}

  async createStudio(dto: CreateStudioDto): Promise<Studio> {
    return this.studioRepository.save(this.studioRepository.create(dto));
  }

  async findStudios(): Promise<Studio[]> {
    return this.studioRepository.find({ order: { name: 'ASC' } });
  }

  async findStudio(id: number): Promise<Studio> {
    const studio = await this.studioRepository.findOne({ where: { studio_id: id } });
    if (!studio) {
      throw new RecordNotFoundException('Studio', id);
    }
    return studio;
  }

  async updateStudio(id: number, dto: UpdateStudioDto): Promise<Studio> {
    const studio = await this.findStudio(id);
    Object.assign(studio, dto);
    return this.studioRepository.save(studio);
  }

  async removeStudio(id: number): Promise<void> {
    const studio = await this.findStudio(id);
    await this.studioRepository.remove(studio);
  }

  async createDistributor(dto: CreateDistributorDto): Promise<Distributor> {
    const marketShare = dto.market_share ?? 0;
    this.writeGuard.assertDistributorWrite({ market_share: marketShare });
    return this.distributorRepository.save(this.distributorRepository.create({ ...dto, market_share: marketShare }));
  }

  async findDistributors(): Promise<Distributor[]> {
    return this.distributorRepository.find({ order: { name: 'ASC' } });
  }

  async findDistributor(id: number): Promise<Distributor> {
    const distributor = await this.distributorRepository.findOne({ where: { distributor_id: id } });
    if (!distributor) {
      throw new RecordNotFoundException('Distributor', id);
    }
    return distributor;
  }

  async updateDistributor(id: number, dto: UpdateDistributorDto): Promise<Distributor> {
    const distributor = await this.findDistributor(id);
    Object.assign(distributor, dto);
    this.writeGuard.assertDistributorWrite(distributor);
    return this.distributorRepository.save(distributor);
  }

  async removeDistributor(id: number): Promise<void> {
    const distributor = await this.findDistributor(id);
    await this.distributorRepository.remove(distributor);
  }
}
