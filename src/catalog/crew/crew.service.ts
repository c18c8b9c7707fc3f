import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CrewMember } from './entities/crew-member.entity';
import { CreateCrewMemberDto } from './dto/create-crew-member.dto';
import { UpdateCrewMemberDto } from './dto/update-crew-member.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { withStoreErrors } from '../../common/utils/store-error.util';

@Injectable()
export class CrewService {
  constructor(
    @InjectRepository(CrewMember)
    private crewRepository: Repository<CrewMember>,
    private writeGuard: WriteGuardService,
  ) {}

  async create(dto: CreateCrewMemberDto): Promise<CrewMember> {
    this.writeGuard.assertCrewInsert({ ...dto, experience_years: dto.experience_years ?? 0 });

    if (dto.supervisor_id !== undefined) {
      await this.findOne(dto.supervisor_id);
    }

    return withStoreErrors({ entity: 'Crew member', key: { name: dto.name } }, () =>
      this.crewRepository.save(this.crewRepository.create(dto)),
    );
  }

  async findAll(filters: { department?: string } = {}): Promise<CrewMember[]> {
    return this.crewRepository.find({
      where: filters.department ? { department: filters.department } : {},
      order: { crew_id: 'ASC' },
    });
  }

  async findOne(id: number): Promise<CrewMember> {
    const member = await this.crewRepository.findOne({ where: { crew_id: id } });
    if (!member) {
      throw new RecordNotFoundException('Crew member', id);
    }
    return member;
  }

  /**
   * Crew members whose supervisor is the given id
   */
  async findSubordinates(supervisorId: number): Promise<CrewMember[]> {
    return this.crewRepository.find({ where: { supervisor_id: supervisorId }, order: { crew_id: 'ASC' } });
  }

  async update(id: number, dto: UpdateCrewMemberDto): Promise<CrewMember> {
    const member = await this.findOne(id);
    this.writeGuard.assertCrewUpdate({ ...member, ...dto, crew_id: id });

    if (dto.supervisor_id !== undefined && dto.supervisor_id !== null) {
      await this.findOne(dto.supervisor_id);
    }

    Object.assign(member, dto);
    return this.crewRepository.save(member);
  }

  /**
   * Subordinates keep existing with `supervisor_id` cleared
   */
  async remove(id: number): Promise<void> {
    const member = await this.findOne(id);
    await this.crewRepository.remove(member);
  }
}
