import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { CastRole } from './entities/cast-role.entity';
import { CreateCastRoleDto } from './dto/create-cast-role.dto';
import { UpdateCastRoleDto } from './dto/update-cast-role.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { AuditService } from '../../audit/audit.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { inTransaction } from '../../common/utils/transaction.util';
import { withStoreErrors } from '../../common/utils/store-error.util';

/**
 * Casting Service - roles played by actors in films
 *
 * Inserts and deletes go to the role audit trail in the same transaction.
 * An actor may play several characters in one film, but never the same one twice.
 */
@Injectable()
export class CastingService {
  private readonly logger = new Logger(CastingService.name);

  constructor(
    @InjectRepository(CastRole)
    private roleRepository: Repository<CastRole>,
    private dataSource: DataSource,
    private writeGuard: WriteGuardService,
    private auditService: AuditService,
  ) {}

  async cast(dto: CreateCastRoleDto, manager?: EntityManager): Promise<CastRole> {
    this.writeGuard.assertRoleInsert(dto);

    return inTransaction(this.dataSource, manager, async (tx) => {
      const role = await withStoreErrors(
        {
          entity: 'Role',
          key: { actor_id: dto.actor_id, film_id: dto.film_id, character_name: dto.character_name },
        },
        () =>
          tx.save(
            CastRole,
            tx.create(CastRole, {
              ...dto,
              screen_time: dto.screen_time ?? 0,
              importance: dto.importance ?? 'Supporting',
            }),
          ),
      );
      await this.auditService.recordRoleChange(tx, role, 'INSERT');
      return role;
    });
  }

  async findOne(id: number): Promise<CastRole> {
    const role = await this.roleRepository.findOne({ where: { role_id: id } });
    if (!role) {
      throw new RecordNotFoundException('Role', id);
    }
    return role;
  }

  async findByFilm(filmId: number): Promise<CastRole[]> {
    return this.roleRepository.find({
      where: { film_id: filmId },
      relations: { actor: true },
      order: { role_id: 'ASC' },
    });
  }

  async findByActor(actorId: number): Promise<CastRole[]> {
    return this.roleRepository.find({
      where: { actor_id: actorId },
      relations: { film: true },
      order: { role_id: 'ASC' },
    });
  }

  async update(id: number, dto: UpdateCastRoleDto): Promise<CastRole> {
    const role = await this.findOne(id);
    Object.assign(role, dto);
    return this.roleRepository.save(role);
  }

  async remove(id: number): Promise<void> {
    await this.dataSource.transaction(async (tx) => {
      const role = await tx.findOne(CastRole, { where: { role_id: id } });
      if (!role) {
        throw new RecordNotFoundException('Role', id);
      }
      await tx.delete(CastRole, { role_id: id });
      await this.auditService.recordRoleChange(tx, role, 'DELETE');
    });
    this.logger.log(`Role ${id} deleted`);
  }
}
