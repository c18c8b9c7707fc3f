import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, EntityTarget, ObjectLiteral, Repository } from 'typeorm';
import { RoleAudit, RoleAuditAction } from './entities/role-audit.entity';
import { EquipmentAudit } from './entities/equipment-audit.entity';
import { FilmAudit, FilmAuditAction } from './entities/film-audit.entity';
import { UserActivityLog, UserActivityType } from './entities/user-activity-log.entity';
import type { CastRole } from '../catalog/casting/entities/cast-role.entity';
import type { Equipment } from '../catalog/equipment/entities/equipment.entity';
import type { Film, ProductionStatus } from '../catalog/films/entities/film.entity';

export const DEFAULT_AUDIT_PAGE_SIZE = 100;

export interface AuditQueryFilters {
  start_date?: Date;
  end_date?: Date;
  limit?: number;
  offset?: number;
}

export interface AuditPage<T> {
  logs: T[];
  total: number;
}

export interface UserActivitySummary {
  username: string;
  total_activities: number;
  last_activity: string | null;
  successful_logins: number;
  failed_logins: number;
}

interface UserActivitySummaryRow {
  username: string;
  total_activities: string | number;
  last_activity: string | Date | null;
  successful_logins: string | number | null;
  failed_logins: string | number | null;
}

/**
 * Audit Service - append-only history of governed changes
 *
 * Append methods take the EntityManager of the write they describe, so the row
 * commits or rolls back together with that write. Nothing here updates or
 * deletes an audit row.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(RoleAudit)
    private roleAuditRepository: Repository<RoleAudit>,
    @InjectRepository(EquipmentAudit)
    private equipmentAuditRepository: Repository<EquipmentAudit>,
    @InjectRepository(FilmAudit)
    private filmAuditRepository: Repository<FilmAudit>,
    @InjectRepository(UserActivityLog)
    private userActivityRepository: Repository<UserActivityLog>,
  ) {}

  /**
   * Record a cast role being inserted or deleted
   */
  async recordRoleChange(
    manager: EntityManager,
    role: Pick<CastRole, 'actor_id' | 'film_id' | 'character_name' | 'salary'>,
    action: RoleAuditAction,
  ): Promise<RoleAudit> {
    return this.append(manager, RoleAudit, {
      actor_id: role.actor_id,
      film_id: role.film_id,
      character_name: role.character_name,
      salary: role.salary,
      action,
    });
  }

  /**
   * Record an availability transition; returns null when availability did not change
   */
  async recordEquipmentAvailability(
    manager: EntityManager,
    before: Pick<Equipment, 'equipment_id' | 'name' | 'availability'>,
    after: Pick<Equipment, 'availability'>,
  ): Promise<EquipmentAudit | null> {
    if (before.availability === after.availability) {
      return null;
    }
    return this.append(manager, EquipmentAudit, {
      equipment_id: before.equipment_id,
      equipment_name: before.name,
      old_availability: before.availability,
      new_availability: after.availability,
      action: 'UPDATE',
    });
  }

  /**
   * Record a status transition made by any film update; returns null when the status did not change
   */
  async recordFilmStatusChange(
    manager: EntityManager,
    before: Pick<Film, 'film_id' | 'title' | 'production_status' | 'budget'>,
    after: Pick<Film, 'production_status' | 'budget'>,
  ): Promise<FilmAudit | null> {
    if (before.production_status === after.production_status) {
      return null;
    }
    return this.appendFilmAudit(manager, 'STATUS_CHANGE', {
      film_id: before.film_id,
      film_title: before.title,
      old_status: before.production_status,
      new_status: after.production_status,
      old_budget: before.budget,
      new_budget: after.budget,
    });
  }

  /**
   * Record the update-production-status operation. Written on every call, even when
   * the status is unchanged.
   */
  async recordStatusUpdate(
    manager: EntityManager,
    film: Pick<Film, 'film_id' | 'title'>,
    oldStatus: ProductionStatus,
    newStatus: ProductionStatus,
  ): Promise<FilmAudit> {
    return this.appendFilmAudit(manager, 'STATUS_UPDATE', {
      film_id: film.film_id,
      film_title: film.title,
      old_status: oldStatus,
      new_status: newStatus,
      message: `Film status updated from ${oldStatus} to ${newStatus}`,
    });
  }

  async recordUserActivity(
    manager: EntityManager,
    username: string,
    actionType: UserActivityType,
    description?: string,
    ipAddress?: string,
  ): Promise<UserActivityLog> {
    return this.append(manager, UserActivityLog, {
      username,
      action_type: actionType,
      action_description: description ?? null,
      ip_address: ipAddress ?? null,
    });
  }

  async queryRoleAudit(
    filters: AuditQueryFilters & { actor_id?: number; film_id?: number; action?: RoleAuditAction } = {},
  ): Promise<AuditPage<RoleAudit>> {
    return this.queryLogs(
      this.roleAuditRepository,
      'role_audit',
      'audit_id',
      { actor_id: filters.actor_id, film_id: filters.film_id, action: filters.action },
      filters,
    );
  }

  async queryEquipmentAudit(
    filters: AuditQueryFilters & { equipment_id?: number } = {},
  ): Promise<AuditPage<EquipmentAudit>> {
    return this.queryLogs(
      this.equipmentAuditRepository,
      'equipment_audit',
      'audit_id',
      { equipment_id: filters.equipment_id },
      filters,
    );
  }

  async queryFilmAudit(
    filters: AuditQueryFilters & { film_id?: number; action?: FilmAuditAction } = {},
  ): Promise<AuditPage<FilmAudit>> {
    return this.queryLogs(
      this.filmAuditRepository,
      'film_audit',
      'audit_id',
      { film_id: filters.film_id, action: filters.action },
      filters,
    );
  }

  async queryUserActivity(
    filters: AuditQueryFilters & { username?: string; action_type?: UserActivityType } = {},
  ): Promise<AuditPage<UserActivityLog>> {
    return this.queryLogs(
      this.userActivityRepository,
      'activity',
      'log_id',
      { username: filters.username, action_type: filters.action_type },
      filters,
    );
  }

  /**
   * Per-user activity totals, most active first
   */
  async userActivitySummary(): Promise<UserActivitySummary[]> {
    const rows = await this.userActivityRepository
      .createQueryBuilder('activity')
      .select('activity.username', 'username')
      .addSelect('COUNT(*)', 'total_activities')
      .addSelect('MAX(activity.timestamp)', 'last_activity')
      .addSelect(
        "SUM(CASE WHEN activity.action_type = 'LOGIN_SUCCESS' THEN 1 ELSE 0 END)",
        'successful_logins',
      )
      .addSelect(
        "SUM(CASE WHEN activity.action_type = 'LOGIN_FAILED' THEN 1 ELSE 0 END)",
        'failed_logins',
      )
      .groupBy('activity.username')
      .orderBy('total_activities', 'DESC')
      .addOrderBy('activity.username', 'ASC')
      .getRawMany<UserActivitySummaryRow>();

    return rows.map((row) => ({
      username: row.username,
      total_activities: Number(row.total_activities),
      last_activity:
        row.last_activity instanceof Date ? row.last_activity.toISOString() : row.last_activity,
      successful_logins: Number(row.successful_logins ?? 0),
      failed_logins: Number(row.failed_logins ?? 0),
    }));
  }

  private async appendFilmAudit(
    manager: EntityManager,
    action: FilmAuditAction,
    row: DeepPartial<FilmAudit>,
  ): Promise<FilmAudit> {
    return this.append<FilmAudit>(manager, FilmAudit, { ...row, action });
  }

  /**
   * Append failures are logged and rethrown so the enclosing transaction rolls back
   */
  private async append<T extends ObjectLiteral>(
    manager: EntityManager,
    target: EntityTarget<T>,
    row: DeepPartial<T>,
  ): Promise<T> {
    try {
      const entry = manager.create(target, row);
      return await manager.save(target, entry);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to append audit row: ${err.message}`, err.stack);
      throw error;
    }
  }

  private async queryLogs<T extends ObjectLiteral>(
    repository: Repository<T>,
    alias: string,
    idColumn: string,
    criteria: Record<string, string | number | undefined>,
    filters: AuditQueryFilters,
  ): Promise<AuditPage<T>> {
    const query = repository.createQueryBuilder(alias);

    for (const [column, value] of Object.entries(criteria)) {
      if (value !== undefined) {
        query.andWhere(`${alias}.${column} = :${column}`, { [column]: value });
      }
    }

    if (filters.start_date) {
      query.andWhere(`${alias}.timestamp >= :start_date`, { start_date: filters.start_date });
    }

    if (filters.end_date) {
      query.andWhere(`${alias}.timestamp <= :end_date`, { end_date: filters.end_date });
    }

    // rows written in the same second keep insertion order, newest first
    query.orderBy(`${alias}.timestamp`, 'DESC').addOrderBy(`${alias}.${idColumn}`, 'DESC');

    query.limit(filters.limit ?? DEFAULT_AUDIT_PAGE_SIZE);

    if (filters.offset) {
      query.offset(filters.offset);
    }

    const [logs, total] = await query.getManyAndCount();

    return { logs, total };
  }
}
