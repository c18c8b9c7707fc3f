import { Controller, Get, Query, BadRequestException } from '@nestjs/common';
import { RequireCapability } from '../auth/decorators/require-capability.decorator';
import { AuditService, AuditQueryFilters, DEFAULT_AUDIT_PAGE_SIZE } from './audit.service';
import type { RoleAuditAction } from './entities/role-audit.entity';
import type { FilmAuditAction } from './entities/film-audit.entity';
import type { UserActivityType } from './entities/user-activity-log.entity';

/**
 * Audit Controller - read-only view of the audit trails
 */
@Controller('audit')
@RequireCapability('audit', 'read')
export class AuditController {
  constructor(private auditService: AuditService) {}

  @Get('roles')
  async getRoleAudit(
    @Query('actor_id') actorId?: string,
    @Query('film_id') filmId?: string,
    @Query('action') action?: RoleAuditAction,
    @Query('start_date') startDate?: string,
    @Query('end_date') endDate?: string,
    @Query('limit') limit?: string,
    @Query('offset') offset?: string,
  ) {
    const filters = parsePage(startDate, endDate, limit, offset);
    const result = await this.auditService.queryRoleAudit({
      ...filters,
      actor_id: parseId('actor_id', actorId),
      film_id: parseId('film_id', filmId),
      action,
    });
    return { ...result, limit: filters.limit, offset: filters.offset };
  }

  @Get('equipment')
  async getEquipmentAudit(
    @Query('equipment_id') equipmentId?: string,
    @Query('start_date') startDate?: string,
    @Query('end_date') endDate?: string,
    @Query('limit') limit?: string,
    @Query('offset') offset?: string,
  ) {
    const filters = parsePage(startDate, endDate, limit, offset);
    const result = await this.auditService.queryEquipmentAudit({
      ...filters,
      equipment_id: parseId('equipment_id', equipmentId),
    });
    return { ...result, limit: filters.limit, offset: filters.offset };
  }

  @Get('films')
  async getFilmAudit(
    @Query('film_id') filmId?: string,
    @Query('action') action?: FilmAuditAction,
    @Query('start_date') startDate?: string,
    @Query('end_date') endDate?: string,
    @Query('limit') limit?: string,
    @Query('offset') offset?: string,
  ) {
    const filters = parsePage(startDate, endDate, limit, offset);
    const result = await this.auditService.queryFilmAudit({
      ...filters,
      film_id: parseId('film_id', filmId),
      action,
    });
    return { ...result, limit: filters.limit, offset: filters.offset };
  }

  @Get('users')
  async getUserActivity(
    @Query('username') username?: string,
    @Query('action_type') actionType?: UserActivityType,
    @Query('start_date') startDate?: string,
    @Query('end_date') endDate?: string,
    @Query('limit') limit?: string,
    @Query('offset') offset?: string,
  ) {
    const filters = parsePage(startDate, endDate, limit, offset);
    const result = await this.auditService.queryUserActivity({
      ...filters,
      username,
      action_type: actionType,
    });
    return { ...result, limit: filters.limit, offset: filters.offset };
  }

  @Get('users/summary')
  async getUserActivitySummary() {
    return this.auditService.userActivitySummary();
  }
}

function parseDate(name: string, value?: string): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new BadRequestException(`Invalid ${name} format. Use ISO 8601 format.`);
  }
  return date;
}

function parseId(name: string, value?: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const id = Number(value);
  if (!Number.isInteger(id)) {
    throw new BadRequestException(`${name} must be an integer`);
  }
  return id;
}

function parsePage(
  startDate?: string,
  endDate?: string,
  limit?: string,
  offset?: string,
): AuditQueryFilters & { limit: number; offset: number } {
  return {
    start_date: parseDate('start_date', startDate),
    end_date: parseDate('end_date', endDate),
    limit: limit ? parseInt(limit, 10) : DEFAULT_AUDIT_PAGE_SIZE,
    offset: offset ? parseInt(offset, 10) : 0,
  };
}
