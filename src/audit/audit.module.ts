import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RoleAudit } from './entities/role-audit.entity';
import { EquipmentAudit } from './entities/equipment-audit.entity';
import { FilmAudit } from './entities/film-audit.entity';
import { UserActivityLog } from './entities/user-activity-log.entity';
import { AuditService } from './audit.service';
import { AuditController } from './audit.controller';

@Module({
  imports: [TypeOrmModule.forFeature([RoleAudit, EquipmentAudit, FilmAudit, UserActivityLog])],
  providers: [AuditService],
  controllers: [AuditController],
  exports: [AuditService],
})
export class AuditModule {}
