import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CATALOG_ENTITIES } from '../database/entities';
import { ValidationModule } from '../validation/validation.module';
import { AuditModule } from '../audit/audit.module';
import { FilmsService } from './films/films.service';
import { TalentService } from './talent/talent.service';
import { CrewService } from './crew/crew.service';
import { EquipmentService } from './equipment/equipment.service';
import { LocationsService } from './locations/locations.service';
import { PartnersService } from './partners/partners.service';
import { CastingService } from './casting/casting.service';
import { AssignmentsService } from './assignments/assignments.service';
import { FilmsController } from './films/films.controller';
import { TalentController } from './talent/talent.controller';
import { CrewController } from './crew/crew.controller';
import { EquipmentController } from './equipment/equipment.controller';
import { LocationsController } from './locations/locations.controller';
import { PartnersController } from './partners/partners.controller';
import { CastingController } from './casting/casting.controller';
import { AssignmentsController } from './assignments/assignments.controller';

const STORE_SERVICES = [
  FilmsService,
  TalentService,
  CrewService,
  EquipmentService,
  LocationsService,
  PartnersService,
  CastingService,
  AssignmentsService,
];

/**
 * Entity Store - production records and their CRUD surface
 */
@Module({
  imports: [TypeOrmModule.forFeature(CATALOG_ENTITIES), ValidationModule, AuditModule],
  controllers: [
    FilmsController,
    TalentController,
    CrewController,
    EquipmentController,
    LocationsController,
    PartnersController,
    CastingController,
    AssignmentsController,
  ],
  providers: STORE_SERVICES,
  exports: STORE_SERVICES,
})
export class CatalogModule {}
