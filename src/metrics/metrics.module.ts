import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Film } from '../catalog/films/entities/film.entity';
import { Scene } from '../catalog/films/entities/scene.entity';
import { SceneFilming } from '../catalog/films/entities/scene-filming.entity';
import { Actor } from '../catalog/talent/entities/actor.entity';
import { Producer } from '../catalog/talent/entities/producer.entity';
import { CastRole } from '../catalog/casting/entities/cast-role.entity';
import { Distributor } from '../catalog/partners/entities/distributor.entity';
import { Equipment } from '../catalog/equipment/entities/equipment.entity';
import { EquipmentUsage } from '../catalog/equipment/entities/equipment-usage.entity';
import { FilmProducer } from '../catalog/assignments/entities/film-producer.entity';
import { FilmDistribution } from '../catalog/assignments/entities/film-distribution.entity';
import { CrewAssignment } from '../catalog/assignments/entities/crew-assignment.entity';
import { LocationBooking } from '../catalog/assignments/entities/location-booking.entity';
import { MetricsService } from './metrics.service';
import { ReportsService } from './reports.service';
import { MetricsController } from './metrics.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Film,
      Scene,
      SceneFilming,
      Actor,
      Producer,
      CastRole,
      Distributor,
      Equipment,
      EquipmentUsage,
      FilmProducer,
      FilmDistribution,
      CrewAssignment,
      LocationBooking,
    ]),
  ],
  controllers: [MetricsController],
  providers: [MetricsService, ReportsService],
  exports: [MetricsService, ReportsService],
})
export class MetricsModule {}
