import { Film } from '../catalog/films/entities/film.entity';
import { FilmGenre } from '../catalog/films/entities/film-genre.entity';
import { FilmCertificate } from '../catalog/films/entities/film-certificate.entity';
import { Scene } from '../catalog/films/entities/scene.entity';
import { SceneFilming } from '../catalog/films/entities/scene-filming.entity';
import { Actor } from '../catalog/talent/entities/actor.entity';
import { Director } from '../catalog/talent/entities/director.entity';
import { Producer } from '../catalog/talent/entities/producer.entity';
import { CrewMember } from '../catalog/crew/entities/crew-member.entity';
import { Equipment } from '../catalog/equipment/entities/equipment.entity';
import { EquipmentUsage } from '../catalog/equipment/entities/equipment-usage.entity';
import { ShootingLocation } from '../catalog/locations/entities/shooting-location.entity';
import { Studio } from '../catalog/partners/entities/studio.entity';
import { Distributor } from '../catalog/partners/entities/distributor.entity';
import { CastRole } from '../catalog/casting/entities/cast-role.entity';
import { FilmProducer } from '../catalog/assignments/entities/film-producer.entity';
import { FilmDistribution } from '../catalog/assignments/entities/film-distribution.entity';
import { StudioBooking } from '../catalog/assignments/entities/studio-booking.entity';
import { CrewAssignment } from '../catalog/assignments/entities/crew-assignment.entity';
import { LocationBooking } from '../catalog/assignments/entities/location-booking.entity';
import { UserAccount } from '../auth/entities/user-account.entity';
import { RoleAudit } from '../audit/entities/role-audit.entity';
import { EquipmentAudit } from '../audit/entities/equipment-audit.entity';
import { FilmAudit } from '../audit/entities/film-audit.entity';
import { UserActivityLog } from '../audit/entities/user-activity-log.entity';

export const CATALOG_ENTITIES = [
  Film,
  FilmGenre,
  FilmCertificate,
  Scene,
  SceneFilming,
  Actor,
  Director,
  Producer,
  CrewMember,
  Equipment,
  EquipmentUsage,
  ShootingLocation,
  Studio,
  Distributor,
  CastRole,
  FilmProducer,
  FilmDistribution,
  StudioBooking,
  CrewAssignment,
  LocationBooking,
];

export const AUDIT_ENTITIES = [RoleAudit, EquipmentAudit, FilmAudit, UserActivityLog];

/**
 * Every entity mapped by the application, shared by the runtime data source and the test harness
 */
export const ENTITIES = [...CATALOG_ENTITIES, UserAccount, ...AUDIT_ENTITIES];
