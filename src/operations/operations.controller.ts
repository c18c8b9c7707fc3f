import { Controller, Post, Patch, Body, Param, ParseIntPipe, HttpCode, HttpStatus } from '@nestjs/common';
import { RequireCapability } from '../auth/decorators/require-capability.decorator';
import { CallerUsername } from '../auth/decorators/caller-username.decorator';
import { CreateUserDto } from '../auth/dto/create-user.dto';
import { RecordLoginDto } from '../auth/dto/record-login.dto';
import { ProductionOperationsService } from './production-operations.service';
import { AddFilmWithGenresDto } from './dto/add-film-with-genres.dto';
import { CastActorInFilmDto } from './dto/cast-actor-in-film.dto';
import { AllocateCrewDto } from './dto/allocate-crew.dto';
import { AddShootingLocationDto } from './dto/add-shooting-location.dto';
import { UpdateProductionStatusDto } from './dto/update-production-status.dto';
import { UpdateEquipmentStatusDto } from './dto/update-equipment-status.dto';

@Controller('operations')
export class OperationsController {
  constructor(private operationsService: ProductionOperationsService) {}

  @Post('films')
  @RequireCapability('film', 'write')
  async addFilmWithGenres(@Body() dto: AddFilmWithGenresDto) {
    return { film_id: await this.operationsService.addFilmWithGenres(dto) };
  }

  @Post('castings')
  @RequireCapability('casting', 'write')
  async castActorInFilm(@Body() dto: CastActorInFilmDto) {
    return this.operationsService.castActorInFilm(dto);
  }

  @Post('crew-allocations')
  @RequireCapability('assignment', 'write')
  async allocateCrewToFilm(@Body() dto: AllocateCrewDto) {
    return this.operationsService.allocateCrewToFilm(dto);
  }

  @Post('shooting-locations')
  @RequireCapability('assignment', 'write')
  async addShootingLocation(@Body() dto: AddShootingLocationDto) {
    return this.operationsService.addShootingLocation(dto);
  }

  @Patch('films/:id/status')
  @RequireCapability('film', 'write')
  async updateProductionStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateProductionStatusDto) {
    return this.operationsService.updateProductionStatus(id, dto.production_status);
  }

  @Patch('equipment/:id/status')
  @RequireCapability('equipment', 'write')
  async updateEquipmentStatus(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateEquipmentStatusDto) {
    return this.operationsService.updateEquipmentStatus(id, dto.availability);
  }

  // authorized inside the access control service
  @Post('users')
  @HttpCode(HttpStatus.CREATED)
  async createUser(@CallerUsername() caller: string, @Body() dto: CreateUserDto) {
    return this.operationsService.createUser(caller, dto);
  }

  @Post('logins')
  @RequireCapability('user', 'administer')
  @HttpCode(HttpStatus.NO_CONTENT)
  async updateLogin(@Body() dto: RecordLoginDto) {
    await this.operationsService.updateLogin(dto.username, dto.success, dto.ip_address);
  }
}
