import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  ParseIntPipe,
  HttpCode,
  HttpStatus,
  BadRequestException,
} from '@nestjs/common';
import { RequireCapability } from '../../auth/decorators/require-capability.decorator';
import { FilmsService } from './films.service';
import { PRODUCTION_STATUSES, ProductionStatus } from './entities/film.entity';
import { CreateFilmDto } from './dto/create-film.dto';
import { UpdateFilmDto } from './dto/update-film.dto';
import { AddGenresDto } from './dto/add-genres.dto';
import { CreateCertificateDto } from './dto/create-certificate.dto';
import { CreateSceneDto } from './dto/create-scene.dto';
import { CreateSceneFilmingDto } from './dto/create-scene-filming.dto';

@Controller('catalog/films')
@RequireCapability('film', 'read')
export class FilmsController {
  constructor(private readonly filmsService: FilmsService) {}

  @Post()
  @RequireCapability('film', 'write')
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateFilmDto) {
    return this.filmsService.create(dto);
  }

  @Get()
  async findAll(
    @Query('production_status') productionStatus?: string,
    @Query('director_id') directorId?: string,
  ) {
    return this.filmsService.findAll({
      production_status: parseStatus(productionStatus),
      director_id: directorId ? parseInt(directorId, 10) : undefined,
    });
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.filmsService.findOne(id);
  }

  @Patch(':id')
  @RequireCapability('film', 'write')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateFilmDto) {
    return this.filmsService.update(id, dto);
  }

  @Delete(':id')
  @RequireCapability('film', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.filmsService.remove(id);
  }

  @Get(':id/genres')
  async listGenres(@Param('id', ParseIntPipe) id: number) {
    return this.filmsService.listGenres(id);
  }

  @Post(':id/genres')
  @RequireCapability('film', 'write')
  async addGenres(@Param('id', ParseIntPipe) id: number, @Body() dto: AddGenresDto) {
    await this.filmsService.findOne(id);
    return this.filmsService.addGenres(id, dto.genres);
  }

  @Get(':id/certificate')
  async getCertificate(@Param('id', ParseIntPipe) id: number) {
    return this.filmsService.getCertificate(id);
  }

  @Post(':id/certificate')
  @RequireCapability('film', 'write')
  async setCertificate(@Param('id', ParseIntPipe) id: number, @Body() dto: CreateCertificateDto) {
    return this.filmsService.setCertificate(id, dto);
  }

  @Get(':id/scenes')
  async listScenes(@Param('id', ParseIntPipe) id: number) {
    return this.filmsService.listScenes(id);
  }

  @Post(':id/scenes')
  @RequireCapability('film', 'write')
  async addScene(@Param('id', ParseIntPipe) id: number, @Body() dto: CreateSceneDto) {
    return this.filmsService.addScene(id, dto);
  }

  @Get(':id/filmings')
  async listFilmings(@Param('id', ParseIntPipe) id: number) {
    return this.filmsService.listFilmings(id);
  }

  @Post(':id/filmings')
  @RequireCapability('film', 'write')
  async recordFilming(@Param('id', ParseIntPipe) id: number, @Body() dto: CreateSceneFilmingDto) {
    return this.filmsService.recordFilming(id, dto);
  }
}

function parseStatus(value?: string): ProductionStatus | undefined {
  if (!value) {
    return undefined;
  }
  const status = PRODUCTION_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new BadRequestException(`production_status must be one of: ${PRODUCTION_STATUSES.join(', ')}`);
  }
  return status;
}
