import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  ParseIntPipe,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { RequireCapability } from '../../auth/decorators/require-capability.decorator';
import { TalentService } from './talent.service';
import { CreateActorDto } from './dto/create-actor.dto';
import { UpdateActorDto } from './dto/update-actor.dto';
import { CreateDirectorDto } from './dto/create-director.dto';
import { UpdateDirectorDto } from './dto/update-director.dto';
import { CreateProducerDto } from './dto/create-producer.dto';
import { UpdateProducerDto } from './dto/update-producer.dto';

@Controller('catalog')
@RequireCapability('talent', 'read')
export class TalentController {
  constructor(private readonly talentService: TalentService) {}

  // Actors

  @Post('actors')
  @RequireCapability('talent', 'write')
  async createActor(@Body() dto: CreateActorDto) {
    return this.talentService.createActor(dto);
  }

  @Get('actors')
  async findActors() {
    return this.talentService.findActors();
  }

  @Get('actors/:id')
  async findActor(@Param('id', ParseIntPipe) id: number) {
    return this.talentService.findActor(id);
  }

  @Patch('actors/:id')
  @RequireCapability('talent', 'write')
  async updateActor(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateActorDto) {
    return this.talentService.updateActor(id, dto);
  }

  @Delete('actors/:id')
  @RequireCapability('talent', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeActor(@Param('id', ParseIntPipe) id: number) {
    await this.talentService.removeActor(id);
  }

  // Directors

  @Post('directors')
  @RequireCapability('talent', 'write')
  async createDirector(@Body() dto: CreateDirectorDto) {
    return this.talentService.createDirector(dto);
  }

  @Get('directors')
  async findDirectors() {
    return this.talentService.findDirectors();
  }

  @Get('directors/:id')
  async findDirector(@Param('id', ParseIntPipe) id: number) {
    return this.talentService.findDirector(id);
  }

  @Patch('directors/:id')
  @RequireCapability('talent', 'write')
  async updateDirector(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateDirectorDto) {
    return this.talentService.updateDirector(id, dto);
  }

  @Delete('directors/:id')
  @RequireCapability('talent', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeDirector(@Param('id', ParseIntPipe) id: number) {
    await this.talentService.removeDirector(id);
  }

  // Producers

  @Post('producers')
  @RequireCapability('talent', 'write')
  async createProducer(@Body() dto: CreateProducerDto) {
    return this.talentService.createProducer(dto);
  }

  @Get('producers')
  async findProducers() {
    return this.talentService.findProducers();
  }

  @Get('producers/:id')
  async findProducer(@Param('id', ParseIntPipe) id: number) {
    return this.talentService.findProducer(id);
  }

  @Patch('producers/:id')
  @RequireCapability('talent', 'write')
  async updateProducer(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateProducerDto) {
    return this.talentService.updateProducer(id, dto);
  }

  @Delete('producers/:id')
  @RequireCapability('talent', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeProducer(@Param('id', ParseIntPipe) id: number) {
    await this.talentService.removeProducer(id);
  }
}
