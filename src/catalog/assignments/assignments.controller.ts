import {
  Controller,
  Get,
  Post,
  Delete,
  Body,
  Param,
  ParseIntPipe,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { RequireCapability } from '../../auth/decorators/require-capability.decorator';
import { AssignmentsService } from './assignments.service';
import { EquipmentService } from '../equipment/equipment.service';
import { CreateFilmProducerDto } from './dto/create-film-producer.dto';
import { CreateFilmDistributionDto } from './dto/create-film-distribution.dto';
import { CreateStudioBookingDto } from './dto/create-studio-booking.dto';
import { CreateCrewAssignmentDto } from './dto/create-crew-assignment.dto';
import { CreateLocationBookingDto } from './dto/create-location-booking.dto';
import { CreateEquipmentUsageDto } from '../equipment/dto/create-equipment-usage.dto';

/**
 * Link records between a film and its producers, distributors, studios, crew,
 * locations and equipment
 */
@Controller('catalog/films/:filmId')
@RequireCapability('assignment', 'read')
export class AssignmentsController {
  constructor(
    private readonly assignmentsService: AssignmentsService,
    private readonly equipmentService: EquipmentService,
  ) {}

  @Get('producers')
  async listProducers(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.assignmentsService.listProducers(filmId);
  }

  @Post('producers')
  @RequireCapability('assignment', 'write')
  async addProducer(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateFilmProducerDto) {
    return this.assignmentsService.addProducer(filmId, dto);
  }

  @Delete('producers/:producerId')
  @RequireCapability('assignment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeProducer(
    @Param('filmId', ParseIntPipe) filmId: number,
    @Param('producerId', ParseIntPipe) producerId: number,
  ) {
    await this.assignmentsService.removeProducer(filmId, producerId);
  }

  @Get('distributions')
  async listDistributions(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.assignmentsService.listDistributions(filmId);
  }

  @Post('distributions')
  @RequireCapability('assignment', 'write')
  async addDistribution(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateFilmDistributionDto) {
    return this.assignmentsService.addDistribution(filmId, dto);
  }

  @Delete('distributions/:distributorId')
  @RequireCapability('assignment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeDistribution(
    @Param('filmId', ParseIntPipe) filmId: number,
    @Param('distributorId', ParseIntPipe) distributorId: number,
  ) {
    await this.assignmentsService.removeDistribution(filmId, distributorId);
  }

  @Get('studios')
  async listStudioBookings(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.assignmentsService.listStudioBookings(filmId);
  }

  @Post('studios')
  @RequireCapability('assignment', 'write')
  async bookStudio(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateStudioBookingDto) {
    return this.assignmentsService.bookStudio(filmId, dto);
  }

  @Delete('studios/:studioId')
  @RequireCapability('assignment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeStudioBooking(
    @Param('filmId', ParseIntPipe) filmId: number,
    @Param('studioId', ParseIntPipe) studioId: number,
  ) {
    await this.assignmentsService.removeStudioBooking(filmId, studioId);
  }

  @Get('crew')
  async listCrewAssignments(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.assignmentsService.listCrewAssignments(filmId);
  }

  @Post('crew')
  @RequireCapability('assignment', 'write')
  async assignCrew(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateCrewAssignmentDto) {
    return this.assignmentsService.assignCrew(filmId, dto);
  }

  @Delete('crew/:crewId')
  @RequireCapability('assignment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeCrewAssignment(
    @Param('filmId', ParseIntPipe) filmId: number,
    @Param('crewId', ParseIntPipe) crewId: number,
  ) {
    await this.assignmentsService.removeCrewAssignment(filmId, crewId);
  }

  @Get('locations')
  async listLocationBookings(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.assignmentsService.listLocationBookings(filmId);
  }

  @Post('locations')
  @RequireCapability('assignment', 'write')
  async bookLocation(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateLocationBookingDto) {
    return this.assignmentsService.bookLocation(filmId, dto);
  }

  @Delete('locations/:locationId')
  @RequireCapability('assignment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeLocationBooking(
    @Param('filmId', ParseIntPipe) filmId: number,
    @Param('locationId', ParseIntPipe) locationId: number,
  ) {
    await this.assignmentsService.removeLocationBooking(filmId, locationId);
  }

  @Get('equipment')
  async listEquipmentUsage(@Param('filmId', ParseIntPipe) filmId: number) {
    return this.equipmentService.listUsage(filmId);
  }

  @Post('equipment')
  @RequireCapability('assignment', 'write')
  async recordEquipmentUsage(@Param('filmId', ParseIntPipe) filmId: number, @Body() dto: CreateEquipmentUsageDto) {
    return this.equipmentService.recordUsage(filmId, dto);
  }
}
