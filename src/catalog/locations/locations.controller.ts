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
} from '@nestjs/common';
import { RequireCapability } from '../../auth/decorators/require-capability.decorator';
import { LocationsService } from './locations.service';
import { CreateShootingLocationDto } from './dto/create-shooting-location.dto';
import { UpdateShootingLocationDto } from './dto/update-shooting-location.dto';

@Controller('catalog/locations')
@RequireCapability('location', 'read')
export class LocationsController {
  constructor(private readonly locationsService: LocationsService) {}

  @Post()
  @RequireCapability('location', 'write')
  async create(@Body() dto: CreateShootingLocationDto) {
    return this.locationsService.create(dto);
  }

  @Get()
  async findAll(@Query('city') city?: string, @Query('country') country?: string) {
    return this.locationsService.findAll({ city, country });
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.locationsService.findOne(id);
  }

  @Patch(':id')
  @RequireCapability('location', 'write')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateShootingLocationDto) {
    return this.locationsService.update(id, dto);
  }

  @Delete(':id')
  @RequireCapability('location', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.locationsService.remove(id);
  }
}
