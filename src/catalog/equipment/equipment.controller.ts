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
import { EquipmentService } from './equipment.service';
import { AVAILABILITY_STATES, Availability } from './entities/equipment.entity';
import { CreateEquipmentDto } from './dto/create-equipment.dto';
import { UpdateEquipmentDto } from './dto/update-equipment.dto';

@Controller('catalog/equipment')
@RequireCapability('equipment', 'read')
export class EquipmentController {
  constructor(private readonly equipmentService: EquipmentService) {}

  @Post()
  @RequireCapability('equipment', 'write')
  async create(@Body() dto: CreateEquipmentDto) {
    return this.equipmentService.create(dto);
  }

  @Get()
  async findAll(@Query('availability') availability?: string) {
    return this.equipmentService.findAll({ availability: parseAvailability(availability) });
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.equipmentService.findOne(id);
  }

  @Patch(':id')
  @RequireCapability('equipment', 'write')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateEquipmentDto) {
    return this.equipmentService.update(id, dto);
  }

  @Delete(':id')
  @RequireCapability('equipment', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.equipmentService.remove(id);
  }
}

function parseAvailability(value?: string): Availability | undefined {
  if (!value) {
    return undefined;
  }
  const availability = AVAILABILITY_STATES.find((candidate) => candidate === value);
  if (!availability) {
    throw new BadRequestException(`availability must be one of: ${AVAILABILITY_STATES.join(', ')}`);
  }
  return availability;
}
