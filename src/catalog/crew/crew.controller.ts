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
import { CrewService } from './crew.service';
import { CreateCrewMemberDto } from './dto/create-crew-member.dto';
import { UpdateCrewMemberDto } from './dto/update-crew-member.dto';

@Controller('catalog/crew')
@RequireCapability('crew', 'read')
export class CrewController {
  constructor(private readonly crewService: CrewService) {}

  @Post()
  @RequireCapability('crew', 'write')
  async create(@Body() dto: CreateCrewMemberDto) {
    return this.crewService.create(dto);
  }

  @Get()
  async findAll(@Query('department') department?: string) {
    return this.crewService.findAll({ department });
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.crewService.findOne(id);
  }

  @Get(':id/subordinates')
  async findSubordinates(@Param('id', ParseIntPipe) id: number) {
    return this.crewService.findSubordinates(id);
  }

  @Patch(':id')
  @RequireCapability('crew', 'write')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateCrewMemberDto) {
    return this.crewService.update(id, dto);
  }

  @Delete(':id')
  @RequireCapability('crew', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.crewService.remove(id);
  }
}
