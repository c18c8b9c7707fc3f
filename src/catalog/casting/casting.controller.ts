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
import { CastingService } from './casting.service';
import { CreateCastRoleDto } from './dto/create-cast-role.dto';
import { UpdateCastRoleDto } from './dto/update-cast-role.dto';

@Controller('catalog/roles')
@RequireCapability('casting', 'read')
export class CastingController {
  constructor(private readonly castingService: CastingService) {}

  @Post()
  @RequireCapability('casting', 'write')
  async cast(@Body() dto: CreateCastRoleDto) {
    return this.castingService.cast(dto);
  }

  /**
   * Roles of a film or of an actor; one of the two filters is required
   */
  @Get()
  async find(@Query('film_id') filmId?: string, @Query('actor_id') actorId?: string) {
    if (filmId) {
      return this.castingService.findByFilm(parseInt(filmId, 10));
    }
    if (actorId) {
      return this.castingService.findByActor(parseInt(actorId, 10));
    }
    throw new BadRequestException('film_id or actor_id is required');
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.castingService.findOne(id);
  }

  @Patch(':id')
  @RequireCapability('casting', 'write')
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateCastRoleDto) {
    return this.castingService.update(id, dto);
  }

  @Delete(':id')
  @RequireCapability('casting', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.castingService.remove(id);
  }
}
