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
import { PartnersService } from './partners.service';
import { CreateStudioDto } from './dto/create-studio.dto';
import { UpdateStudioDto } from './dto/update-studio.dto';
import { CreateDistributorDto } from './dto/create-distributor.dto';
import { UpdateDistributorDto } from './dto/update-distributor.dto';

@Controller('catalog')
@RequireCapability('partner', 'read')
export class PartnersController {
  constructor(private readonly partnersService: PartnersService) {}

  @Post('studios')
  @RequireCapability('partner', 'write')
  async createStudio(@Body() dto: CreateStudioDto) {
    return this.partnersService.createStudio(dto);
  }

  @Get('studios')
  async findStudios() {
    return this.partnersService.findStudios();
  }

  @Get('studios/:id')
  async findStudio(@Param('id', ParseIntPipe) id: number) {
    return this.partnersService.findStudio(id);
  }

  @Patch('studios/:id')
  @RequireCapability('partner', 'write')
  async updateStudio(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateStudioDto) {
    return this.partnersService.updateStudio(id, dto);
  }

  @Delete('studios/:id')
  @RequireCapability('partner', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeStudio(@Param('id', ParseIntPipe) id: number) {
    await this.partnersService.removeStudio(id);
  }

  @Post('distributors')
  @RequireCapability('partner', 'write')
  async createDistributor(@Body() dto: CreateDistributorDto) {
    return this.partnersService.createDistributor(dto);
  }

  @Get('distributors')
  async findDistributors() {
    return this.partnersService.findDistributors();
  }

  @Get('distributors/:id')
  async findDistributor(@Param('id', ParseIntPipe) id: number) {
    return this.partnersService.findDistributor(id);
  }

  @Patch('distributors/:id')
  @RequireCapability('partner', 'write')
  async updateDistributor(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateDistributorDto) {
    return this.partnersService.updateDistributor(id, dto);
  }

  @Delete('distributors/:id')
  @RequireCapability('partner', 'write')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeDistributor(@Param('id', ParseIntPipe) id: number) {
    await this.partnersService.removeDistributor(id);
  }
}
