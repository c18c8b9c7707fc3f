import {
  Controller,
  Post,
  Get,
  Patch,
  Delete,
  Body,
  Param,
  Req,
  HttpCode,
  HttpStatus,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { AccessControlService } from './access-control.service';
import { CapabilityService } from './capability.service';
import { CallerUsername } from './decorators/caller-username.decorator';
import { Public } from './decorators/public.decorator';
import { RequireCapability } from './decorators/require-capability.decorator';
import { LoginDto } from './dto/login.dto';
import { RecordLoginDto } from './dto/record-login.dto';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserStatusDto } from './dto/update-user-status.dto';
import { UpdateUserRoleDto } from './dto/update-user-role.dto';

/**
 * Auth Controller - login and user administration
 *
 * Login is the only public route and returns the bearer token every other route
 * requires. Administrative routes take the caller from that verified token and
 * are authorized inside AccessControlService, so the same checks apply to any
 * other entry point.
 */
@Controller()
export class AuthController {
  constructor(
    private accessControlService: AccessControlService,
    private capabilityService: CapabilityService,
  ) {}

  @Public()
  @Post('auth/login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() loginDto: LoginDto, @Req() req: Request) {
    const result = await this.accessControlService.login(loginDto.username, loginDto.password, clientIp(req));

    if (result.status !== 'AUTHORIZED') {
      throw new UnauthorizedException('Invalid credentials');
    }

    return result;
  }

  @Get('auth/status/:username')
  async authenticate(@Param('username') username: string) {
    return { username, status: await this.accessControlService.authenticate(username) };
  }

  @Get('auth/capabilities/:username')
  async capabilities(@Param('username') username: string) {
    const account = await this.accessControlService.resolveActiveAccount(username);
    return {
      username,
      role: account?.role ?? null,
      capabilities: account ? this.capabilityService.getCapabilities(account.role) : [],
    };
  }

  /**
   * Login bookkeeping for an external credential check
   */
  @Post('auth/login-events')
  @RequireCapability('user', 'administer')
  @HttpCode(HttpStatus.NO_CONTENT)
  async recordLogin(@Body() dto: RecordLoginDto, @Req() req: Request) {
    await this.accessControlService.recordLogin(dto.username, dto.success, dto.ip_address ?? clientIp(req));
  }

  @Get('users')
  async listUsers(@CallerUsername() caller: string) {
    return this.accessControlService.listUsers(caller);
  }

  @Post('users')
  @HttpCode(HttpStatus.CREATED)
  async createUser(@CallerUsername() caller: string, @Body() dto: CreateUserDto) {
    return this.accessControlService.createUser(caller, dto);
  }

  @Patch('users/:username/status')
  async updateStatus(
    @CallerUsername() caller: string,
    @Param('username') username: string,
    @Body() dto: UpdateUserStatusDto,
  ) {
    return this.accessControlService.updateStatus(caller, username, dto.is_active);
  }

  @Patch('users/:username/role')
  async updateRole(
    @CallerUsername() caller: string,
    @Param('username') username: string,
    @Body() dto: UpdateUserRoleDto,
  ) {
    return this.accessControlService.updateRole(caller, username, dto.role);
  }

  @Delete('users/:username')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteUser(@CallerUsername() caller: string, @Param('username') username: string) {
    await this.accessControlService.deleteUser(caller, username);
  }
}

function clientIp(req: Request): string | undefined {
  const forwarded = req.headers['x-forwarded-for'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(',')[0];
  return first?.trim() || req.ip || undefined;
}
