import { Injectable, ExecutionContext, CanActivate, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AccessControlService } from '../access-control.service';
import { CapabilityService } from '../capability.service';
import { TokenService } from '../token.service';
import { REQUIRED_CAPABILITY_KEY, RequiredCapability } from '../decorators/require-capability.decorator';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { AuthorizationException } from '../../common/exceptions/authorization.exception';

/**
 * Authenticates every non-public route from its bearer token, then allows the
 * request when the caller is an active account whose role grants the capability
 * declared with @RequireCapability. Routes without one only need an active caller.
 */
@Injectable()
export class CapabilityGuard implements CanActivate {
  private readonly logger = new Logger(CapabilityGuard.name);

  constructor(
    private reflector: Reflector,
    private tokenService: TokenService,
    private accessControlService: AccessControlService,
    private capabilityService: CapabilityService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const targets = [context.getHandler(), context.getClass()];

    if (this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, targets)) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.header('authorization'));
    const payload = token ? await this.tokenService.verify(token) : null;

    if (!payload) {
      this.logger.warn(`Rejected ${request.method} ${request.path}: missing or invalid access token`);
      throw new UnauthorizedException('Missing or invalid access token');
    }

    const required = this.reflector.getAllAndOverride<RequiredCapability | undefined>(REQUIRED_CAPABILITY_KEY, targets);
    const operation = required ? `${required.action}:${required.resource}` : `${request.method} ${request.path}`;

    const account = await this.accessControlService.resolveActiveAccount(payload.sub);
    if (!account) {
      this.logger.warn(`Denied ${operation} for ${payload.sub}: no active account`);
      throw new AuthorizationException(payload.sub, operation, 'Caller is not an active user');
    }

    request.caller = { username: account.username, role: account.role };

    if (required && !this.capabilityService.can(account.role, required.resource, required.action)) {
      this.logger.warn(`Denied ${operation} for ${account.username}: role ${account.role}`);
      throw new AuthorizationException(
        account.username,
        operation,
        `Role ${account.role} cannot ${required.action} ${required.resource}`,
        { role: account.role },
      );
    }

    return true;
  }
}

function extractBearerToken(header: string | undefined): string | null {
  const [scheme, token] = header?.trim().split(/\s+/) ?? [];
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
}
