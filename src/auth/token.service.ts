import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import type { UserAccount, UserRole } from './entities/user-account.entity';

export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // seconds

export interface JwtPayload {
  sub: string; // username
  role: UserRole;
}

export interface AuthTokens {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number; // seconds
}

/**
 * Token Service - signs and verifies the access tokens that carry caller identity
 *
 * The role inside a token is informational; authorization always re-reads the
 * account, so a deactivated or demoted user loses access before the token expires.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly accessTokenTtl: number;

  constructor(
    private jwtService: JwtService,
    configService: ConfigService,
  ) {
    const configured = Number(configService.get<string | number>('JWT_EXPIRES_IN'));
    this.accessTokenTtl = Number.isInteger(configured) && configured > 0 ? configured : DEFAULT_ACCESS_TOKEN_TTL;
  }

  async issue(account: Pick<UserAccount, 'username' | 'role'>): Promise<AuthTokens> {
    const payload: JwtPayload = { sub: account.username, role: account.role };
    const access_token = await this.jwtService.signAsync(payload, { expiresIn: this.accessTokenTtl });
    return { access_token, token_type: 'Bearer', expires_in: this.accessTokenTtl };
  }

  /**
   * Payload of a valid, unexpired token; null for anything else
   */
  async verify(token: string): Promise<JwtPayload | null> {
    try {
      const payload = await this.jwtService.verifyAsync<JwtPayload>(token);
      return typeof payload.sub === 'string' && payload.sub ? payload : null;
    } catch (error) {
      this.logger.debug(`Rejected access token: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}
