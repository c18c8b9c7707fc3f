import { Request } from 'express';
import type { UserRole } from '../entities/user-account.entity';

export interface CallerIdentity {
  username: string;
  role: UserRole;
}

/**
 * Request after CapabilityGuard has verified the bearer token
 */
export interface AuthenticatedRequest extends Request {
  caller?: CallerIdentity;
}
