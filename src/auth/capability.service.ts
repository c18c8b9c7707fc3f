import { Injectable } from '@nestjs/common';
import type { UserRole } from './entities/user-account.entity';

export type Resource =
  | 'film'
  | 'talent'
  | 'crew'
  | 'equipment'
  | 'location'
  | 'partner'
  | 'casting'
  | 'assignment'
  | 'audit'
  | 'report'
  | 'user';
export type Action = 'read' | 'write' | 'administer';

export interface Capability {
  resource: Resource;
  actions: Action[];
}

const DOMAIN_RESOURCES: Resource[] = [
  'film',
  'talent',
  'crew',
  'equipment',
  'location',
  'partner',
  'casting',
  'assignment',
];

const ALL_RESOURCES: Resource[] = [...DOMAIN_RESOURCES, 'audit', 'report', 'user'];

/**
 * Capability Service - closed mapping from role to capability tier
 */
@Injectable()
export class CapabilityService {
  private readonly roleCapabilities: Record<UserRole, Capability[]> = {
    admin: ALL_RESOURCES.map((resource): Capability => ({
      resource,
      actions: ['read', 'write', 'administer'],
    })),
    manager: [
      ...DOMAIN_RESOURCES.map((resource): Capability => ({ resource, actions: ['read', 'write'] })),
      { resource: 'audit', actions: ['read'] },
      { resource: 'report', actions: ['read'] },
    ],
    viewer: [
      ...DOMAIN_RESOURCES.map((resource): Capability => ({ resource, actions: ['read'] })),
      { resource: 'report', actions: ['read'] },
    ],
  };

  /**
   * Check whether a role may perform an action on a resource
   */
  can(role: UserRole, resource: Resource, action: Action): boolean {
    const capabilities = this.roleCapabilities[role] ?? [];
    const capability = capabilities.find((c) => c.resource === resource);

    if (!capability) {
      return false;
    }

    return capability.actions.includes(action);
  }

  getCapabilities(role: UserRole): Capability[] {
    return this.roleCapabilities[role] ?? [];
  }
}
