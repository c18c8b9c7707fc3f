import { SetMetadata } from '@nestjs/common';
import type { Action, Resource } from '../capability.service';

export const REQUIRED_CAPABILITY_KEY = 'required_capability';

export interface RequiredCapability {
  resource: Resource;
  action: Action;
}

export const RequireCapability = (resource: Resource, action: Action) =>
  SetMetadata(REQUIRED_CAPABILITY_KEY, { resource, action } satisfies RequiredCapability);
