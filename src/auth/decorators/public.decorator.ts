import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'is_public';

/**
 * Route reachable without an access token
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
