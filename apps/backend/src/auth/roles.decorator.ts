import { SetMetadata } from '@nestjs/common';

export const ROLES_KEY = 'auth_roles';
export type AppRole = 'ROLE_ADMIN';

/** `@Roles()` with no arguments only requires an authenticated caller. */
export const Roles = (...roles: AppRole[]) => SetMetadata(ROLES_KEY, roles);
