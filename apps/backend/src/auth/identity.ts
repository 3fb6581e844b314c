import { UnauthorizedException } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';

export const USER_ID_HEADER = 'x-user-id';
export const USER_ROLES_HEADER = 'x-user-roles';

export const normalizeRole = (role: string) =>
  role.toLowerCase().replace(/[\s_-]/g, '');

const firstHeader = (value: string | string[] | undefined) =>
  Array.isArray(value) ? value[0] : value;

/**
 * Caller identity as asserted by the upstream gateway. Built once per request
 * by IdentityMiddleware; the values are trusted, not verified.
 */
export class IdentityContext {
  private readonly normalizedRoles: ReadonlySet<string>;

  constructor(
    readonly userId: string | undefined,
    readonly roles: ReadonlySet<string>,
  ) {
    this.normalizedRoles = new Set([...roles].map(normalizeRole));
  }

  static anonymous() {
    return new IdentityContext(undefined, new Set());
  }

  static fromHeaders(headers: IncomingHttpHeaders) {
    const userId = firstHeader(headers[USER_ID_HEADER])?.trim();
    const roles = (firstHeader(headers[USER_ROLES_HEADER]) ?? '')
      .split(',')
      .map((role) => role.trim())
      .filter((role) => role.length > 0);
    return new IdentityContext(userId || undefined, new Set(roles));
  }

  get authenticated() {
    return this.userId !== undefined;
  }

  currentUserId(): string {
    if (!this.userId) {
      throw new UnauthorizedException('User is not authenticated');
    }
    return this.userId;
  }

  hasRole(role: string) {
    return this.normalizedRoles.has(normalizeRole(role));
  }

  hasAnyRole(roles: readonly string[]) {
    return roles.some((role) => this.hasRole(role));
  }
}

export type IdentifiedRequest = {
  headers: IncomingHttpHeaders;
  identity?: IdentityContext;
};
