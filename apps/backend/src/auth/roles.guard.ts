import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY, AppRole } from './roles.decorator';
import { IdentifiedRequest, IdentityContext } from './identity';

@Injectable()
export class RolesGuard implements CanActivate {
  private readonly logger = new Logger(RolesGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<AppRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!required) {
      return true;
    }

    const request = context.switchToHttp().getRequest<IdentifiedRequest>();
    const identity =
      request.identity ?? IdentityContext.fromHeaders(request.headers);
    const userId = identity.currentUserId();

    if (required.length === 0 || identity.hasAnyRole(required)) {
      return true;
    }

    this.logger.warn(
      `Access denied: user '${userId}' with roles [${[...identity.roles].join(', ')}] lacks one of [${required.join(', ')}]`,
    );
    throw new ForbiddenException(
      `Access denied. One of the following roles is required: ${required.join(', ')}`,
    );
  }
}
