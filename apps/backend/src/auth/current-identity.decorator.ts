import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { IdentifiedRequest, IdentityContext } from './identity';

export const CurrentIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): IdentityContext => {
    const request = ctx.switchToHttp().getRequest<IdentifiedRequest>();
    return request.identity ?? IdentityContext.anonymous();
  },
);
