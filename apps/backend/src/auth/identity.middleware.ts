import { Injectable, NestMiddleware } from '@nestjs/common';
import { IdentifiedRequest, IdentityContext } from './identity';

@Injectable()
export class IdentityMiddleware implements NestMiddleware {
  use(req: IdentifiedRequest, _res: unknown, next: () => void) {
    req.identity = IdentityContext.fromHeaders(req.headers);
    next();
  }
}
