import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';

import { ErrorCode } from '../common/error-codes';
import { SessionsService } from './sessions.service';
import { AuthenticatedRequest, SessionPrincipal } from './types';

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly sessionsService: SessionsService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearer(request.headers.authorization ?? '');
    if (!token) {
      throw new UnauthorizedException('Missing bearer token', {
        description: ErrorCode.Unauthorized,
      });
    }

    const principal = this.sessionsService.verify(token);
    request.principal = { ...principal, token };
    return true;
  }
}

export function extractBearer(value: string): string | null {
  const [scheme, token, ...rest] = value.trim().split(/\s+/);
  if (!scheme || !token || rest.length > 0 || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

export function requirePrincipal(
  request: AuthenticatedRequest,
): SessionPrincipal & { token: string } {
  if (!request.principal) {
    throw new UnauthorizedException('Missing session', { description: ErrorCode.Unauthorized });
  }
  return request.principal;
}
