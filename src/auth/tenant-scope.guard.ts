import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';

/** Header the credential-exchange edge sets to the caller's scoped tenant. */
export const TENANT_SCOPE_HEADER = 'x-tenant-scope';

/**
 * Throws unless the caller's scope covers `requestedTenant`. A route without a
 * tenant parameter only needs a scope to be present.
 */
export function assertTenantScope(scope: string | undefined, requestedTenant: string | undefined) {
  if (!scope) {
    throw new UnauthorizedException('missing tenant scope');
  }
  if (requestedTenant !== undefined && requestedTenant !== scope) {
    throw new ForbiddenException('tenant scope does not match the requested tenant');
  }
}

@Injectable()
export class TenantScopeGuard implements CanActivate {
  private readonly log = new Logger(TenantScopeGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const req = context.switchToHttp().getRequest<Request>();
    const header = req.headers[TENANT_SCOPE_HEADER];
    const scope = Array.isArray(header) ? header[0] : header;
    const requested = req.params?.tenantId;

    try {
      assertTenantScope(scope?.trim() || undefined, requested);
    } catch (error) {
      this.log.warn(`🚫 ${req.method} ${req.url} denied for scope "${scope ?? ''}"`);
      throw error;
    }
    return true;
  }
}
