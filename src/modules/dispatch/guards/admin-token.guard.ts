import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { safeEqual } from '../../../_shared/utils';
import { ConfigurationService } from '../services/configuration.service';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

/**
 * Admin Token Guard
 *
 * Requires the configured operator token in the `x-admin-token` header
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  private readonly logger = new Logger(AdminTokenGuard.name);

  constructor(private readonly configuration: ConfigurationService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.header(ADMIN_TOKEN_HEADER);
    const expected = this.configuration.getAdminToken();

    if (!expected || !provided || !safeEqual(provided, expected)) {
      this.logger.warn(`Rejected admin request ${request.method} ${request.path}`);
      throw new UnauthorizedException('Invalid admin token');
    }

    return true;
  }
}
