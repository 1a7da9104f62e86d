import { Injectable, Inject } from '@nestjs/common';
import type { DispatchModuleConfig } from '../dispatch.config';
import { DISPATCH_CONFIG } from '../constants';
import { buildDashboardLink } from '../../../core';

/**
 * Configuration Service
 *
 * Read access to the resolved dispatch configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(DISPATCH_CONFIG)
    private readonly config: DispatchModuleConfig,
  ) {}

  getConfig(): DispatchModuleConfig {
    return this.config;
  }

  getAdminToken(): string {
    return this.config.admin.token;
  }

  getDashboardUrl(): string {
    return this.config.urls.dashboardUrl;
  }

  /**
   * Dashboard URL pointing at one order, or the bare dashboard
   */
  getDashboardRedirect(orderId: string | null): string {
    return orderId ? buildDashboardLink(this.config.urls.dashboardUrl, orderId) : this.config.urls.dashboardUrl;
  }

  getMaxAttempts(): number {
    return this.config.dispatch?.maxAttempts ?? 3;
  }

  isEventLoggingEnabled(): boolean {
    return this.config.events?.enableLogging === true;
  }
}
