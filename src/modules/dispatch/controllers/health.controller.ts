import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { BackgroundTaskRunner, GatewayRegistry, OrderStore } from '../../../core';
import { GATEWAY_REGISTRY, ORDER_STORE, TASK_RUNNER } from '../constants';
import { ApiHealthCheck, ApiReadinessCheck } from '../../../_shared/swagger/decorators';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(ORDER_STORE)
    private readonly store: OrderStore,
    @Inject(GATEWAY_REGISTRY)
    private readonly gateways: GatewayRegistry,
    @Inject(TASK_RUNNER)
    private readonly runner: BackgroundTaskRunner,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: string;
    checks: {
      database: boolean;
      gateways: boolean;
    };
    details: {
      database: string;
      gateways: string[];
      runner: ReturnType<BackgroundTaskRunner['getStats']>;
    };
  }> {
    const databaseHealthy = await this.store.isHealthy();
    const gateways = this.gateways.names();

    return {
      status: databaseHealthy ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        gateways: gateways.length > 0,
      },
      details: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        gateways,
        runner: this.runner.getStats(),
      },
    };
  }
}
