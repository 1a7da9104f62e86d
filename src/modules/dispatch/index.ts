/**
 * Dispatch NestJS Module
 */

// Main module
export { DispatchModule } from './dispatch.module';

// Configuration
export {
  DispatchModuleConfig,
  DispatchModuleAsyncConfig,
  defaultDispatchConfig,
  resolveDispatchConfig,
} from './dispatch.config';
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Guards and interceptors
export { AdminTokenGuard, ADMIN_TOKEN_HEADER } from './guards/admin-token.guard';
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';

export { toHttpException } from './http-errors';
export { toInboundNotification } from './inbound-notification';
