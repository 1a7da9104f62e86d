import { UnknownGatewayError } from '../domain/errors';
import { PaymentGatewayAdapter } from '../interfaces';

/**
 * Gateway adapters keyed by name
 */
export class GatewayRegistry {
  private readonly adapters: Map<string, PaymentGatewayAdapter>;

  constructor(adapters: PaymentGatewayAdapter[]) {
    this.adapters = new Map(adapters.map((adapter) => [adapter.gatewayName, adapter]));
  }

  /**
   * @throws UnknownGatewayError
   */
  get(name: string): PaymentGatewayAdapter {
    const adapter = this.adapters.get(name);
    if (!adapter) {
      throw new UnknownGatewayError(name);
    }
    return adapter;
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  names(): string[] {
    return Array.from(this.adapters.keys());
  }
}
