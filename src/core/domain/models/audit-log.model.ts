import { AuditAction, OrderStatus, TriggerType } from '../enums';

/**
 * AuditLog domain model - append-only record of every status change
 * Tells which entry point won a transition and who overrode what
 */
export class AuditLog {
  constructor(
    public readonly id: string,
    public readonly orderId: string,
    public readonly action: AuditAction,
    public readonly fromStatus: OrderStatus | null,
    public readonly toStatus: OrderStatus | null,
    public readonly trigger: TriggerType,
    public readonly actor: string = 'system',
    public readonly reason: string | null = null,
    public readonly metadata: Record<string, unknown> = {},
    public readonly createdAt: Date = new Date(),
  ) {}

  isOverride(): boolean {
    return this.action === AuditAction.ADMIN_OVERRIDE;
  }

  /**
   * Get a human-readable description of the entry
   */
  getDescription(): string {
    const from = this.fromStatus ?? 'creation';
    const to = this.toStatus ?? from;
    let description = `${this.action}: ${from} -> ${to} via ${this.trigger}`;

    if (this.actor !== 'system') {
      description += ` by ${this.actor}`;
    }

    if (this.reason) {
      description += `: ${this.reason}`;
    }

    return description;
  }
}
