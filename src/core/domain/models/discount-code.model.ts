/**
 * Percentage discount a customer can apply at submission
 */
export class DiscountCode {
  constructor(
    public readonly code: string,
    public readonly percent: number,
    public active: boolean = true,
    public readonly maxUses: number | null = null,
    public usesCount: number = 0,
    public readonly expiresAt: Date | null = null,
    public readonly createdAt: Date = new Date(),
  ) {}

  /**
   * Reason the code cannot be used right now, or null when it can
   */
  unusableReason(now: Date = new Date()): DiscountRejection | null {
    if (!this.active) {
      return 'inactive';
    }
    if (this.maxUses !== null && this.usesCount >= this.maxUses) {
      return 'exhausted';
    }
    if (this.expiresAt && now > this.expiresAt) {
      return 'expired';
    }
    return null;
  }

  static normalize(code: string): string {
    return code.trim().toUpperCase();
  }
}

export type DiscountRejection =
  | 'empty'
  | 'not_found'
  | 'inactive'
  | 'exhausted'
  | 'expired';
