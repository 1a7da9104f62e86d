/**
 * Currencies without a minor unit (ISO 4217 exponent 0)
 */
const ZERO_DECIMAL_CURRENCIES = new Set(['CLP', 'JPY', 'KRW', 'PYG', 'VND']);

/**
 * Money value object - immutable representation of monetary values
 * Stores amounts in smallest currency unit (e.g., cents; whole pesos for CLP)
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    if (!Number.isInteger(amount)) {
      throw new Error('Amount must be an integer (smallest currency unit)');
    }
    if (amount < 0) {
      throw new Error('Amount cannot be negative');
    }
    if (!currency || currency.length !== 3) {
      throw new Error('Currency must be a 3-letter ISO 4217 code');
    }

    this._amount = amount;
    this._currency = currency.toUpperCase();
  }

  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }

  /**
   * Number of decimal places of the currency's major unit
   */
  get exponent(): number {
    return ZERO_DECIMAL_CURRENCIES.has(this._currency) ? 0 : 2;
  }

  equals(other: Money): boolean {
    return this._amount === other._amount && this._currency === other._currency;
  }

  /**
   * Apply a whole-number percentage discount, rounding down
   */
  discount(percent: number): Money {
    if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
      throw new Error('Discount percent must be an integer between 0 and 100');
    }
    return new Money(
      Math.floor((this._amount * (100 - percent)) / 100),
      this._currency,
    );
  }

  isZero(): boolean {
    return this._amount === 0;
  }

  /**
   * Convert to major currency units (e.g., dollars from cents)
   */
  toMajorUnits(): number {
    return this._amount / Math.pow(10, this.exponent);
  }

  toString(): string {
    return `${this._currency} ${this._amount}`;
  }

  toJSON(): { amount: number; currency: string } {
    return {
      amount: this._amount,
      currency: this._currency,
    };
  }
}
