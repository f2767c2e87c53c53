import { Money } from './money';
import { ValidationError } from '../../shared/errors/domain.errors';

describe('Money', () => {
  it('keeps minor units and currency', () => {
    const money = Money.ofMinor(1999, 'EUR');

    expect(money.amountMinor).toBe(1999);
    expect(money.currency).toBe('EUR');
    expect(money.toJSON()).toEqual({ amountMinor: 1999, currency: 'EUR' });
  });

  it('converts decimal amounts to minor units', () => {
    expect(Money.of(4.99, 'EUR').amountMinor).toBe(499);
    expect(Money.of(0.1 + 0.2, 'EUR').amountMinor).toBe(30);
  });

  it('rounds half cents up on the decimal value', () => {
    expect(Money.of(1.005, 'EUR').amountMinor).toBe(101);
    expect(Money.of(2.675, 'EUR').amountMinor).toBe(268);
    expect(Money.of(0.004, 'EUR').amountMinor).toBe(0);
  });

  it('rejects fractional minor units, negatives and bad currency codes', () => {
    expect(() => Money.ofMinor(10.5, 'EUR')).toThrow(ValidationError);
    expect(() => Money.ofMinor(-1, 'EUR')).toThrow('Amount cannot be negative');
    expect(() => Money.ofMinor(100, 'eur')).toThrow("Invalid currency code 'eur'");
    expect(() => Money.of(Number.NaN, 'EUR')).toThrow('Amount must be a finite number');
  });

  it('adds and multiplies exactly', () => {
    const price = Money.ofMinor(2500, 'EUR');

    expect(price.multiply(2).add(Money.ofMinor(499, 'EUR')).amountMinor).toBe(5499);
  });

  it('refuses to combine currencies', () => {
    const euros = Money.ofMinor(100, 'EUR');
    const dollars = Money.ofMinor(100, 'USD');

    expect(() => euros.add(dollars)).toThrow('Currency mismatch');
    expect(() => euros.isGreaterThan(dollars)).toThrow(ValidationError);
  });

  it('rejects negative or fractional quantities', () => {
    const price = Money.ofMinor(100, 'EUR');

    expect(() => price.multiply(-1)).toThrow(
      'Quantity must be a non-negative integer, got -1',
    );
    expect(() => price.multiply(1.5)).toThrow(ValidationError);
  });

  it('compares by amount and currency', () => {
    expect(Money.ofMinor(100, 'EUR').equals(Money.ofMinor(100, 'EUR'))).toBe(true);
    expect(Money.ofMinor(100, 'EUR').equals(Money.ofMinor(100, 'USD'))).toBe(false);
    expect(Money.ofMinor(101, 'EUR').isGreaterThan(Money.ofMinor(100, 'EUR'))).toBe(true);
  });

  it('formats with two decimals', () => {
    expect(Money.ofMinor(5500, 'EUR').toString()).toBe('55.00 EUR');
    expect(Money.ofMinor(5, 'EUR').format()).toBe('0.05');
  });
});
