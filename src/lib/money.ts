import { Cents } from '@/contracts';

const DECIMAL_RE = /^(\d+)(?:\.(\d{1,2}))?$/;

function assertCents(value: number, label: string): Cents {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} is not a non-negative safe integer amount of cents: ${value}`);
  }
  return value;
}

/**
 * Parses a decimal amount ("10", "10.5", "10.50") into cents without going
 * through binary floating point. Numbers are accepted only when they print
 * back to such a decimal.
 */
export function parseMoney(input: string | number): Cents {
  const text = typeof input === 'number' ? String(input) : input.trim();
  const match = DECIMAL_RE.exec(text);
  if (!match) {
    throw new RangeError(`Not a fixed-point amount with at most two decimals: ${text}`);
  }
  const whole = match[1];
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return assertCents(Number(whole) * 100 + Number(fraction), 'Parsed amount');
}

export function formatMoney(cents: Cents): string {
  assertCents(cents, 'Amount');
  const whole = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}

export function multiplyMoney(unit: Cents, quantity: number): Cents {
  if (!Number.isSafeInteger(quantity) || quantity < 0) {
    throw new RangeError(`Quantity must be a non-negative integer: ${quantity}`);
  }
  return assertCents(assertCents(unit, 'Unit price') * quantity, 'Line total');
}

export function sumMoney(amounts: readonly Cents[]): Cents {
  return amounts.reduce<Cents>((sum, amount) => assertCents(sum + assertCents(amount, 'Addend'), 'Sum'), 0);
}
