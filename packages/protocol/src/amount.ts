/**
 * Unsigned 64-bit amount arithmetic.
 *
 * Amounts are bigint throughout the protocol. Anything outside
 * [0, 2^64 - 1] is rejected rather than wrapped.
 */

import { ProtocolError } from "@warden/types";

export const MAX_AMOUNT = 2n ** 64n - 1n;

export function assertAmount(amount: bigint): void {
  if (amount < 0n || amount > MAX_AMOUNT) {
    throw new ProtocolError(
      "INVALID_AMOUNT",
      `Amount ${amount} is outside the unsigned 64-bit range`,
    );
  }
}

/**
 * Add two amounts.
 *
 * @throws ProtocolError AMOUNT_OVERFLOW when the sum exceeds MAX_AMOUNT
 */
export function addAmounts(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new ProtocolError(
      "AMOUNT_OVERFLOW",
      `Adding ${b} to ${a} exceeds the maximum amount`,
    );
  }
  return sum;
}

/**
 * Remove burned value from a total supply.
 *
 * @throws ProtocolError INSUFFICIENT_SUPPLY when more is burned than exists
 */
export function reduceSupply(supply: bigint, amount: bigint, assetType: string): bigint {
  if (amount > supply) {
    throw new ProtocolError(
      "INSUFFICIENT_SUPPLY",
      `Cannot burn ${amount} ${assetType} from a supply of ${supply}`,
    );
  }
  return supply - amount;
}

export function formatAmount(amount: bigint): string {
  return amount.toString();
}

/**
 * Parse a decimal amount string as accepted on the wire.
 *
 * @throws ProtocolError INVALID_AMOUNT for non-digit input or out-of-range values
 */
export function parseAmount(value: string): bigint {
  if (!/^(0|[1-9][0-9]*)$/.test(value)) {
    throw new ProtocolError(
      "INVALID_AMOUNT",
      `"${value}" is not a non-negative integer`,
    );
  }
  const amount = BigInt(value);
  assertAmount(amount);
  return amount;
}

/**
 * Balances map as plain strings, for events and responses.
 */
export function formatBalances(
  balances: ReadonlyMap<string, bigint>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [assetType, amount] of balances) {
    out[assetType] = formatAmount(amount);
  }
  return out;
}
