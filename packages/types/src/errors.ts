/**
 * Protocol error taxonomy.
 *
 * Every ProtocolError is fatal to the atomic unit it occurs in: the unit
 * is aborted and none of its writes become visible. There is no local
 * recovery; callers resubmit a corrected unit.
 */

export type ProtocolErrorCode =
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "INSUFFICIENT_BALANCE"
  | "NOT_OWNER"
  | "INVALID_AUTHORIZATION"
  | "CLAWBACK_DISABLED"
  | "NOT_MANAGED_TREASURY"
  | "CANNOT_CLAWBACK_MANAGED"
  | "SUPPLY_MUST_BE_ZERO"
  | "INSUFFICIENT_SUPPLY"
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "INVALID_IDENTITY"
  | "INVALID_DESCRIPTOR"
  | "REQUEST_CONSUMED"
  | "BALANCE_CONSUMED"
  | "FOREIGN_OBJECT"
  | "ASSET_MISMATCH"
  | "AUTHORITY_LOCKED";

/**
 * Structured error raised by protocol operations.
 * Always thrown — never returned as a value.
 */
export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}
