import { LedgerError, ledgerAssert } from "../errors";

export const UNIT = 10n ** 18n;
export const MAX_UINT256 = 2n ** 256n - 1n;

const checkU256 = (v: bigint, what: string): bigint => {
  if (v < 0n || v > MAX_UINT256)
    throw new LedgerError("RebaseOverflow", `${what} out of uint256 range`, {
      value: v.toString(),
    });
  return v;
};

/**
 * floor(a * b / d) with an unbounded intermediate product; only the result
 * is range-checked.
 */
export const mulDiv = (a: bigint, b: bigint, d: bigint): bigint => {
  if (d === 0n) throw new RangeError("mulDiv by zero");
  return checkU256((a * b) / d, "mulDiv result");
};

export const toShares = (amount: bigint, index: bigint): bigint =>
  mulDiv(amount, UNIT, index);

export const toTokens = (shares: bigint, index: bigint): bigint =>
  mulDiv(shares, index, UNIT);

/**
 * Elastic supply for a prospective (shares, index) pair plus the fixed
 * (opted-out) supply; throws RebaseOverflow past uint256.
 */
export const checkElasticSupply = (
  totalShares: bigint,
  index: bigint,
  absoluteSupply: bigint,
): bigint =>
  checkU256(toTokens(totalShares, index) + absoluteSupply, "elastic supply");

/** Token amounts entering the ledger are uint256. */
export const checkAmount = (amount: bigint): void =>
  ledgerAssert(amount >= 0n && amount <= MAX_UINT256, "InvalidAmount", "amount out of uint256 range", {
    amount: amount.toString(),
  });
