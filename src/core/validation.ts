import { ValidationError } from "./errors.js";

export function isPositiveAmount(v: number): boolean {
  return Number.isSafeInteger(v) && v > 0;
}

export function isRatingScore(v: number): boolean {
  return Number.isInteger(v) && v >= 1 && v <= 5;
}

// Memo ids come from the customer-facing payment memo: short, no whitespace.
export function isMemoOrderId(v: string): boolean {
  return /^[A-Za-z0-9_-]{1,64}$/.test(v);
}

// PUBG Mobile character ids are 5..12 digits.
export function isGameAccountId(v: string): boolean {
  return /^\d{5,12}$/.test(v);
}

export function isSquadName(v: string): boolean {
  const t = v.trim();
  return t.length > 0 && t.length <= 64;
}

export function assertPositiveAmount(v: number, field = "amount"): void {
  if (!isPositiveAmount(v)) {
    throw new ValidationError(`${field} must be a positive integer amount of minor units`, { [field]: v });
  }
}

export function assertRatingScore(v: number): void {
  if (!isRatingScore(v)) throw new ValidationError("rating must be an integer from 1 to 5", { rating: v });
}
