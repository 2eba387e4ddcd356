export type CommissionTier = {
  upTo: number | null; // inclusive upper bound of the order amount; null = no bound
  rateBps: number;
};

export type CommissionPolicy =
  | { kind: "fixed"; rateBps: number }
  | { kind: "tiered"; tiers: CommissionTier[] };

const BPS = 10_000n;

function isRate(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 10_000;
}

function isTier(v: unknown): v is CommissionTier {
  if (!v || typeof v !== "object") return false;
  if (!("upTo" in v) || !("rateBps" in v)) return false;
  const upTo = v.upTo;
  return (upTo === null || (typeof upTo === "number" && Number.isSafeInteger(upTo) && upTo > 0)) && isRate(v.rateBps);
}

export function assertValidPolicy(policy: CommissionPolicy): void {
  if (policy.kind === "fixed") {
    if (!isRate(policy.rateBps)) throw new Error(`commission rate must be 0..10000 bps, got ${policy.rateBps}`);
    return;
  }
  if (!policy.tiers.length) throw new Error("tiered commission needs at least one tier");
  let prev = 0;
  policy.tiers.forEach((tier, i) => {
    if (!isTier(tier)) throw new Error(`invalid commission tier #${i}`);
    const last = i === policy.tiers.length - 1;
    if (tier.upTo === null && !last) throw new Error("only the last commission tier may be unbounded");
    if (tier.upTo !== null && tier.upTo <= prev) throw new Error("commission tiers must ascend by upTo");
    prev = tier.upTo ?? prev;
  });
  if (policy.tiers[policy.tiers.length - 1]?.upTo !== null) {
    throw new Error("the last commission tier must be unbounded (upTo: null)");
  }
}

/** Parses COMMISSION_TIERS, e.g. `[{"upTo":500000,"rateBps":2000},{"upTo":null,"rateBps":1500}]`. */
export function parseCommissionTiers(raw: string): CommissionTier[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every(isTier)) {
    throw new Error("COMMISSION_TIERS must be a JSON array of {upTo: number|null, rateBps: number}");
  }
  return parsed;
}

export function rateFor(policy: CommissionPolicy, amount: number): number {
  if (policy.kind === "fixed") return policy.rateBps;
  const tier = policy.tiers.find((t) => t.upTo === null || amount <= t.upTo);
  if (!tier) throw new Error(`no commission tier covers amount ${amount}`);
  return tier.rateBps;
}

/** Platform share of an order amount, rounded down to a whole minor unit. */
export function commissionFor(policy: CommissionPolicy, amount: number): number {
  return Number((BigInt(amount) * BigInt(rateFor(policy, amount))) / BPS);
}

/**
 * Splits `total` into `parts` integer shares that sum to `total`; the first
 * `total % parts` shares get one extra unit.
 */
export function splitEvenly(total: number, parts: number): number[] {
  if (!Number.isInteger(parts) || parts <= 0) throw new Error(`cannot split into ${parts} part(s)`);
  const base = Math.floor(total / parts);
  const rest = total - base * parts;
  return Array.from({ length: parts }, (_, i) => base + (i < rest ? 1 : 0));
}
