import type { config as appConfig } from "../core/config.js";
import type { Clock } from "../core/clock.js";
import { assertValidPolicy, type CommissionPolicy, parseCommissionTiers } from "../ledger/commission.js";

export type AssignmentPolicyName = "earliest" | "squad";

export type MarketSettings = {
  commission: CommissionPolicy;
  assignmentPolicy: AssignmentPolicyName;
  maxApplicants: number;
  maxAssignees: number;
  minSquadAssignees: number;
  maxSquadMembers: number;
  requireGameAccount: boolean;
  requireSquad: boolean;
  minWithdrawal: number;
  conflictRetries: number;
  conflictBackoffMs: number;
};

/** What every engine function receives next to the transaction. */
export type MarketContext = {
  settings: MarketSettings;
  now: Clock;
};

export const DEFAULT_SETTINGS: MarketSettings = {
  commission: { kind: "fixed", rateBps: 2000 },
  assignmentPolicy: "earliest",
  maxApplicants: 4,
  maxAssignees: 4,
  minSquadAssignees: 2,
  maxSquadMembers: 6,
  requireGameAccount: true,
  requireSquad: false,
  minWithdrawal: 1,
  conflictRetries: 3,
  conflictBackoffMs: 25
};

function isPolicyName(v: string): v is AssignmentPolicyName {
  return v === "earliest" || v === "squad";
}

export function validateSettings(s: MarketSettings): MarketSettings {
  assertValidPolicy(s.commission);
  const positive: Array<keyof MarketSettings> = [
    "maxApplicants",
    "maxAssignees",
    "minSquadAssignees",
    "maxSquadMembers",
    "minWithdrawal"
  ];
  for (const key of positive) {
    const v = s[key];
    if (typeof v !== "number" || !Number.isSafeInteger(v) || v <= 0) {
      throw new Error(`setting ${key} must be a positive integer, got ${String(v)}`);
    }
  }
  if (s.minSquadAssignees > s.maxAssignees) {
    throw new Error("minSquadAssignees cannot exceed maxAssignees");
  }
  if (s.conflictRetries < 0 || s.conflictBackoffMs < 0) {
    throw new Error("conflict retry settings cannot be negative");
  }
  return s;
}

export function marketSettingsFromConfig(cfg: typeof appConfig): MarketSettings {
  const policy = cfg.assignmentPolicy.toLowerCase().trim();
  if (!isPolicyName(policy)) throw new Error(`ASSIGNMENT_POLICY must be "earliest" or "squad", got "${policy}"`);

  const commission: CommissionPolicy = cfg.commissionTiers
    ? { kind: "tiered", tiers: parseCommissionTiers(cfg.commissionTiers) }
    : { kind: "fixed", rateBps: cfg.commissionRateBps };

  return validateSettings({
    commission,
    assignmentPolicy: policy,
    maxApplicants: cfg.maxApplicants,
    maxAssignees: cfg.maxAssignees,
    minSquadAssignees: cfg.minSquadAssignees,
    maxSquadMembers: cfg.maxSquadMembers,
    requireGameAccount: cfg.requireGameAccount,
    requireSquad: cfg.requireSquad,
    minWithdrawal: cfg.minWithdrawal,
    conflictRetries: cfg.conflictRetries,
    conflictBackoffMs: cfg.conflictBackoffMs
  });
}
