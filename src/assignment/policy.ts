import type { ApplicationRow, EscortRow } from "../db/types.js";
import type { AssignmentPolicyName } from "../market/settings.js";

export type Candidate = {
  application: ApplicationRow;
  escort: EscortRow;
};

export type PolicyLimits = {
  maxAssignees: number;
  minSquadAssignees: number;
};

/** Picks escort ids from eligible candidates (oldest application first), or null. */
export type AssignmentPolicy = (candidates: readonly Candidate[], limits: PolicyLimits) => number[] | null;

export const earliestApplication: AssignmentPolicy = (candidates) => {
  const first = candidates[0];
  return first ? [first.escort.id] : null;
};

/**
 * The squad of the earliest squad application takes the order: every eligible
 * applicant who applied from that squad, up to maxAssignees. Squads are read
 * from the application snapshot, not the worker's current membership.
 */
export const earliestSquad: AssignmentPolicy = (candidates, limits) => {
  const lead = candidates.find((c) => c.application.squad_id !== null);
  if (!lead) return null;

  const members = candidates
    .filter((c) => c.application.squad_id === lead.application.squad_id)
    .slice(0, limits.maxAssignees)
    .map((c) => c.escort.id);

  return members.length >= limits.minSquadAssignees ? members : null;
};

export const POLICIES: Record<AssignmentPolicyName, AssignmentPolicy> = {
  earliest: earliestApplication,
  squad: earliestSquad
};
