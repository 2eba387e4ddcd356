export type MarketErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE_ORDER"
  | "DUPLICATE_APPLICATION"
  | "DUPLICATE_SQUAD"
  | "ORDER_NOT_OPEN"
  | "INVALID_TRANSITION"
  | "ALREADY_ASSIGNED"
  | "NO_SUCH_APPLICATION"
  | "NOT_ENOUGH_APPLICANTS"
  | "ORDER_FULL"
  | "SQUAD_FULL"
  | "WORKER_RESTRICTED"
  | "WORKER_NOT_ELIGIBLE"
  | "INSUFFICIENT_BALANCE"
  | "CONFLICT"
  | "VALIDATION_ERROR";

export class MarketError extends Error {
  code: MarketErrorCode;
  details?: unknown;

  constructor(code: MarketErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = "MarketError";
  }
}

export type EntityKind =
  | "user"
  | "escort"
  | "squad"
  | "order"
  | "withdrawal";

export class NotFoundError extends MarketError {
  constructor(entity: EntityKind, key: string | number) {
    super("NOT_FOUND", `${entity} not found: ${key}`, { entity, key });
    this.name = "NotFoundError";
  }
}

export class DuplicateOrderError extends MarketError {
  constructor(memoOrderId: string) {
    super("DUPLICATE_ORDER", `order with memo id ${memoOrderId} already exists`, { memoOrderId });
    this.name = "DuplicateOrderError";
  }
}

export class DuplicateApplicationError extends MarketError {
  constructor(orderId: number, escortId: number) {
    super("DUPLICATE_APPLICATION", `escort ${escortId} already applied to order ${orderId}`, { orderId, escortId });
    this.name = "DuplicateApplicationError";
  }
}

export class DuplicateSquadError extends MarketError {
  constructor(name: string) {
    super("DUPLICATE_SQUAD", `squad "${name}" already exists`, { name });
    this.name = "DuplicateSquadError";
  }
}

export class OrderNotOpenError extends MarketError {
  constructor(orderId: number, status: string) {
    super("ORDER_NOT_OPEN", `order ${orderId} is not open (status=${status})`, { orderId, status });
    this.name = "OrderNotOpenError";
  }
}

export class InvalidTransitionError extends MarketError {
  constructor(message: string, details?: unknown) {
    super("INVALID_TRANSITION", message, details);
    this.name = "InvalidTransitionError";
  }
}

export class AlreadyAssignedError extends MarketError {
  constructor(orderId: number) {
    super("ALREADY_ASSIGNED", `order ${orderId} is already assigned`, { orderId });
    this.name = "AlreadyAssignedError";
  }
}

export class NoSuchApplicationError extends MarketError {
  constructor(orderId: number, escortId: number) {
    super("NO_SUCH_APPLICATION", `escort ${escortId} has not applied to order ${orderId}`, { orderId, escortId });
    this.name = "NoSuchApplicationError";
  }
}

export class NotEnoughApplicantsError extends MarketError {
  constructor(orderId: number, required: number, available: number) {
    super(
      "NOT_ENOUGH_APPLICANTS",
      `order ${orderId} needs ${required} eligible applicant(s), has ${available}`,
      { orderId, required, available }
    );
    this.name = "NotEnoughApplicantsError";
  }
}

export class OrderFullError extends MarketError {
  constructor(orderId: number, limit: number) {
    super("ORDER_FULL", `order ${orderId} already has ${limit} application(s)`, { orderId, limit });
    this.name = "OrderFullError";
  }
}

export class SquadFullError extends MarketError {
  constructor(squadId: number, limit: number) {
    super("SQUAD_FULL", `squad ${squadId} already has ${limit} member(s)`, { squadId, limit });
    this.name = "SquadFullError";
  }
}

export class WorkerRestrictedError extends MarketError {
  constructor(escortId: number, until: Date | null) {
    super(
      "WORKER_RESTRICTED",
      until ? `escort ${escortId} is restricted until ${until.toISOString()}` : `escort ${escortId} is banned`,
      { escortId, until }
    );
    this.name = "WorkerRestrictedError";
  }
}

export type IneligibleReason = "rules_not_accepted" | "missing_game_account" | "not_in_squad";

export class WorkerNotEligibleError extends MarketError {
  reason: IneligibleReason;

  constructor(escortId: number, reason: IneligibleReason) {
    super("WORKER_NOT_ELIGIBLE", `escort ${escortId} cannot take orders: ${reason}`, { escortId, reason });
    this.reason = reason;
    this.name = "WorkerNotEligibleError";
  }
}

export class InsufficientBalanceError extends MarketError {
  constructor(userId: number, balance: number, requested: number) {
    super(
      "INSUFFICIENT_BALANCE",
      `user ${userId} balance ${balance} is below ${requested}`,
      { userId, balance, requested }
    );
    this.name = "InsufficientBalanceError";
  }
}

export class ConflictError extends MarketError {
  constructor(message: string, details?: unknown) {
    super("CONFLICT", message, details);
    this.name = "ConflictError";
  }
}

export class ValidationError extends MarketError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

export function isMarketError(e: unknown): e is MarketError {
  return e instanceof MarketError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
