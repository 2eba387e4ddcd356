import { InvalidTransitionError } from "../core/errors.js";
import type { OrderRow, OrderStatus } from "../db/types.js";

export type OrderEvent = "assign" | "start" | "complete" | "cancel";

const TRANSITIONS: Record<OrderEvent, { from: readonly OrderStatus[]; to: OrderStatus }> = {
  assign: { from: ["open"], to: "assigned" },
  start: { from: ["assigned"], to: "in_progress" },
  complete: { from: ["assigned", "in_progress"], to: "completed" },
  cancel: { from: ["open", "assigned"], to: "cancelled" }
};

export function canTransition(status: OrderStatus, event: OrderEvent): boolean {
  return TRANSITIONS[event].from.includes(status);
}

export function nextStatus(order: OrderRow, event: OrderEvent): OrderStatus {
  const t = TRANSITIONS[event];
  if (!t.from.includes(order.status)) {
    throw new InvalidTransitionError(`cannot ${event} order ${order.id} in status ${order.status}`, {
      orderId: order.id,
      status: order.status,
      event
    });
  }
  return t.to;
}
