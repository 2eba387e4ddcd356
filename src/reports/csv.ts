import type { OrderExportRow } from "../db/types.js";
import { formatDate, formatMinorUnits } from "./format.js";

export function csvEscape(v: string): string {
  if (v.includes('"') || v.includes(",") || v.includes("\n") || v.includes("\r")) {
    return `"${v.replace(/"/g, '""')}"`;
  }
  return v;
}

function orderToRow(o: OrderExportRow): string[] {
  return [
    o.memo_order_id,
    o.customer_info,
    formatMinorUnits(o.amount),
    formatMinorUnits(o.commission_amount),
    o.status,
    formatDate(o.created_at),
    formatDate(o.finished_at),
    o.squad_name ?? "",
    formatMinorUnits(o.payout_total),
    formatDate(o.last_payout_at)
  ];
}

export function generateOrdersCsv(orders: readonly OrderExportRow[]): string {
  const header = [
    "memo_order_id",
    "customer_info",
    "amount",
    "commission",
    "status",
    "created_at",
    "finished_at",
    "squad",
    "paid_out",
    "last_payout_at"
  ];

  const rows = [header, ...orders.map(orderToRow)];
  return rows.map((r) => r.map((v) => csvEscape(v)).join(",")).join("\n") + "\n";
}
