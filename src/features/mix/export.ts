import Papa from "papaparse";

import type { FirstOrderRow, MixSummaryRow } from "@/types/domain";

export const MIX_SUMMARY_HEADERS = ["product_mix", "orders", "% of total", "net_sales", "% of net sales"] as const;
export const FIRST_ORDER_HEADERS = ["customer_id", "first_order_id", "first_order_date", "first_order_product_mix"] as const;

type MixSummaryRecord = Record<(typeof MIX_SUMMARY_HEADERS)[number], string | number>;
type FirstOrderRecord = Record<(typeof FIRST_ORDER_HEADERS)[number], string>;

export function toMixSummaryRecords(rows: MixSummaryRow[]): MixSummaryRecord[] {
  return rows.map((row) => ({
    product_mix: row.productMix,
    orders: row.orders,
    "% of total": row.shareOfOrders,
    net_sales: row.netSales,
    "% of net sales": row.shareOfNetSales
  }));
}

export function toFirstOrderRecords(rows: FirstOrderRow[]): FirstOrderRecord[] {
  return rows.map((row) => ({
    customer_id: row.customerKey,
    first_order_id: row.orderId,
    first_order_date: row.date ? row.date.toISOString() : "",
    first_order_product_mix: row.productMix
  }));
}

function toCsv(fields: readonly string[], records: Record<string, string | number>[]): string {
  if (records.length === 0) {
    return Papa.unparse([[...fields]], { newline: "\n" });
  }
  return Papa.unparse({ fields: [...fields], data: records }, { newline: "\n" });
}

export function mixSummaryToCsv(rows: MixSummaryRow[]): string {
  return toCsv(MIX_SUMMARY_HEADERS, toMixSummaryRecords(rows));
}

export function firstOrdersToCsv(rows: FirstOrderRow[]): string {
  return toCsv(FIRST_ORDER_HEADERS, toFirstOrderRecords(rows));
}
