import { z } from "zod";

import { MissingRequiredColumnError } from "@/lib/errors";
import { CANONICAL_FIELDS, type CanonicalField, type ColumnAliases, type ColumnMap, type RawTable } from "@/types/domain";

const REQUIRED_FIELDS: readonly CanonicalField[] = ["order_id"];

// Ordered by priority within each field: Shopify report headers first, then BigCommerce and WooCommerce exports.
export const COLUMN_ALIASES: ColumnAliases = {
  order_id: ["order id", "name", "order", "order number", "order_id"],
  customer_id: ["customer id", "customer_id", "customer"],
  email: ["customer email", "email", "customer_email", "billing_email"],
  date: ["created at", "created_at", "processed at", "order date", "day", "date", "hour", "time"],
  product_title: ["product title", "lineitem name", "title", "product name", "line_item_name"],
  variant_title: ["product variant title", "variant title", "variant", "lineitem variant", "line_item_variation", "option"],
  sku: ["product variant sku", "variant sku", "sku", "lineitem sku", "line_item_sku"],
  net_sales: ["net sales", "total sales", "total price", "net_total", "net revenue"],
  quantity: ["net quantity", "quantity ordered", "lineitem quantity", "line_item_quantity", "quantity", "qty"],
  financial_status: ["order payment status", "financial status", "payment status", "order_status"],
  canceled: ["is canceled order", "cancelled", "canceled", "is_canceled", "is_cancelled"]
};

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null(), z.undefined()]);
const csvRecordSchema = z.record(z.string(), cellSchema);

export type RawCsvRecord = z.infer<typeof csvRecordSchema>;

export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[_-]/g, " ").trim();
}

function lookupBy(columns: readonly string[], keyOf: (column: string) => string): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const column of columns) {
    lookup.set(keyOf(column), column);
  }
  return lookup;
}

export function resolveColumn(columns: readonly string[], aliases: readonly string[]): string | undefined {
  const exact = new Set(columns);
  for (const alias of aliases) {
    if (exact.has(alias)) {
      return alias;
    }
  }

  const lowerCased = lookupBy(columns, (column) => column.toLowerCase());
  for (const alias of aliases) {
    const match = lowerCased.get(alias.toLowerCase());
    if (match !== undefined) {
      return match;
    }
  }

  const normalized = lookupBy(columns, normalizeHeader);
  for (const alias of aliases) {
    const match = normalized.get(normalizeHeader(alias));
    if (match !== undefined) {
      return match;
    }
  }

  return undefined;
}

export function resolveColumns(columns: readonly string[], aliases: ColumnAliases = COLUMN_ALIASES): ColumnMap {
  const columnMap: ColumnMap = {};

  for (const field of CANONICAL_FIELDS) {
    const found = resolveColumn(columns, aliases[field]);
    if (found !== undefined) {
      columnMap[field] = found;
    }
  }

  const missing = REQUIRED_FIELDS.find((field) => columnMap[field] === undefined);
  if (missing) {
    throw new MissingRequiredColumnError(missing, [...columns]);
  }

  return columnMap;
}

function collectColumns(rows: RawCsvRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows.slice(0, 20)) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return Array.from(seen);
}

export function validateCsvRows(rows: unknown[], columns?: string[]): RawTable {
  const parsed = z.array(csvRecordSchema).safeParse(rows);
  if (!parsed.success) {
    throw new Error("Order export could not be read as a table of rows.");
  }

  return {
    columns: columns ?? collectColumns(parsed.data),
    rows: parsed.data
  };
}
