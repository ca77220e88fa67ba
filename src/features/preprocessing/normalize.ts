import type { CanonicalField, CellValue, ColumnMap, LineItem, RawRow, RawTable } from "@/types/domain";
import { cellText, parseMoney, parseQuantity, parseTimestamp } from "@/features/preprocessing/values";

function pickCell(row: RawRow, columnMap: ColumnMap, field: CanonicalField): CellValue {
  const column = columnMap[field];
  return column === undefined ? undefined : row[column];
}

function pickText(row: RawRow, columnMap: ColumnMap, field: CanonicalField): string {
  return cellText(pickCell(row, columnMap, field)).trim();
}

export function prepareLineItem(row: RawRow, rowIndex: number, columnMap: ColumnMap): LineItem {
  return {
    rowIndex,
    orderId: pickText(row, columnMap, "order_id"),
    customerId: pickText(row, columnMap, "customer_id"),
    email: pickText(row, columnMap, "email"),
    date: parseTimestamp(pickCell(row, columnMap, "date")),
    productTitle: cellText(pickCell(row, columnMap, "product_title")),
    variantTitle: cellText(pickCell(row, columnMap, "variant_title")),
    sku: cellText(pickCell(row, columnMap, "sku")),
    netSales: columnMap.net_sales === undefined ? 0 : parseMoney(pickCell(row, columnMap, "net_sales")),
    quantity: columnMap.quantity === undefined ? 1 : parseQuantity(pickCell(row, columnMap, "quantity")),
    financialStatus: cellText(pickCell(row, columnMap, "financial_status")),
    canceled: cellText(pickCell(row, columnMap, "canceled"))
  };
}

export function prepareLineItems(table: RawTable, columnMap: ColumnMap): { items: LineItem[]; missingOrderId: number } {
  const items: LineItem[] = [];
  let missingOrderId = 0;

  table.rows.forEach((row, rowIndex) => {
    const item = prepareLineItem(row, rowIndex, columnMap);
    if (!item.orderId) {
      missingOrderId += 1;
      return;
    }
    items.push(item);
  });

  return { items, missingOrderId };
}
