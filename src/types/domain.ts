export type CellValue = string | number | boolean | Date | null | undefined;

export type RawRow = Record<string, CellValue>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

export const CANONICAL_FIELDS = [
  "order_id",
  "customer_id",
  "email",
  "date",
  "product_title",
  "variant_title",
  "sku",
  "net_sales",
  "quantity",
  "financial_status",
  "canceled"
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export type ColumnAliases = Record<CanonicalField, string[]>;

export type ColumnMap = Partial<Record<CanonicalField, string>>;

export type IdMode = "SKU" | "Product+Variant" | "ProductName";

export interface AnalysisSettings {
  idMode: IdMode;
  differentiateByQuantity: boolean;
  ignoreSkus: Set<string>;
  ignoreTitles: string[];
  ignoreVariantCombos: string[];
}

export interface LineItem {
  rowIndex: number;
  orderId: string;
  customerId: string;
  email: string;
  date: Date | null;
  productTitle: string;
  variantTitle: string;
  sku: string;
  netSales: number;
  quantity: number;
  financialStatus: string;
  canceled: string;
}

export interface IdentifiedLineItem extends LineItem {
  identifier: string;
}

export interface Order {
  orderId: string;
  identifiers: string[];
  productMix: string;
  netSales: number;
  customerKey: string;
  date: Date | null;
  firstRowIndex: number;
}

export interface MixSummaryRow {
  productMix: string;
  orders: number;
  shareOfOrders: number;
  netSales: number;
  shareOfNetSales: number;
}

export interface FirstOrderRow {
  customerKey: string;
  orderId: string;
  date: Date | null;
  productMix: string;
}

export interface FilterReport {
  inputRows: number;
  missingOrderId: number;
  canceled: number;
  financialStatus: number;
  ignoredSku: number;
  ignoredTitle: number;
  ignoredVariantCombo: number;
  emptyIdentifier: number;
}

export interface AnalysisTotals {
  lineItems: number;
  orders: number;
  uniqueMixes: number;
  customers: number;
  netSales: number;
}

export interface AnalysisResult {
  columnMap: ColumnMap;
  mixSummary: MixSummaryRow[];
  firstOrders: FirstOrderRow[];
  totals: AnalysisTotals;
  filterReport: FilterReport;
}
