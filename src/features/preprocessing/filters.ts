import type { AnalysisSettings, ColumnMap, FilterReport, LineItem } from "@/types/domain";

export const CANCELED_VALUES = new Set(["true", "yes", "1", "t", "y"]);
export const INCLUDE_PAYMENT_STATUSES = new Set(["paid", "partially_paid"]);

export type RowFilterReport = Pick<
  FilterReport,
  "canceled" | "financialStatus" | "ignoredSku" | "ignoredTitle" | "ignoredVariantCombo"
>;

export function filterCanceled(items: LineItem[], columnMap: ColumnMap): LineItem[] {
  if (columnMap.canceled === undefined) {
    return items;
  }
  return items.filter((item) => !CANCELED_VALUES.has(item.canceled.toLowerCase()));
}

export function filterFinancialStatus(items: LineItem[], columnMap: ColumnMap): LineItem[] {
  if (columnMap.financial_status === undefined) {
    return items;
  }
  return items.filter((item) => INCLUDE_PAYMENT_STATUSES.has(item.financialStatus.toLowerCase()));
}

export function filterIgnoredSkus(items: LineItem[], columnMap: ColumnMap, ignoreSkus: ReadonlySet<string>): LineItem[] {
  if (columnMap.sku === undefined || ignoreSkus.size === 0) {
    return items;
  }
  return items.filter((item) => !ignoreSkus.has(item.sku.toUpperCase()));
}

export function filterIgnoredTitles(items: LineItem[], columnMap: ColumnMap, ignoreTitles: readonly string[]): LineItem[] {
  if (columnMap.product_title === undefined || ignoreTitles.length === 0) {
    return items;
  }
  return items.filter((item) => {
    if (!item.productTitle) {
      return true;
    }
    const title = item.productTitle.toLowerCase();
    return !ignoreTitles.some((needle) => title.includes(needle));
  });
}

export function variantCombo(item: Pick<LineItem, "productTitle" | "variantTitle">): string {
  return `${item.productTitle} (${item.variantTitle})`;
}

export function filterIgnoredVariantCombos(
  items: LineItem[],
  columnMap: ColumnMap,
  ignoreVariantCombos: readonly string[]
): LineItem[] {
  if (columnMap.product_title === undefined || ignoreVariantCombos.length === 0) {
    return items;
  }
  return items.filter((item) => {
    const combo = variantCombo(item).toLowerCase();
    return !ignoreVariantCombos.some((needle) => combo.includes(needle));
  });
}

export function applyRowFilters(
  items: LineItem[],
  columnMap: ColumnMap,
  settings: AnalysisSettings
): { items: LineItem[]; report: RowFilterReport } {
  const afterCanceled = filterCanceled(items, columnMap);
  const afterStatus = filterFinancialStatus(afterCanceled, columnMap);
  const afterSkus = filterIgnoredSkus(afterStatus, columnMap, settings.ignoreSkus);
  const afterTitles = filterIgnoredTitles(afterSkus, columnMap, settings.ignoreTitles);
  const afterCombos = filterIgnoredVariantCombos(afterTitles, columnMap, settings.ignoreVariantCombos);

  return {
    items: afterCombos,
    report: {
      canceled: items.length - afterCanceled.length,
      financialStatus: afterCanceled.length - afterStatus.length,
      ignoredSku: afterStatus.length - afterSkus.length,
      ignoredTitle: afterSkus.length - afterTitles.length,
      ignoredVariantCombo: afterTitles.length - afterCombos.length
    }
  };
}
