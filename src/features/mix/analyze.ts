import type { AnalysisResult, AnalysisSettings, ColumnAliases, RawTable } from "@/types/domain";
import { COLUMN_ALIASES, resolveColumns } from "@/features/preprocessing/csv-schema";
import { applyRowFilters } from "@/features/preprocessing/filters";
import { prepareLineItems } from "@/features/preprocessing/normalize";
import { extractFirstOrders } from "@/features/mix/first-orders";
import { identifyLineItems } from "@/features/mix/identifier";
import { aggregateOrders } from "@/features/mix/orders";
import { aggregateMixes } from "@/features/mix/summary";
import { logger as rootLogger, type Logger } from "@/lib/logger";

export interface AnalyzeOptions {
  aliases?: ColumnAliases;
  logger?: Logger;
}

export function analyzeProductMix(table: RawTable, settings: AnalysisSettings, options: AnalyzeOptions = {}): AnalysisResult {
  const log = (options.logger ?? rootLogger).createChild({ module: "product-mix" });

  const columnMap = resolveColumns(table.columns, options.aliases ?? COLUMN_ALIASES);
  log.debug({ columnMap }, "resolved columns");

  const prepared = prepareLineItems(table, columnMap);
  const filtered = applyRowFilters(prepared.items, columnMap, settings);
  const identified = identifyLineItems(filtered.items, settings);
  log.debug(
    { inputRows: table.rows.length, kept: identified.items.length, ...filtered.report },
    "filtered line items"
  );

  const orders = aggregateOrders(identified.items);
  const mixSummary = aggregateMixes(orders);
  const firstOrders = extractFirstOrders(orders);

  const totals = {
    lineItems: identified.items.length,
    orders: orders.length,
    uniqueMixes: mixSummary.length,
    customers: firstOrders.length,
    netSales: mixSummary.reduce((sum, row) => sum + row.netSales, 0)
  };
  log.info({ ...totals, idMode: settings.idMode }, "product mix analysis complete");

  return {
    columnMap,
    mixSummary,
    firstOrders,
    totals,
    filterReport: {
      inputRows: table.rows.length,
      missingOrderId: prepared.missingOrderId,
      ...filtered.report,
      emptyIdentifier: identified.emptyIdentifier
    }
  };
}
