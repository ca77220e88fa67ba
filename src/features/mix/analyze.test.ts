import { describe, expect, it, vi } from "vitest";

import type { CellValue, RawTable } from "@/types/domain";
import { buildAnalysisSettings } from "@/features/preprocessing/ignore-rules";
import { MissingRequiredColumnError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { analyzeProductMix } from "./analyze";

function table(columns: string[], rows: CellValue[][]): RawTable {
  return {
    columns,
    rows: rows.map((values) => Object.fromEntries(columns.map((column, index) => [column, values[index]])))
  };
}

const defaults = buildAnalysisSettings();

describe("analyzeProductMix", () => {
  it("combines line items of one order into an alphabetical mix", () => {
    const input = table(
      ["order_id", "product_title", "financial_status"],
      [
        ["1001", "Shirt", "paid"],
        ["1001", "Hat", "paid"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary).toEqual([{ productMix: "Hat + Shirt", orders: 1, shareOfOrders: 1, netSales: 0, shareOfNetSales: 0 }]);
  });

  it("excludes canceled line items from every aggregate", () => {
    const input = table(
      ["order_id", "product_title", "financial_status", "canceled"],
      [
        ["1001", "Shirt", "paid", "false"],
        ["1001", "Hat", "paid", "true"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary).toEqual([{ productMix: "Shirt", orders: 1, shareOfOrders: 1, netSales: 0, shareOfNetSales: 0 }]);
    expect(result.filterReport.canceled).toBe(1);
  });

  it("reports the first order of each customer", () => {
    const input = table(
      ["Order ID", "Customer ID", "Created at", "Product title"],
      [
        ["1002", "C1", "2024-02-01", "Hat"],
        ["1001", "C1", "2024-01-01", "Shirt"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.firstOrders).toEqual([
      { customerKey: "C1", orderId: "1001", date: new Date("2024-01-01T00:00:00.000Z"), productMix: "Shirt" }
    ]);
  });

  it("sums parsed money across an order", () => {
    const input = table(
      ["Order ID", "Product title", "Net sales"],
      [
        ["1001", "Shirt", "$1,200.00"],
        ["1001", "Return fee", "(50.00)"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary).toEqual([
      { productMix: "Return fee + Shirt", orders: 1, shareOfOrders: 1, netSales: 1150, shareOfNetSales: 1 }
    ]);
    expect(result.totals.netSales).toBe(1150);
  });

  it("returns empty tables when nothing survives filtering", () => {
    const input = table(
      ["Order ID", "Product title", "Cancelled"],
      [
        ["1001", "Shirt", "yes"],
        ["1002", "Hat", "Y"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary).toEqual([]);
    expect(result.firstOrders).toEqual([]);
    expect(result.totals).toEqual({ lineItems: 0, orders: 0, uniqueMixes: 0, customers: 0, netSales: 0 });
  });

  it("fails before filtering when no order id column exists", () => {
    const input = table(["Product title", "Net sales"], [["Shirt", "10"]]);

    expect(() => analyzeProductMix(input, defaults)).toThrow(MissingRequiredColumnError);
  });

  it("counts a product bought twice in one order once", () => {
    const input = table(
      ["Order ID", "SKU", "Quantity"],
      [
        ["1001", "TEE-RED", "1"],
        ["1001", "TEE-RED", "1"],
        ["1001", "CAP", "1"]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary.map((row) => row.productMix)).toEqual(["CAP + TEE-RED"]);
  });

  it("never lets an ignored SKU reach aggregation", () => {
    const input = table(
      ["Order ID", "SKU"],
      [
        ["1001", "gift-card-001"],
        ["1001", "TEE-RED"],
        ["1002", "GIFT-CARD-001"]
      ]
    );

    const result = analyzeProductMix(input, buildAnalysisSettings({ ignoreSkus: "Gift-Card-001" }));

    expect(result.mixSummary.map((row) => [row.productMix, row.orders])).toEqual([["TEE-RED", 1]]);
    expect(result.filterReport).toEqual({
      inputRows: 3,
      missingOrderId: 0,
      canceled: 0,
      financialStatus: 0,
      ignoredSku: 2,
      ignoredTitle: 0,
      ignoredVariantCombo: 0,
      emptyIdentifier: 0
    });
  });

  it("separates quantities when asked to", () => {
    const input = table(
      ["Order ID", "Product title", "Quantity"],
      [
        ["1001", "Shirt", "2"],
        ["1002", "Shirt", "1"]
      ]
    );

    const result = analyzeProductMix(input, buildAnalysisSettings({ idMode: "Product Name", differentiateByQuantity: true }));

    expect(result.mixSummary.map((row) => row.productMix)).toEqual(["2x Shirt", "Shirt"]);
  });

  it("keeps the order count consistent between orders and mixes", () => {
    const input = table(
      ["Order ID", "Product title", "Email"],
      [
        ["1", "A", "x@example.com"],
        ["2", "B", "x@example.com"],
        ["2", "A", ""],
        ["3", "", "y@example.com"],
        ["4", "C", ""]
      ]
    );

    const result = analyzeProductMix(input, defaults);

    expect(result.mixSummary.reduce((sum, row) => sum + row.orders, 0)).toBe(result.totals.orders);
    expect(result.totals).toEqual({ lineItems: 4, orders: 3, uniqueMixes: 3, customers: 2, netSales: 0 });
    expect(result.firstOrders.map((row) => [row.customerKey, row.orderId])).toEqual([
      ["x@example.com", "1"],
      ["(unknown)", "4"]
    ]);
  });

  it("produces identical output on repeated runs", () => {
    const input = table(
      ["Order ID", "Product title", "Variant title", "Created at", "Customer ID"],
      [
        ["1", "Shirt", "Red", "2024-01-01", "C1"],
        ["2", "Hat", "", "2024-01-02", "C2"],
        ["3", "Shirt", "Red", "", "C1"]
      ]
    );
    const settings = buildAnalysisSettings({ idMode: "Product + Variant" });

    expect(analyzeProductMix(input, settings)).toEqual(analyzeProductMix(input, settings));
  });

  it("logs totals through the given logger", () => {
    const info = vi.fn();
    const fakeLogger: Logger = {
      debug: vi.fn(),
      info,
      warn: vi.fn(),
      error: vi.fn(),
      createChild: () => fakeLogger
    };

    analyzeProductMix(table(["Order ID", "SKU"], [["1", "A"]]), defaults, { logger: fakeLogger });

    expect(info).toHaveBeenCalledWith(expect.objectContaining({ orders: 1, uniqueMixes: 1 }), "product mix analysis complete");
  });
});
