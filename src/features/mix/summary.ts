import type { MixSummaryRow, Order } from "@/types/domain";
import { compareCodeUnits } from "@/features/mix/orders";

function safeShare(part: number, total: number): number {
  return total === 0 ? 0 : part / total;
}

export function aggregateMixes(orders: Order[]): MixSummaryRow[] {
  const grouped = new Map<string, { orders: number; netSales: number }>();

  for (const order of orders) {
    const current = grouped.get(order.productMix) ?? { orders: 0, netSales: 0 };
    current.orders += 1;
    current.netSales += order.netSales;
    grouped.set(order.productMix, current);
  }

  const totalOrders = orders.length;
  const totalNetSales = Array.from(grouped.values()).reduce((sum, group) => sum + group.netSales, 0);

  return Array.from(grouped.entries())
    .map(([productMix, group]) => ({
      productMix,
      orders: group.orders,
      shareOfOrders: safeShare(group.orders, totalOrders),
      netSales: group.netSales,
      shareOfNetSales: safeShare(group.netSales, totalNetSales)
    }))
    .sort((a, b) => b.orders - a.orders || compareCodeUnits(a.productMix, b.productMix));
}
