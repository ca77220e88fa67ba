import type { FirstOrderRow, Order } from "@/types/domain";

// Unknown dates sort after every known date; equal dates keep original row order.
export function compareOrderDates(a: Order, b: Order): number {
  if (a.date && b.date) {
    const diff = a.date.getTime() - b.date.getTime();
    if (diff !== 0) {
      return diff;
    }
  } else if (a.date) {
    return -1;
  } else if (b.date) {
    return 1;
  }
  return a.firstRowIndex - b.firstRowIndex;
}

export function extractFirstOrders(orders: Order[]): FirstOrderRow[] {
  const seen = new Set<string>();
  const firstOrders: FirstOrderRow[] = [];

  for (const order of [...orders].sort(compareOrderDates)) {
    if (seen.has(order.customerKey)) {
      continue;
    }
    seen.add(order.customerKey);
    firstOrders.push({
      customerKey: order.customerKey,
      orderId: order.orderId,
      date: order.date,
      productMix: order.productMix
    });
  }

  return firstOrders;
}
