import type { IdentifiedLineItem, Order } from "@/types/domain";

export const UNKNOWN_CUSTOMER = "(unknown)";
export const MIX_SEPARATOR = " + ";

interface OrderBucket {
  orderId: string;
  identifiers: Set<string>;
  netSales: number;
  customerKey: string;
  date: Date | null;
  firstRowIndex: number;
}

export function customerKeyOf(item: Pick<IdentifiedLineItem, "customerId" | "email">): string {
  return item.customerId || item.email || UNKNOWN_CUSTOMER;
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function buildProductMix(identifiers: Iterable<string>): { identifiers: string[]; productMix: string } {
  const sorted = Array.from(new Set(identifiers)).sort(compareCodeUnits);
  return { identifiers: sorted, productMix: sorted.join(MIX_SEPARATOR) };
}

export function aggregateOrders(items: IdentifiedLineItem[]): Order[] {
  const buckets = new Map<string, OrderBucket>();

  for (const item of items) {
    const bucket = buckets.get(item.orderId);
    if (!bucket) {
      buckets.set(item.orderId, {
        orderId: item.orderId,
        identifiers: new Set([item.identifier]),
        netSales: item.netSales,
        customerKey: customerKeyOf(item),
        date: item.date,
        firstRowIndex: item.rowIndex
      });
      continue;
    }

    bucket.identifiers.add(item.identifier);
    bucket.netSales += item.netSales;
    bucket.firstRowIndex = Math.min(bucket.firstRowIndex, item.rowIndex);
    if (item.date && (!bucket.date || item.date.getTime() < bucket.date.getTime())) {
      bucket.date = item.date;
    }
  }

  return Array.from(buckets.values())
    .map((bucket) => {
      const mix = buildProductMix(bucket.identifiers);
      return {
        orderId: bucket.orderId,
        identifiers: mix.identifiers,
        productMix: mix.productMix,
        netSales: bucket.netSales,
        customerKey: bucket.customerKey,
        date: bucket.date,
        firstRowIndex: bucket.firstRowIndex
      };
    })
    .filter((order) => order.productMix !== "");
}
