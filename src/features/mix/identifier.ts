import type { AnalysisSettings, CellValue, IdMode, IdentifiedLineItem, LineItem } from "@/types/domain";
import { MISSING_TOKEN, normalizeText } from "@/features/preprocessing/values";

export interface IdentifierFields {
  productTitle: CellValue;
  variantTitle: CellValue;
  sku: CellValue;
  quantity: number;
}

export type IdentifierOptions = Pick<AnalysisSettings, "idMode" | "differentiateByQuantity">;

function baseIdentifier(product: string, variant: string, sku: string, idMode: IdMode): string {
  switch (idMode) {
    case "SKU":
      return sku || product;
    case "Product+Variant":
      return variant ? `${product} (${variant})` : product;
    case "ProductName":
      return product;
  }
}

export function deriveIdentifier(fields: IdentifierFields, options: IdentifierOptions): string {
  const base = baseIdentifier(
    normalizeText(fields.productTitle),
    normalizeText(fields.variantTitle),
    normalizeText(fields.sku),
    options.idMode
  );

  if (base && options.differentiateByQuantity && fields.quantity > 1) {
    return `${fields.quantity}x ${base}`;
  }
  return base;
}

function isUsableIdentifier(identifier: string): boolean {
  return identifier !== "" && identifier !== MISSING_TOKEN;
}

export function identifyLineItems(
  items: LineItem[],
  options: IdentifierOptions
): { items: IdentifiedLineItem[]; emptyIdentifier: number } {
  const identified: IdentifiedLineItem[] = [];

  for (const item of items) {
    const identifier = deriveIdentifier(item, options);
    if (isUsableIdentifier(identifier)) {
      identified.push({ ...item, identifier });
    }
  }

  return { items: identified, emptyIdentifier: items.length - identified.length };
}
