import { z } from "zod";

import { RequestValidationError } from "@/lib/errors";
import type { AnalysisSettings, IdMode } from "@/types/domain";

const ID_MODE_LABELS: Record<string, IdMode> = {
  SKU: "SKU",
  "Product + Variant": "Product+Variant",
  "Product+Variant": "Product+Variant",
  "Product Name": "ProductName",
  ProductName: "ProductName"
};

const ignoreListSchema = z.union([z.string(), z.array(z.string())]).default("");

export const analysisSettingsSchema = z.object({
  idMode: z
    .preprocess(
      (value) => (typeof value === "string" ? ID_MODE_LABELS[value.trim()] ?? value : value),
      z.enum(["SKU", "Product+Variant", "ProductName"])
    )
    .default("SKU"),
  differentiateByQuantity: z
    .union([z.boolean(), z.enum(["true", "false", "on", "off", "1", "0", ""])])
    .transform((value) => (typeof value === "boolean" ? value : ["true", "on", "1"].includes(value)))
    .default(false),
  ignoreSkus: ignoreListSchema,
  ignoreTitles: ignoreListSchema,
  ignoreVariantCombos: ignoreListSchema
});

export type AnalysisSettingsInput = z.input<typeof analysisSettingsSchema>;

export function parseIgnoreList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

function toEntries(value: string | string[]): string[] {
  return typeof value === "string" ? parseIgnoreList(value) : value.flatMap(parseIgnoreList);
}

export function buildAnalysisSettings(input: unknown = {}): AnalysisSettings {
  const parsed = analysisSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`).join("; ");
    throw new RequestValidationError(`Invalid analysis settings: ${issues}`);
  }

  const settings = parsed.data;
  return {
    idMode: settings.idMode,
    differentiateByQuantity: settings.differentiateByQuantity,
    ignoreSkus: new Set(toEntries(settings.ignoreSkus).map((sku) => sku.toUpperCase())),
    ignoreTitles: toEntries(settings.ignoreTitles).map((title) => title.toLowerCase()),
    ignoreVariantCombos: toEntries(settings.ignoreVariantCombos).map((combo) => combo.toLowerCase())
  };
}
