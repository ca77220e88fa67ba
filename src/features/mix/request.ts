import { z } from "zod";

import type { AnalysisResult, AnalysisSettings } from "@/types/domain";
import { validateCsvRows } from "@/features/preprocessing/csv-schema";
import { buildAnalysisSettings } from "@/features/preprocessing/ignore-rules";
import { analyzeProductMix } from "@/features/mix/analyze";
import { getConfig } from "@/lib/config";
import { parseCsvFile, type ParsedCsv } from "@/lib/csv/parse";
import { RequestValidationError } from "@/lib/errors";
import { logger } from "@/lib/logger";

const SETTINGS_FIELDS = ["idMode", "differentiateByQuantity", "ignoreSkus", "ignoreTitles", "ignoreVariantCombos"] as const;

export const reportSchema = z.enum(["mix", "first-orders"]);

export type ReportKind = z.infer<typeof reportSchema>;

export async function readFormData(request: Request): Promise<FormData> {
  try {
    return await request.formData();
  } catch {
    throw new RequestValidationError("Expected a multipart/form-data upload with a 'file' field.");
  }
}

export function readUploadedFile(formData: FormData): File {
  const file = formData.get("file");
  if (!(file instanceof File)) {
    throw new RequestValidationError("Upload your order export CSV in the 'file' field.");
  }
  if (file.size > getConfig().MAX_UPLOAD_BYTES) {
    throw new RequestValidationError("The uploaded file is too large.", 413);
  }
  return file;
}

export function readSettings(formData: FormData): AnalysisSettings {
  const input: Record<string, string> = {};
  for (const field of SETTINGS_FIELDS) {
    const value = formData.get(field);
    if (typeof value === "string") {
      input[field] = value;
    }
  }
  return buildAnalysisSettings(input);
}

export function readReportKind(formData: FormData): ReportKind {
  const parsed = reportSchema.safeParse(formData.get("report") ?? "mix");
  if (!parsed.success) {
    throw new RequestValidationError("report must be 'mix' or 'first-orders'.");
  }
  return parsed.data;
}

export async function analyzeUpload(formData: FormData): Promise<AnalysisResult> {
  const file = readUploadedFile(formData);
  const settings = readSettings(formData);

  let parsed: ParsedCsv;
  try {
    parsed = await parseCsvFile(file);
  } catch (error) {
    throw new RequestValidationError(error instanceof Error ? error.message : "CSV parse error");
  }

  if (parsed.rows.length > getConfig().MAX_ROWS) {
    throw new RequestValidationError(`The export has ${parsed.rows.length} rows; the limit is ${getConfig().MAX_ROWS}.`);
  }

  const table = validateCsvRows(parsed.rows, parsed.columns);
  return analyzeProductMix(table, settings, {
    logger: logger.createChild({ fileName: file.name, rows: table.rows.length })
  });
}
