import { analyzeUpload, readFormData, readReportKind } from "@/features/mix/request";
import { firstOrdersToCsv, mixSummaryToCsv } from "@/features/mix/export";
import { toErrorResponse } from "@/lib/api-response";
import { withRequestContext } from "@/lib/logger";

export const runtime = "nodejs";

const REPORT_FILE_NAMES = {
  mix: "order_product_mix.csv",
  "first-orders": "first_order_mix.csv"
} as const;

export async function POST(request: Request) {
  return withRequestContext(async () => {
    try {
      const formData = await readFormData(request);
      const report = readReportKind(formData);
      const analysis = await analyzeUpload(formData);
      const csv = report === "mix" ? mixSummaryToCsv(analysis.mixSummary) : firstOrdersToCsv(analysis.firstOrders);

      return new Response(csv, {
        status: 200,
        headers: {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="${REPORT_FILE_NAMES[report]}"`
        }
      });
    } catch (error) {
      return toErrorResponse(error, "Something went wrong while exporting the report.");
    }
  });
}
