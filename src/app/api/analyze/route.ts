import { NextResponse } from "next/server";

import { analyzeUpload, readFormData } from "@/features/mix/request";
import { toErrorResponse } from "@/lib/api-response";
import { withRequestContext } from "@/lib/logger";

export const runtime = "nodejs";

export async function POST(request: Request) {
  return withRequestContext(async () => {
    try {
      const formData = await readFormData(request);
      const analysis = await analyzeUpload(formData);
      return NextResponse.json({ analysis });
    } catch (error) {
      return toErrorResponse(error, "Something went wrong while analyzing the export.");
    }
  });
}
