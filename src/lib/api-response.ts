import { NextResponse } from "next/server";

import { MissingRequiredColumnError, RequestValidationError } from "@/lib/errors";
import { logger } from "@/lib/logger";

export function toErrorResponse(error: unknown, fallbackMessage: string) {
  if (error instanceof MissingRequiredColumnError) {
    return NextResponse.json(
      { error: error.message, field: error.field, detectedHeaders: error.detectedHeaders },
      { status: 422 }
    );
  }

  if (error instanceof RequestValidationError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }

  const detail = error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : { value: String(error) };
  logger.error({ err: detail }, fallbackMessage);
  return NextResponse.json({ error: fallbackMessage }, { status: 500 });
}
