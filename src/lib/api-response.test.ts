import { describe, expect, it } from "vitest";

import { MissingRequiredColumnError, RequestValidationError } from "@/lib/errors";
import { toErrorResponse } from "./api-response";

describe("toErrorResponse", () => {
  it("maps a missing order id column to 422", async () => {
    const response = toErrorResponse(new MissingRequiredColumnError("order_id", []), "failed");

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: "Could not detect a required 'order_id' column. Please check your headers. | Detected headers: (none)",
      field: "order_id",
      detectedHeaders: []
    });
  });

  it("keeps the status of request validation errors", async () => {
    const response = toErrorResponse(new RequestValidationError("too large", 413), "failed");

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: "too large" });
  });

  it("hides unexpected failures behind the generic message", async () => {
    const response = toErrorResponse(new TypeError("cannot read properties of undefined"), "Something went wrong.");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Something went wrong." });
  });
});
