import { describe, expect, it } from "vitest";

import { POST } from "./route";

const csv = [
  "Order ID,Email,Created at,SKU",
  "1001,a@example.com,2024-01-05,TEE-RED",
  "1002,a@example.com,2024-01-02,CAP",
  "1003,,2024-01-03,CAP"
].join("\n");

function exportRequest(report?: string): Request {
  const formData = new FormData();
  formData.append("file", new File([csv], "orders.csv", { type: "text/csv" }));
  if (report) {
    formData.append("report", report);
  }
  return new Request("http://localhost/api/export", { method: "POST", body: formData });
}

describe("POST /api/export", () => {
  it("exports the mix summary by default", async () => {
    const response = await POST(exportRequest());

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Disposition")).toBe('attachment; filename="order_product_mix.csv"');
    expect(await response.text()).toBe(
      ["product_mix,orders,% of total,net_sales,% of net sales", `CAP,2,${2 / 3},0,0`, `TEE-RED,1,${1 / 3},0,0`].join("\n")
    );
  });

  it("exports first orders", async () => {
    const response = await POST(exportRequest("first-orders"));

    expect(response.headers.get("Content-Disposition")).toBe('attachment; filename="first_order_mix.csv"');
    expect(await response.text()).toBe(
      [
        "customer_id,first_order_id,first_order_date,first_order_product_mix",
        "a@example.com,1002,2024-01-02T00:00:00.000Z,CAP",
        "(unknown),1003,2024-01-03T00:00:00.000Z,CAP"
      ].join("\n")
    );
  });

  it("rejects an unknown report", async () => {
    const response = await POST(exportRequest("customers"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "report must be 'mix' or 'first-orders'." });
  });
});
