import { describe, expect, it } from "vitest";
import { buildHealthHandler } from "./health.js";

describe("GET /health", () => {
  it("returns ok with the live timeline count", async () => {
    let jsonBody: unknown = null;
    const res = {
      json(body: unknown) {
        jsonBody = body;
      }
    };

    buildHealthHandler(() => 2)({}, res);
    expect(jsonBody).toEqual({ ok: true, service: "api", status: "healthy", activeBrews: 2 });
  });
});
