import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";
import { createTestApi, type TestApi } from "../support/api.js";
import { buildBrewContext, testConfig, validBrewBody } from "../support/brews.js";

let api: TestApi | undefined;

function start(overrides: Parameters<typeof createTestApi>[0] = {}) {
  api = createTestApi(overrides);
  return api;
}

async function startBrew(app: TestApi["app"]): Promise<string> {
  const res = await request(app).post("/brews").send(validBrewBody).expect(201);
  const brewId: unknown = res.body.brewId;
  if (typeof brewId !== "string") throw new Error("brew id missing");
  return brewId;
}

describe("brew routes", () => {
  afterEach(() => {
    api?.close();
    api = undefined;
  });

  it("reports health with live timelines", async () => {
    const { app } = start();
    await request(app)
      .get("/health")
      .expect(200, { ok: true, service: "api", status: "healthy", activeBrews: 0 });
    await startBrew(app);
    await request(app).get("/health").expect(200, {
      ok: true,
      service: "api",
      status: "healthy",
      activeBrews: 1
    });
  });

  it("starts a brew", async () => {
    const { app, scheduler } = start();
    const res = await request(app).post("/brews").send(validBrewBody).expect(201);

    expect(res.body).toEqual({
      brewId: expect.stringMatching(/^brew_\d+_5000$/),
      stageCount: 5,
      estimatedDurationSeconds: 75
    });
    expect(scheduler.activeBrewIds()).toEqual([res.body.brewId]);
  });

  it("rejects out-of-range parameters with field reasons", async () => {
    const { app, scheduler } = start();
    const res = await request(app)
      .post("/brews")
      .send({ ...validBrewBody, doseGrams: 9, targetPressureBar: 16 })
      .expect(400);

    expect(res.body).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Invalid brew parameters",
        details: {
          fields: ["doseGrams", "targetPressureBar"],
          reasons: [
            { field: "doseGrams", reason: "must be between 10g and 30g" },
            { field: "targetPressureBar", reason: "must be between 5 bar and 15 bar" }
          ]
        }
      }
    });
    expect(scheduler.activeBrewIds()).toEqual([]);
  });

  it("answers malformed JSON with a client error", async () => {
    const { app } = start();
    const res = await request(app)
      .post("/brews")
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400);
    expect(res.body.error.code).toBe("INVALID_JSON");
  });

  it("limits brew starts per device", async () => {
    const { app } = start({ config: { ...testConfig, brewStartRateLimit: 2 } });
    await startBrew(app);
    await startBrew(app);

    const res = await request(app).post("/brews").send(validBrewBody).expect(429);
    expect(res.headers["retry-after"]).toBe("60");
    expect(res.body.error.code).toBe("RATE_LIMITED");

    await request(app)
      .post("/brews")
      .send({ ...validBrewBody, deviceAddress: "dev-other" })
      .expect(201);
  });

  it("cancels a live brew", async () => {
    const { app, transport } = start();
    const brewId = await startBrew(app);

    await request(app)
      .delete(`/brews/${brewId}`)
      .expect(200, { brewId, cancelled: true, pendingStagesCancelled: 5 });
    await request(app).delete(`/brews/${brewId}`).expect(404);
    expect(transport.sends).toEqual([]);
  });

  it("answers 404 once a brew is cancelled even while a send is in flight", async () => {
    const { app, scheduler, transport } = start();
    const held = transport.holdNext();
    const scheduled = scheduler.schedule(
      buildBrewContext({ brewId: "brew_1_2", startTime: Date.now() })
    );
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
    expect(transport.stages()).toEqual(["heating"]);

    await request(app)
      .delete("/brews/brew_1_2")
      .expect(200, { brewId: "brew_1_2", cancelled: true, pendingStagesCancelled: 4 });
    await request(app).delete("/brews/brew_1_2").expect(404);
    await request(app).get("/health").expect(200, {
      ok: true,
      service: "api",
      status: "healthy",
      activeBrews: 0
    });

    held.release();
    expect((await scheduled.done).cancelled).toBe(true);
  });

  it("returns 404 for an unknown brew", async () => {
    const { app } = start();
    const res = await request(app).delete("/brews/brew_1_2").expect(404);
    expect(res.body).toEqual({ error: { code: "BREW_NOT_FOUND", message: "Brew not found" } });
  });

  it("stops the brew when a stop interaction is dispatched", async () => {
    const { app, scheduler } = start();
    const brewId = await startBrew(app);

    const res = await request(app)
      .post("/brews/interactions")
      .send({ wireActionId: "stop_shot", brewId, stage: "brewing" })
      .expect(202);

    expect(res.body).toEqual({
      state: "dispatched",
      event: { action: "stopShot", brewId, deepLink: `firstcrack://brew/${brewId}/stop` }
    });
    expect(scheduler.isActive(brewId)).toBe(false);
  });

  it("routes a surface-native body tap to the details link", async () => {
    const { app, scheduler } = start();
    const brewId = await startBrew(app);

    const res = await request(app)
      .post("/brews/interactions")
      .send({ surface: "android", extras: { action: "default", brewId } })
      .expect(202);

    expect(res.body).toEqual({
      state: "dispatched",
      event: { action: "default", brewId, deepLink: `firstcrack://brew/${brewId}/details` }
    });
    expect(scheduler.isActive(brewId)).toBe(true);
  });

  it("reports rejected interactions without failing the request", async () => {
    const { app } = start();
    await request(app)
      .post("/brews/interactions")
      .send({ wireActionId: "stop_shot" })
      .expect(202, { state: "rejected", reason: "MISSING_BREW_ID" });
    await request(app)
      .post("/brews/interactions")
      .send({ wireActionId: "steam_milk", brewId: "brew_1_2" })
      .expect(202, { state: "rejected", reason: "UNKNOWN_ACTION" });
  });

  it("rejects bodies that are not an interaction", async () => {
    const { app } = start();
    const res = await request(app).post("/brews/interactions").send({ action: 1 }).expect(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
  });

  it("releases the navigation channel on close", () => {
    const current = start();
    expect(current.channel.isAttached()).toBe(true);
    current.close();
    expect(current.channel.isAttached()).toBe(false);
  });

  it("answers unknown routes with 404", async () => {
    const { app } = start();
    await request(app)
      .get("/espresso")
      .expect(404, { error: { code: "NOT_FOUND", message: "Not found" } });
  });
});
