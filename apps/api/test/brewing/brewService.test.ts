import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createBrewService } from "../../src/brewing/brewService.js";
import { StageScheduler } from "../../src/brewing/stageScheduler.js";
import { AppError } from "../../src/errors.js";
import { TEST_BASE_TIME, advanceSeconds, freezeTime } from "../support/time.js";
import { createRecordingTransport, type RecordingTransport } from "../support/transport.js";
import { validBrewBody } from "../support/brews.js";

let restoreTime: () => void = () => {};
let transport: RecordingTransport;
let scheduler: StageScheduler;

describe("brew service", () => {
  beforeEach(() => {
    restoreTime = freezeTime();
    transport = createRecordingTransport();
    scheduler = new StageScheduler({
      transport,
      payloadOptions: { mediaBaseUrl: "https://media.test", totalDurationSeconds: 75 }
    });
  });

  afterEach(() => {
    scheduler.stopAll();
    restoreTime();
  });

  it("starts an espresso and reports its timeline", () => {
    const service = createBrewService({ scheduler, transport });
    const result = service.startBrew("espresso", 18, 93, 9, "dev-123");

    expect(result.brewId).toMatch(/^brew_\d+_\d+$/);
    expect(result.brewId.startsWith(`brew_${TEST_BASE_TIME.getTime()}_`)).toBe(true);
    expect(result.stageCount).toBe(5);
    expect(result.estimatedDurationSeconds).toBe(75);
    expect(scheduler.isActive(result.brewId)).toBe(true);
  });

  it("drives the whole timeline to the device", async () => {
    const service = createBrewService({
      scheduler,
      transport,
      idSource: { now: () => Date.now(), random: () => 0.00425 }
    });
    const { result, done } = service.start(validBrewBody);
    expect(result.brewId).toBe(`brew_${TEST_BASE_TIME.getTime()}_42`);

    await advanceSeconds(75);
    const summary = await done;
    expect(summary.outcomes.map((o) => o.status)).toEqual([
      "sent",
      "sent",
      "sent",
      "sent",
      "sent"
    ]);
    expect(transport.sends.map((s) => s.message.brewId)).toEqual(
      Array(5).fill(result.brewId)
    );
  });

  it("creates nothing when validation fails", () => {
    const service = createBrewService({ scheduler, transport });
    expect(() => service.startBrew("espresso", 40, 93, 9, "dev-123")).toThrow(AppError);
    expect(scheduler.activeBrewIds()).toEqual([]);
  });

  it("cancels through the scheduler", () => {
    const service = createBrewService({ scheduler, transport });
    const { brewId } = service.startBrew("ristretto", 15, 94, 10, "dev-7");
    expect(service.cancel(brewId)).toBe(5);
    expect(service.cancel(brewId)).toBeNull();
  });
});
