import { log } from "../logger.js";
import type { PushTransport } from "../push/transport.js";
import {
  createBrewContext,
  systemBrewIdSource,
  validateBrewStart,
  type BrewIdSource,
  type BrewStartInput
} from "./brewRequest.js";
import { totalDurationSeconds } from "./brewTimeline.js";
import type { StageScheduler, TimelineSummary } from "./stageScheduler.js";

export type StartBrewResult = {
  brewId: string;
  stageCount: number;
  estimatedDurationSeconds: number;
};

export type StartedBrew = {
  result: StartBrewResult;
  done: Promise<TimelineSummary>;
};

export type BrewService = {
  start: (input: BrewStartInput) => StartedBrew;
  startBrew: (
    brewType: string,
    doseGrams: number,
    targetTempC: number,
    targetPressureBar: number,
    deviceAddress: string
  ) => StartBrewResult;
  cancel: (brewId: string) => number | null;
};

export function createBrewService(deps: {
  scheduler: StageScheduler;
  transport: PushTransport;
  idSource?: BrewIdSource;
}): BrewService {
  const { scheduler, transport } = deps;
  const idSource = deps.idSource ?? systemBrewIdSource;

  function start(input: BrewStartInput): StartedBrew {
    const request = validateBrewStart(input, (address) => transport.isValidAddress(address));
    const context = createBrewContext(request, idSource);
    const scheduled = scheduler.schedule(context);
    const result: StartBrewResult = {
      brewId: context.brewId,
      stageCount: scheduler.timeline.length,
      estimatedDurationSeconds: totalDurationSeconds(scheduler.timeline)
    };
    log({
      level: "info",
      msg: "brew_started",
      brew_id: context.brewId,
      brew_type: request.brewType,
      stage_count: result.stageCount,
      transport: transport.name
    });
    return { result, done: scheduled.done };
  }

  return {
    start,
    startBrew: (brewType, doseGrams, targetTempC, targetPressureBar, deviceAddress) =>
      start({ brewType, doseGrams, targetTempC, targetPressureBar, deviceAddress }).result,
    cancel: (brewId) => scheduler.cancel(brewId)
  };
}
