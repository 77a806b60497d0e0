import type { Namespace } from "socket.io";
import type { NavigationEvent } from "@first-crack/shared";
import type { StageOutcome, StageOutcomeStatus } from "../brewing/stageScheduler.js";
import { emitToBrew } from "./brewNamespace.js";

export type BrewStageMessage = {
  brewId: string;
  stage: string;
  status: StageOutcomeStatus;
  firedAt: string | null;
};

export type BrewNavigationMessage = NavigationEvent;

type BrewEventEmitter = {
  stage: (message: BrewStageMessage) => void;
  navigation: (message: BrewNavigationMessage) => void;
};

let emitter: BrewEventEmitter | null = null;

export function registerBrewEventEmitter(nsp: Namespace) {
  emitter = {
    stage: (message) => emitToBrew(nsp, message.brewId, "brew:stage", message),
    navigation: (message) => emitToBrew(nsp, message.brewId, "brew:navigation", message)
  };
}

export function clearBrewEventEmitter() {
  emitter = null;
}

export function emitStageOutcome(outcome: StageOutcome) {
  if (!emitter) return;
  emitter.stage({
    brewId: outcome.brewId,
    stage: outcome.stageId,
    status: outcome.status,
    firedAt: outcome.firedAt === undefined ? null : new Date(outcome.firedAt).toISOString()
  });
}

export function emitBrewNavigation(event: NavigationEvent) {
  // Brew-less navigation has no room to go to.
  if (!emitter || !event.brewId) return;
  emitter.navigation({ ...event });
}
