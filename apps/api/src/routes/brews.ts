import express from "express";
import type { Router } from "express";
import type { BrewService } from "../brewing/brewService.js";
import type { InteractionHandler } from "../interactions/interactionHandler.js";
import { createRateLimitGuard, deviceAddressKey } from "../utils/rateLimitMiddleware.js";
import { registerBrewCancelRoute } from "./brews/cancelRoute.js";
import { registerBrewInteractionRoute } from "./brews/interactionRoute.js";
import { registerBrewStartRoute } from "./brews/startRoute.js";

const BREW_START_WINDOW_MS = 60_000;

export function createBrewsRouter(deps: {
  service: BrewService;
  interactions: InteractionHandler;
  brewStartRateLimit: number;
  now?: () => number;
}): Router {
  const router = express.Router();
  const startGuard = createRateLimitGuard({
    windowMs: BREW_START_WINDOW_MS,
    max: deps.brewStartRateLimit,
    key: deviceAddressKey,
    now: deps.now
  });

  registerBrewInteractionRoute({ router, interactions: deps.interactions });
  registerBrewStartRoute({ router, service: deps.service, guard: startGuard.middleware });
  registerBrewCancelRoute({ router, service: deps.service });

  return router;
}
