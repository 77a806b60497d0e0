import type express from "express";
import type { InteractionHandler } from "../../interactions/interactionHandler.js";

export function buildInteractionHandler(interactions: InteractionHandler) {
  return function handleInteraction(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const result = interactions.handle(req.body);
      // Rejection is a routing outcome, not a request failure.
      if (result.state === "dispatched") {
        res.status(202).json({ state: result.state, event: result.event });
      } else {
        res.status(202).json({ state: result.state, reason: result.reason });
      }
    } catch (err) {
      next(err);
    }
  };
}

export function registerBrewInteractionRoute(args: {
  router: express.Router;
  interactions: InteractionHandler;
}): void {
  const { router, interactions } = args;
  router.post("/interactions", buildInteractionHandler(interactions));
}
