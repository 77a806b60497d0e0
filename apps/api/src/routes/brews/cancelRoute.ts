import type express from "express";
import { isValidBrewId } from "@first-crack/shared";
import type { BrewService } from "../../brewing/brewService.js";
import { notFoundError, validationError } from "../../errors.js";

export function buildCancelBrewHandler(service: BrewService) {
  return function handleCancelBrew(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const brewId = String(req.params.brewId ?? "");
      if (!isValidBrewId(brewId)) throw validationError("Invalid brew id", ["brewId"]);
      const pending = service.cancel(brewId);
      if (pending === null) throw notFoundError("BREW_NOT_FOUND", "Brew not found");
      res.json({ brewId, cancelled: true, pendingStagesCancelled: pending });
    } catch (err) {
      next(err);
    }
  };
}

export function registerBrewCancelRoute(args: {
  router: express.Router;
  service: BrewService;
}): void {
  const { router, service } = args;
  router.delete("/:brewId", buildCancelBrewHandler(service));
}
