import type express from "express";
import type { BrewService } from "../../brewing/brewService.js";

export function buildStartBrewHandler(service: BrewService) {
  return function handleStartBrew(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const body: unknown = req.body;
      const record: Record<string, unknown> =
        body && typeof body === "object" && !Array.isArray(body) ? { ...body } : {};
      const { result } = service.start({
        brewType: record.brewType,
        doseGrams: record.doseGrams,
        targetTempC: record.targetTempC,
        targetPressureBar: record.targetPressureBar,
        deviceAddress: record.deviceAddress
      });
      res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  };
}

export function registerBrewStartRoute(args: {
  router: express.Router;
  service: BrewService;
  guard: express.RequestHandler;
}): void {
  const { router, service, guard } = args;
  router.post("/", guard, buildStartBrewHandler(service));
}
