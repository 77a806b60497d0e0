import type { Request, Response, NextFunction } from "express";
import { AppError } from "../errors.js";
import { SlidingWindowRateLimiter } from "./rateLimiter.js";

type GuardOptions = {
  windowMs: number;
  max: number;
  key?: (req: Request) => string | undefined;
  now?: () => number;
};

export function createRateLimitGuard(options: GuardOptions) {
  const limiter = new SlidingWindowRateLimiter({
    windowMs: options.windowMs,
    max: options.max,
    now: options.now
  });

  const middleware = (req: Request, res: Response, next: NextFunction) => {
    const key =
      (options.key ? options.key(req) : undefined) ??
      req.ip ??
      req.headers["x-forwarded-for"]?.toString() ??
      "unknown";
    const decision = limiter.check(key);
    if (!decision.allowed) {
      res.setHeader("Retry-After", String(Math.ceil(decision.retryAfterMs / 1000)));
      return next(new AppError("RATE_LIMITED", 429, "Too many requests"));
    }
    if (limiter.size() > 1000) limiter.prune();
    return next();
  };

  return { middleware, reset: () => limiter.reset() };
}

// Keys brew starts by the target device rather than by caller address.
export function deviceAddressKey(req: Request): string | undefined {
  const body: unknown = req.body;
  if (!body || typeof body !== "object" || !("deviceAddress" in body)) return undefined;
  const address = body.deviceAddress;
  return typeof address === "string" && address.trim() ? `device:${address.trim()}` : undefined;
}
