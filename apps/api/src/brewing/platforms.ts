export type PushSurface = "android" | "apns" | "webpush";

// Most action buttons each surface renders.
export const SURFACE_ACTION_LIMITS: Record<PushSurface, number> = {
  android: 3,
  apns: 3,
  webpush: 4
};

// A stage's actions must fit every surface; none is trimmed per platform.
export const MAX_STAGE_ACTIONS = Math.min(...Object.values(SURFACE_ACTION_LIMITS));
