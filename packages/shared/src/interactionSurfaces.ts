// What the Action Router consumes, whichever surface delivered the tap.
export type RawInteraction = {
  wireActionId: string;
  brewId?: string;
  deepLink?: string;
  stage?: string;
};

export const interactionSurfaces = ["apns", "android", "web", "local"] as const;
export type InteractionSurface = (typeof interactionSurfaces)[number];

// UNNotificationResponse: action identifier plus the notification's userInfo.
export type ApnsInteraction = {
  surface: "apns";
  actionIdentifier: string;
  userInfo: Record<string, unknown>;
};

// Intent extras. Body taps carry `action: "default"`, buttons carry `actionId`.
export type AndroidInteraction = {
  surface: "android";
  extras: Record<string, unknown>;
};

// Service worker `notificationclick`: `action` is "" for a body tap.
export type WebInteraction = {
  surface: "web";
  action: string;
  data: Record<string, unknown>;
};

// Locally displayed foreground notification; payload is the JSON core record.
export type LocalInteraction = {
  surface: "local";
  actionId?: string | null;
  payload?: string | null;
};

export type SurfaceInteraction =
  | ApnsInteraction
  | AndroidInteraction
  | WebInteraction
  | LocalInteraction;

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function contextFrom(record: Record<string, unknown>): Omit<RawInteraction, "wireActionId"> {
  const context: Omit<RawInteraction, "wireActionId"> = {};
  const brewId = optionalString(record.brewId);
  if (brewId !== undefined) context.brewId = brewId;
  const deepLink = optionalString(record.deepLink);
  if (deepLink !== undefined) context.deepLink = deepLink;
  const stage = optionalString(record.stage);
  if (stage !== undefined) context.stage = stage;
  return context;
}

function parsePayload(payload: string | null | undefined): Record<string, unknown> {
  if (!payload) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return {};
  }
  return asRecord(parsed) ?? {};
}

export function fromSurface(interaction: SurfaceInteraction): RawInteraction {
  switch (interaction.surface) {
    case "apns":
      return {
        wireActionId: interaction.actionIdentifier,
        ...contextFrom(interaction.userInfo)
      };
    case "android": {
      const { extras } = interaction;
      const wireActionId =
        optionalString(extras.actionId) ?? optionalString(extras.action) ?? "default";
      return { wireActionId, ...contextFrom(extras) };
    }
    case "web":
      return { wireActionId: interaction.action, ...contextFrom(interaction.data) };
    case "local":
      return {
        wireActionId: interaction.actionId ?? "",
        ...contextFrom(parsePayload(interaction.payload))
      };
  }
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

/**
 * Parses an interaction that arrived as untyped JSON, either already in the
 * Router's shape (`wireActionId`) or in one surface's native shape (`surface`).
 * Returns null when the body matches neither.
 */
export function parseInteraction(body: unknown): RawInteraction | null {
  const record = asRecord(body);
  if (!record) return null;

  switch (record.surface) {
    case "apns": {
      if (typeof record.actionIdentifier !== "string") return null;
      return fromSurface({
        surface: "apns",
        actionIdentifier: record.actionIdentifier,
        userInfo: asRecord(record.userInfo) ?? {}
      });
    }
    case "android": {
      const extras = asRecord(record.extras);
      if (!extras) return null;
      return fromSurface({ surface: "android", extras });
    }
    case "web": {
      if (typeof record.action !== "string") return null;
      return fromSurface({
        surface: "web",
        action: record.action,
        data: asRecord(record.data) ?? {}
      });
    }
    case "local": {
      const actionId = typeof record.actionId === "string" ? record.actionId : null;
      const payload = typeof record.payload === "string" ? record.payload : null;
      return fromSurface({ surface: "local", actionId, payload });
    }
    case undefined:
      break;
    default:
      return null;
  }

  if (typeof record.wireActionId !== "string") return null;
  return { wireActionId: record.wireActionId, ...contextFrom(record) };
}
