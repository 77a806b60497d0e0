export const notificationActionIds = [
  "pauseGrinding",
  "adjustGrind",
  "skipPreinfusion",
  "extendPreinfusion",
  "stopShot",
  "viewLive",
  "brewAgain",
  "adjustProfile",
  "share",
  "default"
] as const;
export type NotificationActionId = (typeof notificationActionIds)[number];

// Everything except the body tap is rendered as a button.
export type ButtonActionId = Exclude<NotificationActionId, "default">;

export type NotificationActionDefinition = {
  id: ButtonActionId;
  wireId: string;
  pathSegment: string;
  title: string;
  icon: string;
  requiresForeground: boolean;
};

export const DEFAULT_DEEP_LINK_SCHEME = "firstcrack";
export const DEFAULT_ACTION_PATH = "details";

// Identifiers the platforms report for a tap on the notification body.
export const DEFAULT_TAP_SENTINELS: readonly string[] = [
  "com.apple.UNNotificationDefaultActionIdentifier",
  "default",
  ""
];

const actionDefinitions: Record<ButtonActionId, NotificationActionDefinition> = {
  pauseGrinding: {
    id: "pauseGrinding",
    wireId: "pause_grinding",
    pathSegment: "pause",
    title: "Pause",
    icon: "pause",
    requiresForeground: false
  },
  adjustGrind: {
    id: "adjustGrind",
    wireId: "adjust_grind",
    pathSegment: "settings",
    title: "Adjust Grind",
    icon: "settings",
    requiresForeground: true
  },
  skipPreinfusion: {
    id: "skipPreinfusion",
    wireId: "skip_preinfusion",
    pathSegment: "skip-preinfusion",
    title: "Skip to Extraction",
    icon: "fast_forward",
    requiresForeground: false
  },
  extendPreinfusion: {
    id: "extendPreinfusion",
    wireId: "extend_preinfusion",
    pathSegment: "extend-preinfusion",
    title: "Extend Pre-Infusion",
    icon: "add",
    requiresForeground: false
  },
  stopShot: {
    id: "stopShot",
    wireId: "stop_shot",
    pathSegment: "stop",
    title: "Stop Shot",
    icon: "stop",
    requiresForeground: false
  },
  viewLive: {
    id: "viewLive",
    wireId: "view_live",
    pathSegment: "live",
    title: "View Live",
    icon: "videocam",
    requiresForeground: true
  },
  brewAgain: {
    id: "brewAgain",
    wireId: "brew_again",
    pathSegment: "repeat",
    title: "Brew Again",
    icon: "refresh",
    requiresForeground: true
  },
  adjustProfile: {
    id: "adjustProfile",
    wireId: "adjust_profile",
    pathSegment: "profile",
    title: "Adjust Profile",
    icon: "edit",
    requiresForeground: true
  },
  share: {
    id: "share",
    wireId: "share",
    pathSegment: "share",
    title: "Share",
    icon: "share",
    requiresForeground: true
  }
};

const actionsByWireId = new Map<string, ButtonActionId>(
  Object.values(actionDefinitions).map((definition) => [definition.wireId, definition.id])
);

export type NotificationActionErrorCode = "UNKNOWN_ACTION" | "INVALID_BREW_ID";

export class NotificationActionError extends Error {
  constructor(
    message: string,
    public code: NotificationActionErrorCode,
    public details?: { wireId?: string; brewId?: string }
  ) {
    super(message);
    this.name = "NotificationActionError";
  }
}

export function isButtonActionId(value: string): value is ButtonActionId {
  return Object.prototype.hasOwnProperty.call(actionDefinitions, value);
}

export function isDefaultTap(wireId: string): boolean {
  return DEFAULT_TAP_SENTINELS.includes(wireId);
}

export function resolveAction(wireId: string): NotificationActionId {
  if (isDefaultTap(wireId)) return "default";
  const action = actionsByWireId.get(wireId);
  if (!action) {
    throw new NotificationActionError("Unknown notification action", "UNKNOWN_ACTION", {
      wireId
    });
  }
  return action;
}

export function getActionDefinition(action: ButtonActionId): NotificationActionDefinition {
  return actionDefinitions[action];
}

export function listButtonActions(): NotificationActionDefinition[] {
  return Object.values(actionDefinitions);
}

export function wireIdOf(action: ButtonActionId): string {
  return actionDefinitions[action].wireId;
}

export function pathSegmentFor(action: NotificationActionId): string {
  return action === "default" ? DEFAULT_ACTION_PATH : actionDefinitions[action].pathSegment;
}

const BREW_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidBrewId(brewId: string): boolean {
  return BREW_ID_PATTERN.test(brewId);
}

export function deepLinkFor(
  action: NotificationActionId,
  brewId: string,
  scheme: string = DEFAULT_DEEP_LINK_SCHEME
): string {
  if (!isValidBrewId(brewId)) {
    throw new NotificationActionError("Brew id is not link-safe", "INVALID_BREW_ID", {
      brewId
    });
  }
  return `${scheme}://brew/${brewId}/${pathSegmentFor(action)}`;
}

// Navigation target for an interaction whose brew id cannot be trusted.
export function brewlessDetailsLink(scheme: string = DEFAULT_DEEP_LINK_SCHEME): string {
  return `${scheme}://brew/${DEFAULT_ACTION_PATH}`;
}

export type BrewDeepLink = {
  brewId: string;
  segment: string;
};

const DEEP_LINK_SEGMENT = /^[a-z][a-z-]*$/;
const DEEP_LINK_QUERY = /^[A-Za-z0-9_=&.%-]*$/;

/**
 * Reads `<scheme>://brew/<brewId>/<segment>[?query]`. Returns null for any other
 * shape, or when the brew segment would not pass `isValidBrewId`.
 */
export function parseBrewDeepLink(
  link: string,
  scheme: string = DEFAULT_DEEP_LINK_SCHEME
): BrewDeepLink | null {
  const prefix = `${scheme}://brew/`;
  if (!link.startsWith(prefix)) return null;
  const rest = link.slice(prefix.length);
  const queryAt = rest.indexOf("?");
  const path = queryAt === -1 ? rest : rest.slice(0, queryAt);
  const query = queryAt === -1 ? "" : rest.slice(queryAt + 1);
  const parts = path.split("/");
  if (parts.length !== 2) return null;
  const [brewId = "", segment = ""] = parts;
  if (!isValidBrewId(brewId) || !DEEP_LINK_SEGMENT.test(segment)) return null;
  if (!DEEP_LINK_QUERY.test(query)) return null;
  return { brewId, segment };
}
