import { isBrewStageId, isBrewType, type BrewStageId, type BrewType } from "./brewStages.js";

export const notificationTypes = ["brew_stage", "brew_alert", "brew_complete"] as const;
export type NotificationType = (typeof notificationTypes)[number];

export type WireNotificationAction = {
  id: string;
  title: string;
  icon?: string;
  requiresForeground?: boolean;
  deepLink?: string;
};

// Transport data payloads only carry strings.
export type WireNotificationData = Record<string, string>;

export type NotificationData = {
  type: NotificationType;
  stage: BrewStageId;
  brewId: string;
  category?: string;
  title: string;
  body: string;
  imageUrl?: string;
  videoUrl?: string;
  deepLink?: string;
  progress?: number;
  brewType: BrewType;
  dose: number;
  temperature: number;
  pressure: number;
  elapsedTime: number;
  remainingTime?: number;
  actions: WireNotificationAction[];
};

export const notificationDataDefaults = {
  type: "brew_stage",
  stage: "heating",
  brewType: "espresso",
  dose: 18,
  temperature: 93,
  pressure: 9,
  elapsedTime: 0
} as const satisfies Partial<NotificationData>;

function isNotificationType(value: string): value is NotificationType {
  return (notificationTypes as readonly string[]).includes(value);
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readInteger(raw: Record<string, unknown>, key: string): number | undefined {
  const value = readNumber(raw, key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

export function encodeActions(actions: WireNotificationAction[]): string {
  return JSON.stringify(actions);
}

function toWireAction(value: unknown): WireNotificationAction | null {
  if (!value || typeof value !== "object") return null;
  const record = value as Record<string, unknown>;
  if (typeof record.id !== "string" || typeof record.title !== "string") return null;
  const action: WireNotificationAction = { id: record.id, title: record.title };
  if (typeof record.icon === "string") action.icon = record.icon;
  if (typeof record.requiresForeground === "boolean") {
    action.requiresForeground = record.requiresForeground;
  }
  if (typeof record.deepLink === "string") action.deepLink = record.deepLink;
  return action;
}

export function decodeActions(raw: string | undefined): WireNotificationAction[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed
    .map(toWireAction)
    .filter((action): action is WireNotificationAction => action !== null);
}

export function decodeNotificationData(raw: Record<string, unknown>): NotificationData {
  const type = readString(raw, "type");
  const stage = readString(raw, "stage");
  const brewType = readString(raw, "brewType");
  const progress = readInteger(raw, "progress");
  const remainingTime = readInteger(raw, "remainingTime");

  const data: NotificationData = {
    type: type && isNotificationType(type) ? type : notificationDataDefaults.type,
    stage: stage && isBrewStageId(stage) ? stage : notificationDataDefaults.stage,
    brewId: readString(raw, "brewId") ?? "",
    title: readString(raw, "title") ?? "",
    body: readString(raw, "body") ?? "",
    brewType:
      brewType && isBrewType(brewType) ? brewType : notificationDataDefaults.brewType,
    dose: readNumber(raw, "dose") ?? notificationDataDefaults.dose,
    temperature: readNumber(raw, "temperature") ?? notificationDataDefaults.temperature,
    pressure: readNumber(raw, "pressure") ?? notificationDataDefaults.pressure,
    elapsedTime: readInteger(raw, "elapsedTime") ?? notificationDataDefaults.elapsedTime,
    actions: decodeActions(readString(raw, "actions"))
  };

  const category = readString(raw, "category");
  if (category) data.category = category;
  const imageUrl = readString(raw, "imageUrl");
  if (imageUrl) data.imageUrl = imageUrl;
  const videoUrl = readString(raw, "videoUrl");
  if (videoUrl) data.videoUrl = videoUrl;
  const deepLink = readString(raw, "deepLink");
  if (deepLink) data.deepLink = deepLink;
  if (progress !== undefined && progress >= 0 && progress <= 100) data.progress = progress;
  if (remainingTime !== undefined && remainingTime > 0) data.remainingTime = remainingTime;

  return data;
}
