import {
  DEFAULT_DEEP_LINK_SCHEME,
  NotificationActionError,
  deepLinkFor,
  encodeActions,
  getActionDefinition,
  isBrewStageId,
  type BrewStageId,
  type NotificationActionId,
  type NotificationType,
  type WireNotificationAction,
  type WireNotificationData
} from "@first-crack/shared";
import { InvalidStageDataError } from "../errors.js";
import type { BrewContext } from "./brewRequest.js";
import { assertValidStage, type StageEntry } from "./brewTimeline.js";

export const notificationCategories = [
  "BREW_HEATING",
  "BREW_GRINDING",
  "BREW_PREINFUSION",
  "BREW_EXTRACTION",
  "BREW_COMPLETE"
] as const;
export type NotificationCategory = (typeof notificationCategories)[number];

// Registered on devices without buttons; also where unknown stages land.
export const NO_ACTION_CATEGORY: NotificationCategory = "BREW_HEATING";

const stageCategories: Record<BrewStageId, NotificationCategory> = {
  heating: "BREW_HEATING",
  grinding: "BREW_GRINDING",
  pre_infusion: "BREW_PREINFUSION",
  brewing: "BREW_EXTRACTION",
  complete: "BREW_COMPLETE"
};

export function categoryForStage(stageId: string): NotificationCategory {
  if (isBrewStageId(stageId)) return stageCategories[stageId];
  return NO_ACTION_CATEGORY;
}

export const ANDROID_CHANNEL_ID = "brew_notifications";
const WEB_ICON = "/icons/icon-192.png";
const WEB_BADGE = "/icons/badge-72.png";

export type PayloadOptions = {
  mediaBaseUrl: string;
  totalDurationSeconds: number;
  deepLinkScheme?: string;
};

export type AndroidPayload = {
  priority: "high" | "normal";
  collapseKey: string;
  data: WireNotificationData;
  notification: {
    title: string;
    body: string;
    imageUrl?: string;
    channelId: string;
    priority: "high" | "default";
    sound: string;
    tag: string;
  };
};

export type ApsBody = {
  alert: { title: string; body: string };
  sound: string;
  badge: number;
  mutableContent: boolean;
  category: NotificationCategory;
  threadId: string;
};

export type ApnsPayload = {
  headers: Record<string, string>;
  payload: { aps: ApsBody; [key: string]: unknown };
};

export type WebPushAction = {
  action: string;
  title: string;
};

export type WebPushPayload = {
  data: WireNotificationData;
  notification: {
    title: string;
    body: string;
    icon: string;
    badge: string;
    image?: string;
    tag: string;
    renotify: boolean;
    requireInteraction: boolean;
    actions?: WebPushAction[];
  };
};

export type StagePayloadSet = {
  stageId: BrewStageId;
  category: NotificationCategory;
  data: WireNotificationData;
  android: AndroidPayload;
  apns: ApnsPayload;
  webpush: WebPushPayload;
};

function resolveMedia(
  mediaBaseUrl: string,
  ref: string | undefined,
  stage: StageEntry
): string | undefined {
  if (ref === undefined) return undefined;
  if (!ref.startsWith("/")) {
    throw new InvalidStageDataError("Media reference must be a rooted path", {
      stage: stage.stageId,
      media: ref
    });
  }
  return `${mediaBaseUrl}${ref}`;
}

function linkFor(
  action: NotificationActionId,
  context: BrewContext,
  scheme: string
): string {
  try {
    return deepLinkFor(action, context.brewId, scheme);
  } catch (err) {
    if (err instanceof NotificationActionError) {
      throw new InvalidStageDataError("Brew id cannot be used in a deep link", {
        brew_id: context.brewId
      });
    }
    throw err;
  }
}

function assertParameters(context: BrewContext) {
  const { doseGrams, targetTempC, targetPressureBar } = context.parameters;
  for (const value of [doseGrams, targetTempC, targetPressureBar]) {
    if (!Number.isFinite(value)) {
      throw new InvalidStageDataError("Brew parameters must be finite numbers", {
        brew_id: context.brewId
      });
    }
  }
}

function notificationTypeFor(stage: StageEntry): NotificationType {
  return stage.stageId === "complete" ? "brew_complete" : "brew_stage";
}

function buildCoreRecord(
  context: BrewContext,
  stage: StageEntry,
  category: NotificationCategory,
  actions: WireNotificationAction[],
  media: { imageUrl?: string; videoUrl?: string },
  options: PayloadOptions,
  scheme: string
): WireNotificationData {
  const { parameters } = context;
  const data: WireNotificationData = {
    type: notificationTypeFor(stage),
    stage: stage.stageId,
    brewId: context.brewId,
    category,
    title: stage.title,
    body: stage.body,
    brewType: parameters.brewType,
    dose: String(parameters.doseGrams),
    temperature: String(parameters.targetTempC),
    pressure: String(parameters.targetPressureBar),
    elapsedTime: String(stage.offsetSeconds),
    progress: String(stage.progress),
    deepLink: linkFor("default", context, scheme)
  };
  const remaining = options.totalDurationSeconds - stage.offsetSeconds;
  if (remaining > 0) data.remainingTime = String(remaining);
  if (media.imageUrl) data.imageUrl = media.imageUrl;
  if (media.videoUrl) data.videoUrl = media.videoUrl;
  if (actions.length) data.actions = encodeActions(actions);
  return data;
}

/**
 * Builds every surface's payload for one stage of one brew.
 *
 * Pure: the same context, stage and options always give an identical set. Any
 * malformed input fails the whole set with `InvalidStageDataError`.
 */
export function buildStagePayloads(
  context: BrewContext,
  stage: StageEntry,
  options: PayloadOptions
): StagePayloadSet {
  assertValidStage(stage);
  assertParameters(context);
  const scheme = options.deepLinkScheme ?? DEFAULT_DEEP_LINK_SCHEME;

  const category = categoryForStage(stage.stageId);
  const imageUrl = resolveMedia(options.mediaBaseUrl, stage.media?.image, stage);
  const videoUrl = resolveMedia(options.mediaBaseUrl, stage.media?.video, stage);

  const actions: WireNotificationAction[] = stage.actions.map((id) => {
    const definition = getActionDefinition(id);
    return {
      id: definition.wireId,
      title: definition.title,
      icon: definition.icon,
      requiresForeground: definition.requiresForeground,
      deepLink: linkFor(id, context, scheme)
    };
  });

  const data = buildCoreRecord(
    context,
    stage,
    category,
    actions,
    { imageUrl, videoUrl },
    options,
    scheme
  );

  const android: AndroidPayload = {
    priority: stage.highPriority ? "high" : "normal",
    collapseKey: context.brewId,
    data: { ...data },
    notification: {
      title: stage.title,
      body: stage.body,
      ...(imageUrl ? { imageUrl } : {}),
      channelId: ANDROID_CHANNEL_ID,
      priority: stage.highPriority ? "high" : "default",
      sound: "default",
      tag: `brew_${context.brewId}`
    }
  };

  const aps: ApsBody = {
    alert: { title: stage.title, body: stage.body },
    sound: "default",
    badge: 1,
    mutableContent: true,
    category,
    threadId: context.brewId
  };
  const apnsPayload: ApnsPayload["payload"] = { ...data, aps };
  const apns: ApnsPayload = {
    headers: {
      "apns-priority": stage.highPriority ? "10" : "5",
      "apns-push-type": "alert",
      "apns-collapse-id": context.brewId
    },
    payload: apnsPayload
  };

  const webpush: WebPushPayload = {
    data: { ...data },
    notification: {
      title: stage.title,
      body: stage.body,
      icon: WEB_ICON,
      badge: WEB_BADGE,
      ...(imageUrl ? { image: imageUrl } : {}),
      tag: context.brewId,
      renotify: true,
      requireInteraction: stage.requireInteraction,
      ...(actions.length
        ? { actions: actions.map((a) => ({ action: a.id, title: a.title })) }
        : {})
    }
  };

  return { stageId: stage.stageId, category, data, android, apns, webpush };
}
