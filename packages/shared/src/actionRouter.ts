import type { RawInteraction } from "./interactionSurfaces.js";
import {
  DEFAULT_DEEP_LINK_SCHEME,
  NotificationActionError,
  brewlessDetailsLink,
  deepLinkFor,
  parseBrewDeepLink,
  isValidBrewId,
  resolveAction,
  type NotificationActionId
} from "./notificationActions.js";
import {
  getNavigationChannel,
  type NavigationChannel,
  type NavigationEvent
} from "./navigationChannel.js";

export type RouterState = "idle" | "received" | "resolved" | "dispatched" | "rejected";

export type RejectionReason =
  | "MISSING_BREW_ID"
  | "UNKNOWN_ACTION"
  | "CHANNEL_DETACHED"
  | "LISTENER_FAILED";

export type RouteResult =
  | { state: "dispatched"; event: NavigationEvent; trace: RouterState[] }
  | { state: "rejected"; reason: RejectionReason; trace: RouterState[] };

export type RouterLogEntry = {
  level: "info" | "error";
  msg: string;
  [key: string]: unknown;
};

export type RouterLog = (entry: RouterLogEntry) => void;

export type ActionRouterOptions = {
  log: RouterLog;
  channel?: NavigationChannel;
  scheme?: string;
};

export type ActionRouter = {
  route: (interaction: RawInteraction) => RouteResult;
};

type ResolvedTarget = { brewId: string; deepLink: string };

export function createActionRouter(options: ActionRouterOptions): ActionRouter {
  const scheme = options.scheme ?? DEFAULT_DEEP_LINK_SCHEME;
  const log = options.log;

  function reject(
    trace: RouterState[],
    reason: RejectionReason,
    interaction: RawInteraction,
    extra: Record<string, unknown> = {}
  ): RouteResult {
    log({
      level: reason === "LISTENER_FAILED" ? "error" : "info",
      msg: "interaction_rejected",
      reason,
      wire_action_id: interaction.wireActionId,
      brew_id: interaction.brewId,
      stage: interaction.stage,
      ...extra
    });
    return { state: "rejected", reason, trace: [...trace, "rejected"] };
  }

  function resolveTarget(
    action: NotificationActionId,
    brewId: string,
    supplied: string | undefined
  ): ResolvedTarget {
    if (!isValidBrewId(brewId)) {
      log({
        level: "info",
        msg: "interaction_brew_id_invalid",
        code: "INVALID_BREW_ID",
        action
      });
      return { brewId: "", deepLink: brewlessDetailsLink(scheme) };
    }
    // A surface-held link wins only when it targets this same brew.
    if (supplied && parseBrewDeepLink(supplied, scheme)?.brewId === brewId) {
      return { brewId, deepLink: supplied };
    }
    if (supplied) {
      log({
        level: "info",
        msg: "interaction_deep_link_ignored",
        brew_id: brewId,
        deep_link: supplied
      });
    }
    return { brewId, deepLink: deepLinkFor(action, brewId, scheme) };
  }

  function route(interaction: RawInteraction): RouteResult {
    const trace: RouterState[] = ["idle", "received"];

    const brewId = interaction.brewId?.trim();
    if (!brewId) return reject(trace, "MISSING_BREW_ID", interaction);

    let action: NotificationActionId;
    try {
      action = resolveAction(interaction.wireActionId);
    } catch (err) {
      if (err instanceof NotificationActionError && err.code === "UNKNOWN_ACTION") {
        return reject(trace, "UNKNOWN_ACTION", interaction);
      }
      throw err;
    }

    const target = resolveTarget(action, brewId, interaction.deepLink?.trim());
    const event: NavigationEvent = { action, ...target };
    trace.push("resolved");

    const channel = options.channel ?? getNavigationChannel();
    let delivered: boolean;
    try {
      delivered = channel.emit(event);
    } catch (err) {
      return reject(trace, "LISTENER_FAILED", interaction, {
        error: err instanceof Error ? err.message : String(err)
      });
    }
    if (!delivered) return reject(trace, "CHANNEL_DETACHED", interaction);

    log({
      level: "info",
      msg: "interaction_dispatched",
      action: event.action,
      brew_id: event.brewId,
      deep_link: event.deepLink
    });
    return { state: "dispatched", event, trace: [...trace, "dispatched"] };
  }

  return { route };
}
