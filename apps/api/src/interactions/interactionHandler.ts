import {
  createActionRouter,
  parseInteraction,
  type NavigationChannel,
  type NavigationEvent,
  type RouteResult
} from "@first-crack/shared";
import { validationError } from "../errors.js";
import { log } from "../logger.js";

export const API_NAVIGATION_OWNER = "api:interactions";

export type InteractionHandlerDeps = {
  channel: NavigationChannel;
  scheme: string;
  cancelBrew: (brewId: string) => number | null;
  onNavigation?: (event: NavigationEvent) => void;
};

export type InteractionHandler = {
  handle: (body: unknown) => RouteResult;
  close: () => void;
};

/**
 * Routes interactions that reach the backend (background action buttons, web
 * service-worker clicks) through the same Action Router a device runs. The
 * handler owns the navigation channel while it is open.
 */
export function createInteractionHandler(deps: InteractionHandlerDeps): InteractionHandler {
  const { channel } = deps;
  const router = createActionRouter({ log, channel, scheme: deps.scheme });

  channel.attach(API_NAVIGATION_OWNER, (event) => {
    if (event.action === "stopShot" && event.brewId) {
      const pending = deps.cancelBrew(event.brewId);
      log({
        level: "info",
        msg: "interaction_stop_shot",
        brew_id: event.brewId,
        pending_stages_cancelled: pending ?? 0,
        active: pending !== null
      });
    }
    deps.onNavigation?.(event);
  });

  return {
    handle(body) {
      const interaction = parseInteraction(body);
      if (!interaction) {
        throw validationError("Interaction body is not a recognised shape", ["wireActionId"]);
      }
      return router.route(interaction);
    },
    close() {
      channel.detach(API_NAVIGATION_OWNER);
    }
  };
}
