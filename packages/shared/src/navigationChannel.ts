import type { NotificationActionId } from "./notificationActions.js";

export type NavigationEvent = {
  action: NotificationActionId;
  brewId: string;
  deepLink: string;
};

export type NavigationListener = (event: NavigationEvent) => void;

export type NavigationChannelErrorCode = "ALREADY_ATTACHED";

export class NavigationChannelError extends Error {
  constructor(
    message: string,
    public code: NavigationChannelErrorCode,
    public details?: { owner?: string; attemptedBy?: string }
  ) {
    super(message);
    this.name = "NavigationChannelError";
  }
}

/**
 * Single-owner handle to the application's navigation stream.
 *
 * Exactly one owner (the UI shell, or the API's interaction handler) may be attached
 * at a time. Emitting while nobody is attached is not an error: `emit` reports
 * `false` and the caller decides what that means.
 */
export class NavigationChannel {
  private owner: string | null = null;
  private listener: NavigationListener | null = null;

  attach(owner: string, listener: NavigationListener) {
    if (this.owner !== null && this.owner !== owner) {
      throw new NavigationChannelError(
        "Navigation channel already has an owner",
        "ALREADY_ATTACHED",
        { owner: this.owner, attemptedBy: owner }
      );
    }
    this.owner = owner;
    this.listener = listener;
  }

  detach(owner: string): boolean {
    if (this.owner !== owner) return false;
    this.owner = null;
    this.listener = null;
    return true;
  }

  isAttached(): boolean {
    return this.listener !== null;
  }

  currentOwner(): string | null {
    return this.owner;
  }

  emit(event: NavigationEvent): boolean {
    if (!this.listener) return false;
    this.listener(event);
    return true;
  }
}

let sharedChannel: NavigationChannel | null = null;

export function getNavigationChannel(): NavigationChannel {
  if (!sharedChannel) sharedChannel = new NavigationChannel();
  return sharedChannel;
}

export function resetNavigationChannel() {
  sharedChannel = null;
}
