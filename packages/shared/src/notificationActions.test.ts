import { describe, expect, it } from "vitest";
import {
  DEFAULT_TAP_SENTINELS,
  NotificationActionError,
  brewlessDetailsLink,
  deepLinkFor,
  getActionDefinition,
  isValidBrewId,
  listButtonActions,
  notificationActionIds,
  parseBrewDeepLink,
  pathSegmentFor,
  resolveAction,
  wireIdOf
} from "./notificationActions.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("resolveAction", () => {
  it("round-trips every button action through its wire id", () => {
    for (const definition of listButtonActions()) {
      expect(resolveAction(wireIdOf(definition.id))).toBe(definition.id);
    }
  });

  it("covers every non-default action id exactly once", () => {
    const ids = listButtonActions().map((d) => d.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect([...ids, "default"].sort()).toEqual([...notificationActionIds].sort());
  });

  it("keeps wire ids disjoint from the default-tap sentinels", () => {
    for (const definition of listButtonActions()) {
      expect(DEFAULT_TAP_SENTINELS).not.toContain(definition.wireId);
    }
  });

  it("maps every default-tap sentinel to the default action", () => {
    expect(resolveAction("com.apple.UNNotificationDefaultActionIdentifier")).toBe(
      "default"
    );
    expect(resolveAction("default")).toBe("default");
    expect(resolveAction("")).toBe("default");
  });

  it("rejects identifiers outside the closed set", () => {
    expect(() => resolveAction("stopShot")).toThrow(NotificationActionError);
    const err = captureError(() => resolveAction("launch_rockets"));
    expect(err).toBeInstanceOf(NotificationActionError);
    expect(err).toMatchObject({
      code: "UNKNOWN_ACTION",
      details: { wireId: "launch_rockets" }
    });
  });
});

describe("deepLinkFor", () => {
  it("builds scheme://brew/<brewId>/<segment>", () => {
    expect(deepLinkFor("stopShot", "brew_1_2")).toBe("firstcrack://brew/brew_1_2/stop");
    expect(deepLinkFor("skipPreinfusion", "b-9")).toBe(
      "firstcrack://brew/b-9/skip-preinfusion"
    );
    expect(deepLinkFor("default", "brew_1_2")).toBe("firstcrack://brew/brew_1_2/details");
  });

  it("honours a custom scheme", () => {
    expect(deepLinkFor("brewAgain", "abc", "crema")).toBe("crema://brew/abc/repeat");
  });

  it("refuses brew ids outside the allowed character class", () => {
    expect(() => deepLinkFor("stopShot", "abc;rm -rf")).toThrow(NotificationActionError);
    expect(captureError(() => deepLinkFor("viewLive", "../etc"))).toMatchObject({
      code: "INVALID_BREW_ID",
      details: { brewId: "../etc" }
    });
  });

  it("validates brew ids", () => {
    expect(isValidBrewId("brew_1700000000000_42")).toBe(true);
    expect(isValidBrewId("")).toBe(false);
    expect(isValidBrewId("a b")).toBe(false);
    expect(isValidBrewId("a/b")).toBe(false);
  });
});

describe("registry metadata", () => {
  it("exposes path segments and button metadata", () => {
    expect(pathSegmentFor("adjustGrind")).toBe("settings");
    expect(pathSegmentFor("default")).toBe("details");
    expect(getActionDefinition("viewLive")).toEqual({
      id: "viewLive",
      wireId: "view_live",
      pathSegment: "live",
      title: "View Live",
      icon: "videocam",
      requiresForeground: true
    });
  });

  it("builds the brew-less fallback link", () => {
    expect(brewlessDetailsLink()).toBe("firstcrack://brew/details");
    expect(brewlessDetailsLink("crema")).toBe("crema://brew/details");
  });
});

describe("parseBrewDeepLink", () => {
  it("reads the brew id and segment of an app link", () => {
    expect(parseBrewDeepLink("firstcrack://brew/brew_1_2/stop")).toEqual({
      brewId: "brew_1_2",
      segment: "stop"
    });
    expect(parseBrewDeepLink("firstcrack://brew/brew_1_2/live?camera=2")).toEqual({
      brewId: "brew_1_2",
      segment: "live"
    });
    expect(parseBrewDeepLink("crema://brew/b7/repeat", "crema")).toEqual({
      brewId: "b7",
      segment: "repeat"
    });
  });

  it("refuses other shapes and unsafe brew segments", () => {
    expect(parseBrewDeepLink("https://example.com/brew")).toBeNull();
    expect(parseBrewDeepLink("crema://brew/b7/repeat")).toBeNull();
    expect(parseBrewDeepLink("firstcrack://brew/details")).toBeNull();
    expect(parseBrewDeepLink("firstcrack://brew/abc;rm -rf/stop")).toBeNull();
    expect(parseBrewDeepLink("firstcrack://brew/b7/stop/extra")).toBeNull();
    expect(parseBrewDeepLink("firstcrack://brew/b7/stop?x=<script>")).toBeNull();
  });
});
