import { describe, expect, it, vi } from "vitest";
import type { Message } from "firebase-admin/messaging";
import { buildStagePayloads } from "../../src/brewing/payloadBuilder.js";
import { getStageEntry } from "../../src/brewing/brewTimeline.js";
import { TransportSendFailure } from "../../src/errors.js";
import { createFcmTransport, toFcmMessage } from "../../src/push/fcmTransport.js";
import type { PushMessage } from "../../src/push/transport.js";
import { buildBrewContext } from "../support/brews.js";

function pushMessage(): PushMessage {
  const context = buildBrewContext({ deviceAddress: "fcm-token:abc_123" });
  const stage = getStageEntry("brewing");
  if (!stage) throw new Error("missing brewing stage");
  return {
    deviceAddress: context.deviceAddress,
    brewId: context.brewId,
    payloads: buildStagePayloads(context, stage, {
      mediaBaseUrl: "https://media.test",
      totalDurationSeconds: 75
    })
  };
}

describe("toFcmMessage", () => {
  it("folds every surface into one message for the device token", () => {
    const message = pushMessage();
    const fcm = toFcmMessage(message);
    expect(fcm).toEqual({
      token: "fcm-token:abc_123",
      data: message.payloads.data,
      android: message.payloads.android,
      apns: message.payloads.apns,
      webpush: message.payloads.webpush
    });
  });
});

describe("createFcmTransport", () => {
  it("accepts registration-token shaped addresses only", () => {
    const transport = createFcmTransport({ sender: { send: vi.fn() } });
    expect(transport.isValidAddress("dev-123")).toBe(true);
    expect(transport.isValidAddress("fcm-token:abc_123")).toBe(true);
    expect(transport.isValidAddress("has space")).toBe(false);
    expect(transport.isValidAddress("semi;colon")).toBe(false);
    expect(transport.isValidAddress("")).toBe(false);
  });

  it("returns the message id from the sender", async () => {
    const sent: Message[] = [];
    const transport = createFcmTransport({
      sender: {
        send: async (message: Message) => {
          sent.push(message);
          return "projects/demo/messages/1";
        }
      }
    });

    await expect(transport.send(pushMessage())).resolves.toEqual({
      messageId: "projects/demo/messages/1"
    });
    expect(sent).toHaveLength(1);
  });

  it("wraps sender errors as transport failures", async () => {
    const transport = createFcmTransport({
      sender: { send: vi.fn().mockRejectedValue(new Error("registration-token-not-registered")) }
    });

    const failure = await transport.send(pushMessage()).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(TransportSendFailure);
    expect(failure).toMatchObject({
      code: "TRANSPORT_SEND_FAILURE",
      message: "FCM rejected message: registration-token-not-registered"
    });
  });

  it("does not dispatch once the brew is cancelled", async () => {
    const send = vi.fn();
    const transport = createFcmTransport({ sender: { send } });
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send(pushMessage(), { signal: controller.signal })).rejects.toThrow(
      "Send aborted before dispatch"
    );
    expect(send).not.toHaveBeenCalled();
  });
});
