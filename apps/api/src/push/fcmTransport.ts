import { applicationDefault, getApps, initializeApp } from "firebase-admin/app";
import { getMessaging, type Message, type Messaging } from "firebase-admin/messaging";
import { TransportSendFailure } from "../errors.js";
import { errorMessage } from "../logger.js";
import { isPlausibleAddress, type PushMessage, type PushTransport } from "./transport.js";

// Registration tokens are URL-safe base64 with a colon-separated prefix.
const FCM_TOKEN_PATTERN = /^[A-Za-z0-9_:-]+$/;

export type FcmSender = Pick<Messaging, "send">;

export function toFcmMessage(message: PushMessage): Message {
  const { payloads } = message;
  return {
    token: message.deviceAddress,
    data: payloads.data,
    android: payloads.android,
    apns: payloads.apns,
    webpush: payloads.webpush
  };
}

function defaultSender(projectId?: string): FcmSender {
  const existing = getApps()[0];
  const app =
    existing ??
    initializeApp({
      credential: applicationDefault(),
      ...(projectId ? { projectId } : {})
    });
  return getMessaging(app);
}

export function createFcmTransport(
  options: { projectId?: string; sender?: FcmSender } = {}
): PushTransport {
  let sender = options.sender ?? null;

  return {
    name: "fcm",
    isValidAddress: (address) =>
      isPlausibleAddress(address) && FCM_TOKEN_PATTERN.test(address),
    send: async (message, sendOptions) => {
      if (sendOptions?.signal?.aborted) {
        throw new TransportSendFailure("Send aborted before dispatch");
      }
      if (!sender) sender = defaultSender(options.projectId);
      try {
        const messageId = await sender.send(toFcmMessage(message));
        return { messageId };
      } catch (err) {
        throw new TransportSendFailure(`FCM rejected message: ${errorMessage(err)}`, err);
      }
    }
  };
}
