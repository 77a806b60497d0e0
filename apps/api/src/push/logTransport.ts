import { TransportSendFailure } from "../errors.js";
import { log } from "../logger.js";
import { isPlausibleAddress, type PushTransport } from "./transport.js";

// Local development transport: writes each message to the log instead of a device.
export function createLogTransport(): PushTransport {
  let sent = 0;
  return {
    name: "log",
    isValidAddress: isPlausibleAddress,
    send: async (message, options) => {
      if (options?.signal?.aborted) {
        throw new TransportSendFailure("Send aborted before dispatch");
      }
      sent += 1;
      const messageId = `log-${sent}`;
      log({
        level: "info",
        msg: "push_message",
        message_id: messageId,
        brew_id: message.brewId,
        stage: message.payloads.stageId,
        category: message.payloads.category,
        data: message.payloads.data
      });
      return { messageId };
    }
  };
}
