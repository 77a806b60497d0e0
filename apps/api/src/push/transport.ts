import type { StagePayloadSet } from "../brewing/payloadBuilder.js";

export type PushMessage = {
  deviceAddress: string;
  brewId: string;
  payloads: StagePayloadSet;
};

export type SendOptions = {
  // Aborted when the brew is cancelled; honoured on a best-effort basis.
  signal?: AbortSignal;
};

export type SendReceipt = {
  messageId: string;
};

export type PushTransport = {
  readonly name: string;
  isValidAddress: (address: string) => boolean;
  send: (message: PushMessage, options?: SendOptions) => Promise<SendReceipt>;
};

const MAX_ADDRESS_LENGTH = 4096;

export function isPlausibleAddress(address: string): boolean {
  return address.length > 0 && address.length <= MAX_ADDRESS_LENGTH && !/\s/.test(address);
}
