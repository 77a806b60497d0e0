import type { Namespace, Server, Socket } from "socket.io";
import { isValidBrewId } from "@first-crack/shared";
import { AppError } from "../errors.js";

export const BREW_NAMESPACE = "/brews";

export type BrewSocketData = {
  brewId: string;
};

const brewRoom = (brewId: string) => `brew:${brewId}`;

function parseBrewId(socket: Socket): string {
  const fromQuery = socket.handshake.query?.brewId;
  const raw: unknown = fromQuery ?? socket.handshake.auth?.brewId;
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== "string" || !isValidBrewId(value)) {
    throw new AppError("INVALID_BREW_ID", 400, "Invalid brew id");
  }
  return value;
}

export function registerBrewNamespace(io: Server): Namespace {
  const nsp = io.of(BREW_NAMESPACE);

  nsp.use((socket, next) => {
    try {
      const data: BrewSocketData = { brewId: parseBrewId(socket) };
      socket.data = data;
      next();
    } catch (err) {
      next(err instanceof Error ? err : new Error(String(err)));
    }
  });

  nsp.on("connection", (socket) => {
    const { brewId } = parseSocketData(socket);
    void socket.join(brewRoom(brewId));
    socket.emit("joined", { brewId });
  });

  return nsp;
}

function parseSocketData(socket: Socket): BrewSocketData {
  const data: unknown = socket.data;
  if (data && typeof data === "object" && "brewId" in data && typeof data.brewId === "string") {
    return { brewId: data.brewId };
  }
  throw new AppError("INVALID_BREW_ID", 400, "Socket has no brew id");
}

export function emitToBrew(nsp: Namespace, brewId: string, event: string, payload: unknown) {
  nsp.to(brewRoom(brewId)).emit(event, payload);
}

export function getBrewRoom(brewId: string) {
  return brewRoom(brewId);
}
