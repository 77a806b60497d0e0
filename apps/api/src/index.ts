import { createServer as createHttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { createServer } from "./server.js";
import { loadConfig, type ApiConfig } from "./config/env.js";
import { errorMessage, log } from "./logger.js";
import { createFcmTransport } from "./push/fcmTransport.js";
import { createLogTransport } from "./push/logTransport.js";
import type { PushTransport } from "./push/transport.js";
import { registerBrewNamespace } from "./realtime/brewNamespace.js";
import { closeListeners } from "./realtime/shutdown.js";
import {
  clearBrewEventEmitter,
  registerBrewEventEmitter
} from "./realtime/brewEvents.js";

function selectTransport(config: ApiConfig): PushTransport {
  if (config.pushTransport === "fcm") {
    return createFcmTransport({ projectId: config.firebaseProjectId });
  }
  return createLogTransport();
}

const config = loadConfig();
const api = createServer({ config, transport: selectTransport(config) });
const httpServer = createHttpServer(api.app);

const allowedOrigins = process.env.CORS_ALLOWED_ORIGINS?.split(",")
  .map((s) => s.trim())
  .filter(Boolean) ?? ["http://localhost:5173", "http://127.0.0.1:5173"];
let io: SocketIOServer | null = null;
if (config.realtimeEnabled) {
  io = new SocketIOServer(httpServer, {
    cors: { origin: allowedOrigins, credentials: true },
    serveClient: false
  });
  registerBrewEventEmitter(registerBrewNamespace(io));
} else {
  clearBrewEventEmitter();
}

function shutdown(signal: string) {
  log({
    level: "info",
    msg: "shutdown",
    signal,
    active_brews: api.scheduler.activeBrewIds().length
  });
  api.close();
  void closeListeners(httpServer, io).then(
    () => process.exit(0),
    (err: unknown) => {
      log({ level: "error", msg: "shutdown_failed", error: errorMessage(err) });
      process.exit(1);
    }
  );
}
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

httpServer.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${config.port}`);
});
