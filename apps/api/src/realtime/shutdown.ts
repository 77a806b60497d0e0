import type { Server as HttpServer } from "http";
import type { Server as SocketIOServer } from "socket.io";

/**
 * Stops accepting connections. With realtime on, `io.close()` disconnects every
 * socket and closes the http server it is attached to; open websockets would
 * otherwise keep `httpServer.close()` from ever calling back.
 */
export function closeListeners(httpServer: HttpServer, io: SocketIOServer | null): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const done = (err?: Error) => (err ? reject(err) : resolve());
    if (io) {
      void io.close(done);
    } else {
      httpServer.close(done);
    }
  });
}
