import { createServer } from "http";
import { afterEach, describe, expect, it } from "vitest";
import { BREW_NAMESPACE, registerBrewNamespace } from "../../src/realtime/brewNamespace.js";
import { closeListeners } from "../../src/realtime/shutdown.js";
import {
  ListenPermissionError,
  createTestClient,
  disconnectClient,
  startSocketTestServer,
  type SocketTestServer,
  type TestClient
} from "../support/socket.js";

let client: TestClient | undefined;

async function waitForDisconnect(target: TestClient) {
  for (let i = 0; i < 50; i += 1) {
    if (!target.socket.connected) return;
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
  throw new Error("Client stayed connected");
}

async function startBrewServer(): Promise<SocketTestServer | null> {
  try {
    return await startSocketTestServer((io) => {
      registerBrewNamespace(io);
    });
  } catch (err) {
    if (err instanceof ListenPermissionError) return null;
    throw err;
  }
}

describe("closeListeners", () => {
  afterEach(async () => {
    if (client) await disconnectClient(client);
    client = undefined;
  });

  it("closes the http server even with a websocket still open", async () => {
    const server = await startBrewServer();
    if (!server) return;
    client = await createTestClient(server, {
      namespace: BREW_NAMESPACE,
      query: { brewId: "brew_1_2" }
    });
    expect(client.socket.connected).toBe(true);

    await closeListeners(server.httpServer, server.io);

    expect(server.httpServer.listening).toBe(false);
    await waitForDisconnect(client);
  });

  it("closes a plain http server when realtime is off", async () => {
    const httpServer = createServer();
    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(0, "127.0.0.1", () => resolve());
      });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EPERM") return;
      throw err;
    }

    await closeListeners(httpServer, null);
    expect(httpServer.listening).toBe(false);
  });

  it("rejects when the server was never listening", async () => {
    await expect(closeListeners(createServer(), null)).rejects.toThrow("Server is not running");
  });
});
