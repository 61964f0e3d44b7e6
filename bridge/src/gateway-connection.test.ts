// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { GatewayRequestError, KeyMissingError, TransportError, TunnelError } from "./errors";
import { GatewayConnection, tunneledEndpoint, type TunnelOpener } from "./gateway-connection";
import type { RawFrame } from "./message-codec";
import type { GatewayTransport } from "./transport";
import type { BridgeOptions, ConnectionConfig, ConnectionState, TunnelConfig } from "./types";

const options: BridgeOptions = {
  connectTimeoutMs: 500,
  authTimeoutMs: 500,
  heartbeatIntervalMs: 1000,
  heartbeatMissThreshold: 2,
  reconnectBaseMs: 100,
  reconnectMaxMs: 1000,
  jitterRatio: 0,
  maxReconnectAttempts: 0,
  maxAuthRejections: 2,
  queueCapacity: 10,
  stableAfterMs: 60000,
  requestTimeoutMs: 500,
};

const baseConfig: ConnectionConfig = {
  endpointURL: "ws://127.0.0.1:18789",
  credential: { kind: "token", stored: "test-token" },
  autoConnect: false,
};

const plainSecrets = { reveal: (stored: string) => stored };

class FakeTransport implements GatewayTransport {
  sent: Array<Record<string, unknown>> = [];
  disposed: boolean | null = null;
  disposal: Promise<void> = Promise.resolve();
  failWrites = false;
  holdWrites = false;
  private held: Array<() => void> = [];
  private openListeners: Array<() => void> = [];
  private messageListeners: Array<(data: RawFrame) => void> = [];
  private closeListeners: Array<(code: number, reason: string) => void> = [];
  private errorListeners: Array<(error: Error) => void> = [];

  constructor(readonly url: string) {}

  send(data: string, callback: (error?: Error) => void): void {
    if (this.failWrites) {
      callback(new Error("write after end"));
      return;
    }
    if (this.holdWrites) {
      this.held.push(() => {
        this.sent.push(JSON.parse(data));
        callback();
      });
      return;
    }
    this.sent.push(JSON.parse(data));
    callback();
  }

  onOpen(listener: () => void): void {
    this.openListeners.push(listener);
  }

  onMessage(listener: (data: RawFrame) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.closeListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  dispose(graceful: boolean): Promise<void> {
    this.disposed = graceful;
    return this.disposal;
  }

  releaseWrites(): void {
    this.holdWrites = false;
    this.held.splice(0).forEach((write) => write());
  }

  open(): void {
    this.openListeners.forEach((listener) => listener());
  }

  receive(frame: Record<string, unknown>): void {
    this.messageListeners.forEach((listener) => listener(JSON.stringify(frame)));
  }

  close(code = 1006, reason = ""): void {
    this.closeListeners.forEach((listener) => listener(code, reason));
  }

  fail(error: Error): void {
    this.errorListeners.forEach((listener) => listener(error));
  }

  types(): unknown[] {
    return this.sent.map((frame) => frame.type);
  }
}

function createFactory() {
  const transports: FakeTransport[] = [];
  const factory = (url: string) => {
    const transport = new FakeTransport(url);
    transports.push(transport);
    return transport;
  };
  const last = (): FakeTransport => {
    const transport = transports[transports.length - 1];
    if (!transport) {
      throw new Error("no transport created");
    }
    return transport;
  };
  return { transports, factory, last };
}

async function settle(): Promise<void> {
  for (let i = 0; i < 50; i += 1) {
    await Promise.resolve();
  }
}

function trackStates(connection: GatewayConnection): ConnectionState[] {
  const states: ConnectionState[] = [];
  connection.events.on("connectionStateChanged", (snapshot) => {
    states.push(snapshot.state);
  });
  return states;
}

async function handshake(
  current: () => FakeTransport,
  hello: Record<string, unknown> = {}
): Promise<void> {
  await settle();
  const transport = current();
  transport.open();
  await settle();
  transport.receive({ type: "hello-ok", ...hello });
  await settle();
}

describe("GatewayConnection", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("handshake", () => {
    it("reaches connected only after an acknowledged auth frame", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      const states = trackStates(connection);

      connection.connect();
      await settle();
      const transport = last();
      expect(transport.url).toBe("ws://127.0.0.1:18789");
      transport.open();
      await settle();

      expect(connection.getSnapshot().state).toBe("authenticating");
      expect(transport.sent).toEqual([{ type: "auth", token: "test-token" }]);

      transport.receive({ type: "hello-ok" });
      await settle();

      expect(states).toEqual(["connecting", "authenticating", "connected"]);
      expect(connection.getSnapshot().endpoint).toBe("ws://127.0.0.1:18789");
    });

    it("sends a password credential under the password key", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(
        { ...baseConfig, credential: { kind: "password", stored: "test-password" } },
        options,
        { secrets: plainSecrets, createTransport: factory }
      );

      connection.connect();
      await settle();
      last().open();
      await settle();

      expect(last().sent).toEqual([{ type: "auth", password: "test-password" }]);
    });

    it("treats a missing auth acknowledgement as a transport failure", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.connect();
      await settle();
      last().open();
      await vi.advanceTimersByTimeAsync(500);

      const snapshot = connection.getSnapshot();
      expect(snapshot.state).toBe("reconnecting");
      expect(snapshot.lastError).toBe("No auth acknowledgement within 500ms");
      expect(snapshot.authRejections).toBe(0);
    });

    it("times out a dial that never opens", async () => {
      const { factory } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.connect();
      await vi.advanceTimersByTimeAsync(500);

      expect(connection.getSnapshot()).toMatchObject({
        state: "reconnecting",
        reconnectAttempts: 1,
        lastError: "Connect to ws://127.0.0.1:18789 timed out after 500ms",
      });
    });

    it("ignores stream frames before authentication", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      const frames = vi.fn();
      connection.events.on("streamFrame", frames);

      connection.connect();
      await settle();
      last().open();
      await settle();
      last().receive({ type: "delta", channel: "agent:main:x", kind: "content", text: "early", seq: 1 });

      expect(frames).not.toHaveBeenCalled();
    });
  });

  describe("auth rejection", () => {
    it("retries after a rejection and fails once the limit is reached", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      const states = trackStates(connection);
      const rejections = vi.fn();
      connection.events.on("authRejected", rejections);

      connection.connect();
      await settle();
      last().open();
      await settle();
      last().receive({ type: "auth-error", message: "bad token" });
      await settle();

      expect(connection.getSnapshot().state).toBe("reconnecting");
      expect(transports[0].disposed).toBe(false);

      await vi.advanceTimersByTimeAsync(100);
      expect(transports).toHaveLength(2);
      last().open();
      await settle();
      last().receive({ type: "auth-error", message: "bad token" });
      await settle();

      expect(rejections.mock.calls).toEqual([
        [{ attempt: 1, final: false, reason: "bad token" }],
        [{ attempt: 2, final: true, reason: "bad token" }],
      ]);
      expect(states[states.length - 1]).toBe("failed");
      expect(states).not.toContain("connected");

      await vi.advanceTimersByTimeAsync(10000);
      expect(transports).toHaveLength(2);
    });

    it("starts over from failed on an explicit connect", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(
        baseConfig,
        { ...options, maxAuthRejections: 1 },
        { secrets: plainSecrets, createTransport: factory }
      );

      connection.connect();
      await settle();
      last().open();
      await settle();
      last().receive({ type: "auth-error" });
      await settle();
      expect(connection.getSnapshot()).toMatchObject({ state: "failed", authRejections: 1 });

      connection.connect();
      await handshake(last);

      expect(connection.getSnapshot()).toMatchObject({ state: "connected", authRejections: 0 });
    });
  });

  describe("outbound queue", () => {
    it("delivers entries queued while disconnected in enqueue order", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "one" });
      connection.send("agent:b:1", { type: "message", channel: "agent:b:1", text: "two" });
      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "three" });
      expect(connection.getSnapshot().queueDepth).toBe(3);

      connection.connect();
      await handshake(last);

      expect(last().sent).toEqual([
        { type: "auth", token: "test-token" },
        { type: "message", channel: "agent:a:1", text: "one" },
        { type: "message", channel: "agent:b:1", text: "two" },
        { type: "message", channel: "agent:a:1", text: "three" },
      ]);
      expect(connection.getSnapshot().queueDepth).toBe(0);
    });

    it("drops the oldest entry on overflow and reports its session", () => {
      const connection = new GatewayConnection(
        baseConfig,
        { ...options, queueCapacity: 2 },
        { secrets: plainSecrets, createTransport: createFactory().factory }
      );
      const overflow = vi.fn();
      connection.events.on("queueOverflow", overflow);

      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "one" });
      connection.send("agent:b:1", { type: "message", channel: "agent:b:1", text: "two" });
      connection.send("agent:c:1", { type: "message", channel: "agent:c:1", text: "three" });

      expect(overflow).toHaveBeenCalledTimes(1);
      expect(overflow.mock.calls[0][0]).toBe("agent:a:1");
      expect(connection.getSnapshot().queueDepth).toBe(2);
    });

    it("does not evict the entry that is already being written", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(
        baseConfig,
        { ...options, queueCapacity: 2 },
        { secrets: plainSecrets, createTransport: factory }
      );
      const overflow = vi.fn();
      connection.events.on("queueOverflow", overflow);
      connection.connect();
      await handshake(last);

      last().holdWrites = true;
      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "one" });
      connection.send("agent:b:1", { type: "message", channel: "agent:b:1", text: "two" });
      connection.send("agent:c:1", { type: "message", channel: "agent:c:1", text: "three" });

      expect(overflow).toHaveBeenCalledTimes(1);
      expect(overflow.mock.calls[0][0]).toBe("agent:b:1");

      last().releaseWrites();
      await settle();

      expect(last().sent).toEqual([
        { type: "auth", token: "test-token" },
        { type: "message", channel: "agent:a:1", text: "one" },
        { type: "message", channel: "agent:c:1", text: "three" },
      ]);
      expect(connection.getSnapshot().queueDepth).toBe(0);
    });

    it("writes immediately while connected", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "now" });
      await settle();

      expect(last().sent[1]).toEqual({ type: "message", channel: "agent:a:1", text: "now" });
    });

    it("keeps an entry whose write failed and reconnects", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      last().failWrites = true;
      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "retry me" });
      await settle();

      expect(connection.getSnapshot()).toMatchObject({
        state: "reconnecting",
        queueDepth: 1,
        lastError: "Failed to write message frame: write after end",
      });
      await vi.advanceTimersByTimeAsync(100);
      expect(transports).toHaveLength(2);
      await handshake(last);
      expect(last().sent[1]).toEqual({ type: "message", channel: "agent:a:1", text: "retry me" });
    });

    it("keeps queued entries across a reconnect", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      last().close(1006, "");
      await settle();
      expect(connection.getSnapshot()).toMatchObject({
        state: "reconnecting",
        lastError: "Gateway connection closed (1006)",
      });

      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "later" });
      await vi.advanceTimersByTimeAsync(100);
      expect(transports).toHaveLength(2);
      await handshake(last);

      expect(last().sent).toEqual([
        { type: "auth", token: "test-token" },
        { type: "message", channel: "agent:a:1", text: "later" },
      ]);
    });
  });

  describe("heartbeat", () => {
    it("reconnects after the configured number of missed pongs", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      await vi.advanceTimersByTimeAsync(2000);
      expect(last().types()).toEqual(["auth", "ping", "ping"]);
      expect(connection.getSnapshot().state).toBe("connected");

      await vi.advanceTimersByTimeAsync(1000);
      expect(connection.getSnapshot()).toMatchObject({
        state: "reconnecting",
        lastError: "Heartbeat timed out after 2 missed pongs",
      });
    });

    it("stays connected while pongs arrive", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      for (let i = 0; i < 5; i += 1) {
        await vi.advanceTimersByTimeAsync(1000);
        last().receive({ type: "pong" });
      }

      expect(connection.getSnapshot().state).toBe("connected");
    });

    it("answers a gateway ping with a pong", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      last().receive({ type: "ping" });
      await settle();

      expect(last().types()).toEqual(["auth", "pong"]);
    });
  });

  describe("reconnect policy", () => {
    it("fails after exceeding the reconnect attempt limit", async () => {
      const { factory } = createFactory();
      const connection = new GatewayConnection(
        baseConfig,
        { ...options, maxReconnectAttempts: 1 },
        { secrets: plainSecrets, createTransport: factory }
      );

      connection.connect();
      await vi.advanceTimersByTimeAsync(500);
      expect(connection.getSnapshot().state).toBe("reconnecting");

      await vi.advanceTimersByTimeAsync(100 + 500);
      expect(connection.getSnapshot()).toMatchObject({ state: "failed", reconnectAttempts: 2 });
    });

    it("doubles the delay between consecutive failures", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.connect();
      await settle();
      last().fail(Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" }));
      await settle();
      expect(connection.getSnapshot().lastError).toBe(
        "Connection refused by ws://127.0.0.1:18789: is the Gateway running on that port?"
      );

      await vi.advanceTimersByTimeAsync(100);
      expect(transports).toHaveLength(2);
      last().fail(new Error("socket hang up"));
      await settle();

      await vi.advanceTimersByTimeAsync(199);
      expect(transports).toHaveLength(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(transports).toHaveLength(3);
    });

    it("resets the attempt counter after a stable connection", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(
        baseConfig,
        { ...options, heartbeatIntervalMs: 100000, stableAfterMs: 5000 },
        { secrets: plainSecrets, createTransport: factory }
      );

      connection.connect();
      await settle();
      last().fail(new Error("socket hang up"));
      await vi.advanceTimersByTimeAsync(100);
      await handshake(last);
      expect(connection.getSnapshot().reconnectAttempts).toBe(1);

      await vi.advanceTimersByTimeAsync(5000);
      expect(connection.getSnapshot().reconnectAttempts).toBe(0);
    });
  });

  describe("disconnect", () => {
    it("cancels an attempt in progress and closes the socket gracefully", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.connect();
      await settle();
      await connection.disconnect();

      expect(connection.getSnapshot().state).toBe("disconnected");
      expect(last().disposed).toBe(true);
      await vi.advanceTimersByTimeAsync(10000);
      expect(transports).toHaveLength(1);
    });

    it("cancels a pending backoff timer", async () => {
      const { factory, transports, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.connect();
      await settle();
      last().fail(new Error("socket hang up"));
      await settle();
      expect(connection.getSnapshot().state).toBe("reconnecting");

      await connection.disconnect();
      await vi.advanceTimersByTimeAsync(10000);

      expect(transports).toHaveLength(1);
      expect(connection.getSnapshot().state).toBe("disconnected");
    });

    it("keeps queued entries for the next connect", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.send("agent:a:1", { type: "message", channel: "agent:a:1", text: "kept" });

      connection.connect();
      await settle();
      await connection.disconnect();
      expect(connection.getSnapshot().queueDepth).toBe(1);

      connection.connect();
      await handshake(last);
      expect(last().sent[1]).toEqual({ type: "message", channel: "agent:a:1", text: "kept" });
    });
  });

  describe("tunnel lifecycle", () => {
    function createTunnels(calls: string[]) {
      return {
        open: vi.fn(async (_config: TunnelConfig) => {
          calls.push("tunnel.open");
          return { host: "127.0.0.1", port: 40001 };
        }),
        close: vi.fn(async () => {
          calls.push("tunnel.close");
        }),
      };
    }

    const tunnelConfig: ConnectionConfig = {
      ...baseConfig,
      endpointURL: "ws://gateway.test:18789",
      tunnel: {
        sshUser: "deploy",
        sshHost: "gateway.test",
        sshPort: 22,
        sshAuth: { method: "password", password: "test-secret" },
        localPort: 18789,
        remoteHost: "127.0.0.1",
        remotePort: 18789,
      },
    };

    it("opens the tunnel before dialing and closes it once after disconnect", async () => {
      const calls: string[] = [];
      const tunnels = createTunnels(calls);
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport: (url) => {
          calls.push(`dial ${url}`);
          return new FakeTransport(url);
        },
      });

      connection.connect();
      await settle();

      expect(calls).toEqual(["tunnel.open", "dial ws://127.0.0.1:40001/"]);
      await connection.disconnect();
      expect(calls).toEqual(["tunnel.open", "dial ws://127.0.0.1:40001/", "tunnel.close"]);
      expect(tunnels.close).toHaveBeenCalledTimes(1);
    });

    it("waits for the socket to close before closing the tunnel", async () => {
      const calls: string[] = [];
      const tunnels = createTunnels(calls);
      let releaseSocket: () => void = () => undefined;
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport: (url) => {
          const transport = new FakeTransport(url);
          transport.disposal = new Promise<void>((resolve) => {
            releaseSocket = () => {
              calls.push("socket.closed");
              resolve();
            };
          });
          return transport;
        },
      });

      connection.connect();
      await settle();
      const disconnected = connection.disconnect();
      await settle();
      expect(calls).toEqual(["tunnel.open"]);

      releaseSocket();
      await disconnected;
      expect(calls).toEqual(["tunnel.open", "socket.closed", "tunnel.close"]);
    });

    it("interrupts a tunnel that is still opening", async () => {
      let finishOpen: () => void = () => undefined;
      const tunnels: TunnelOpener = {
        open: vi.fn(
          () =>
            new Promise<{ host: string; port: number }>((resolve) => {
              finishOpen = () => resolve({ host: "127.0.0.1", port: 40001 });
            })
        ),
        close: vi.fn(async () => undefined),
      };
      const createTransport = vi.fn();
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport,
      });

      connection.connect();
      await settle();
      expect(connection.getSnapshot().state).toBe("connecting");

      const disconnected = connection.disconnect();
      expect(connection.getSnapshot().state).toBe("disconnected");
      finishOpen();
      await disconnected;
      await vi.advanceTimersByTimeAsync(10000);

      expect(createTransport).not.toHaveBeenCalled();
      expect(tunnels.open).toHaveBeenCalledTimes(1);
      expect(tunnels.close).toHaveBeenCalledTimes(1);
      expect(connection.getSnapshot().state).toBe("disconnected");
    });

    it("closes the tunnel after the socket fails and reopens it on retry", async () => {
      const calls: string[] = [];
      const tunnels = createTunnels(calls);
      const transports: FakeTransport[] = [];
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport: (url) => {
          const transport = new FakeTransport(url);
          transports.push(transport);
          calls.push("dial");
          return transport;
        },
      });

      connection.connect();
      await settle();
      transports[0].fail(new Error("socket hang up"));
      await settle();
      await vi.advanceTimersByTimeAsync(100);

      expect(calls).toEqual(["tunnel.open", "dial", "tunnel.close", "tunnel.open", "dial"]);
      await connection.disconnect();
      expect(tunnels.open).toHaveBeenCalledTimes(2);
      expect(tunnels.close).toHaveBeenCalledTimes(2);
    });

    it("fails without retrying on an ssh credential error", async () => {
      const tunnels: TunnelOpener = {
        open: vi.fn(async () => {
          throw new TunnelError("SSH authentication failed for deploy@gateway.test", "auth");
        }),
        close: vi.fn(async () => undefined),
      };
      const createTransport = vi.fn();
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport,
      });

      connection.connect();
      await settle();

      expect(connection.getSnapshot()).toMatchObject({
        state: "failed",
        lastError: "SSH authentication failed for deploy@gateway.test",
      });
      expect(createTransport).not.toHaveBeenCalled();
      expect(tunnels.close).not.toHaveBeenCalled();
    });

    it("retries when the tunnel host is unreachable", async () => {
      const tunnels: TunnelOpener = {
        open: vi.fn(async () => {
          throw new TunnelError("SSH connection to gateway.test failed: timeout", "network");
        }),
        close: vi.fn(async () => undefined),
      };
      const connection = new GatewayConnection(tunnelConfig, options, {
        secrets: plainSecrets,
        tunnels,
        createTransport: vi.fn(),
      });

      connection.connect();
      await settle();

      expect(connection.getSnapshot().state).toBe("reconnecting");
      await connection.disconnect();
    });

    it("rewrites the endpoint host and port", () => {
      expect(tunneledEndpoint("wss://gateway.test:18789/ws", { host: "127.0.0.1", port: 5000 })).toBe(
        "wss://127.0.0.1:5000/ws"
      );
    });
  });

  describe("secrets", () => {
    it("fails and reports when the credential cannot be decrypted", async () => {
      const { factory, last } = createFactory();
      const secretUnavailable = vi.fn();
      const connection = new GatewayConnection(
        { ...baseConfig, credential: { kind: "token", stored: "enc:00:00:00" } },
        options,
        {
          secrets: {
            reveal: () => {
              throw new KeyMissingError("/tmp/.gateway_key");
            },
          },
          createTransport: factory,
        }
      );
      connection.events.on("secretUnavailable", secretUnavailable);

      connection.connect();
      await settle();
      last().open();
      await settle();

      expect(connection.getSnapshot().state).toBe("failed");
      expect(secretUnavailable).toHaveBeenCalledWith(expect.any(KeyMissingError));
      expect(last().sent).toEqual([]);
    });
  });

  describe("requests", () => {
    it("resolves a request with the matching response payload", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last, { features: { methods: ["chat.history"] } });

      const response = connection.request("chat.history", { sessionKey: "agent:main:x" });
      await settle();
      expect(last().sent[1]).toEqual({
        type: "req",
        id: "req_1",
        method: "chat.history",
        params: { sessionKey: "agent:main:x" },
      });
      last().receive({ type: "res", id: "req_1", ok: true, payload: { messages: [] } });

      await expect(response).resolves.toEqual({ messages: [] });
      expect(connection.supportsMethod("chat.history")).toBe(true);
      expect(connection.supportsMethod("sessions.delete")).toBe(false);
    });

    it("rejects with the gateway error message", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      const response = connection.request("chat.abort");
      await settle();
      last().receive({
        type: "res",
        id: "req_1",
        ok: false,
        error: { message: "no active run", code: "NOT_FOUND" },
      });

      await expect(response).rejects.toBeInstanceOf(GatewayRequestError);
      await expect(response).rejects.toMatchObject({
        message: "no active run",
        code: "REQUEST",
        method: "chat.abort",
        gatewayCode: "NOT_FOUND",
      });
    });

    it("rejects pending requests when the connection drops", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      const response = connection.request("chat.history");
      const assertion = expect(response).rejects.toThrow("Gateway connection closed");
      await settle();
      last().close();
      await assertion;
    });

    it("times out a request without a response", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      connection.connect();
      await handshake(last);

      const response = connection.request("chat.history");
      const assertion = expect(response).rejects.toThrow("Gateway request timeout: chat.history");
      await vi.advanceTimersByTimeAsync(500);
      await assertion;
    });

    it("refuses requests while not connected", async () => {
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: createFactory().factory,
      });

      await expect(connection.request("chat.history")).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe("inbound frames", () => {
    it("emits stream frames and shutdown notices while connected", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      const frames = vi.fn();
      const shutdown = vi.fn();
      connection.events.on("streamFrame", frames);
      connection.events.on("gatewayShutdown", shutdown);
      connection.connect();
      await handshake(last);

      last().receive({ type: "delta", channel: "agent:main:x", kind: "content", text: "hi", seq: 1 });
      last().receive({ type: "end", channel: "agent:main:x", seq: 2 });
      last().receive({ type: "shutdown", reason: "restart" });

      expect(frames.mock.calls).toEqual([
        [{ type: "delta", channel: "agent:main:x", kind: "content", text: "hi", seq: 1 }],
        [{ type: "end", channel: "agent:main:x", seq: 2 }],
      ]);
      expect(shutdown).toHaveBeenCalledWith({ type: "shutdown", reason: "restart" });
    });

    it("skips malformed frames and keeps the connection", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });
      const frames = vi.fn();
      connection.events.on("streamFrame", frames);
      connection.connect();
      await handshake(last);

      last().receive({ type: "delta", channel: "agent:main:x" });
      last().receive({ type: "presence", entries: [] });
      last().receive({ type: "delta", channel: "agent:main:x", kind: "content", text: "ok", seq: 1 });

      expect(connection.getSnapshot().state).toBe("connected");
      expect(frames).toHaveBeenCalledTimes(1);
    });
  });

  describe("start/stop", () => {
    it("connects on start only when autoConnect is set", async () => {
      const manual = createFactory();
      const manualConnection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: manual.factory,
      });
      manualConnection.start();
      await settle();
      expect(manual.transports).toHaveLength(0);

      const auto = createFactory();
      const autoConnection = new GatewayConnection({ ...baseConfig, autoConnect: true }, options, {
        secrets: plainSecrets,
        createTransport: auto.factory,
      });
      autoConnection.start();
      await settle();
      expect(auto.transports).toHaveLength(1);

      await autoConnection.stop();
      expect(autoConnection.getSnapshot().state).toBe("disconnected");
    });

    it("applies an updated config on the next attempt", async () => {
      const { factory, last } = createFactory();
      const connection = new GatewayConnection(baseConfig, options, {
        secrets: plainSecrets,
        createTransport: factory,
      });

      connection.updateConfig({ ...baseConfig, endpointURL: "ws://127.0.0.1:19000" });
      connection.connect();
      await settle();

      expect(last().url).toBe("ws://127.0.0.1:19000");
    });
  });
});

describe("GatewayConnection over ws", () => {
  let server: WebSocketServer | null = null;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    const current = server;
    server = null;
    if (current) {
      for (const client of current.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  it("authenticates against a real websocket server", async () => {
    const received: unknown[] = [];
    const sockets: WebSocket[] = [];
    const wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    server = wss;
    await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
    wss.on("connection", (socket) => {
      sockets.push(socket);
      socket.on("message", (data) => {
        const frame = JSON.parse(data.toString());
        received.push(frame);
        if (frame.type === "auth") {
          socket.send(JSON.stringify({ type: "hello-ok" }));
        }
      });
    });
    const address = wss.address();
    const port = typeof address === "string" ? 0 : address.port;

    const connection = new GatewayConnection(
      { ...baseConfig, endpointURL: `ws://127.0.0.1:${port}` },
      { ...options, connectTimeoutMs: 2000, authTimeoutMs: 2000, heartbeatIntervalMs: 60000 },
      { secrets: plainSecrets }
    );
    const connected = new Promise<void>((resolve) => {
      connection.events.on("connectionStateChanged", (snapshot) => {
        if (snapshot.state === "connected") {
          resolve();
        }
      });
    });
    connection.send("agent:main:x", { type: "message", channel: "agent:main:x", text: "hello" });

    connection.connect();
    await connected;
    await vi.waitFor(() => {
      expect(received).toEqual([
        { type: "auth", token: "test-token" },
        { type: "message", channel: "agent:main:x", text: "hello" },
      ]);
    });

    await connection.disconnect();
    expect(connection.getSnapshot().state).toBe("disconnected");
    // The close handshake has reached the server by the time disconnect resolves.
    expect(sockets).toHaveLength(1);
    expect(sockets[0].readyState).toBeGreaterThanOrEqual(WebSocket.CLOSING);
  });
});
