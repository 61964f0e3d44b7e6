import { computeBackoffDelay } from "./backoff";
import {
  AuthError,
  DecryptFailureError,
  GatewayRequestError,
  KeyMissingError,
  QueueOverflowError,
  TransportError,
  TunnelError,
  describeConnectionError,
  toError,
} from "./errors";
import { EventChannel } from "./event-channel";
import { decodeFrame, encodeFrame, type RawFrame } from "./message-codec";
import { OutboundQueue } from "./outbound-queue";
import { createWebSocketTransport, type GatewayTransport, type TransportFactory } from "./transport";
import type {
  AuthFrame,
  BridgeOptions,
  ConnectionConfig,
  ConnectionEvents,
  ConnectionSnapshot,
  ConnectionState,
  Credential,
  HelloOkFrame,
  OutboundFrame,
  OutboundQueueEntry,
  ResponseFrame,
  TunnelConfig,
  TunnelEndpoint,
} from "./types";

export type CredentialRevealer = {
  reveal(stored: string): string;
};

export type TunnelOpener = {
  open(config: TunnelConfig): Promise<TunnelEndpoint>;
  close(): Promise<void>;
};

export type GatewayConnectionDeps = {
  secrets: CredentialRevealer;
  tunnels?: TunnelOpener;
  createTransport?: TransportFactory;
  random?: () => number;
};

type PendingRequest = {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
};

type Waiter<T> = {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
};

class AttemptCancelledError extends Error {
  constructor() {
    super("Connection attempt cancelled");
    this.name = "AttemptCancelledError";
  }
}

function waitWithin<T>(
  signal: AbortSignal,
  timeoutMs: number | null,
  onTimeout: () => Error,
  bind: (waiter: Waiter<T> | null) => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new AttemptCancelledError());
      return;
    }
    let timer: NodeJS.Timeout | null = null;
    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      signal.removeEventListener("abort", onAbort);
      bind(null);
    };
    const onAbort = (): void => {
      cleanup();
      reject(new AttemptCancelledError());
    };
    signal.addEventListener("abort", onAbort, { once: true });
    if (timeoutMs !== null) {
      timer = setTimeout(() => {
        cleanup();
        reject(onTimeout());
      }, timeoutMs);
    }
    bind({
      resolve: (value) => {
        cleanup();
        resolve(value);
      },
      reject: (error) => {
        cleanup();
        reject(error);
      },
    });
  });
}

export function tunneledEndpoint(endpointURL: string, endpoint: TunnelEndpoint): string {
  const url = new URL(endpointURL);
  url.hostname = endpoint.host;
  url.port = String(endpoint.port);
  return url.toString();
}

function buildAuthFrame(credential: Credential, secret: string): AuthFrame {
  return credential.kind === "token"
    ? { type: "auth", token: secret }
    : { type: "auth", password: secret };
}

/**
 * Sole owner of the Gateway socket and of ConnectionState. One attempt runs
 * at a time: tunnel, dial, authenticate, serve, then tear down in reverse
 * order. Other components read state through getSnapshot() and events.
 */
export class GatewayConnection {
  readonly events = new EventChannel<ConnectionEvents>("gateway");

  private config: ConnectionConfig;
  private state: ConnectionState = "disconnected";
  private transport: GatewayTransport | null = null;
  private activeEndpoint: string | null = null;
  private hello: HelloOkFrame | null = null;
  private readonly queue: OutboundQueue;
  private flushing = false;
  private inFlight: OutboundQueueEntry | null = null;

  private attemptController: AbortController | null = null;
  private attemptTask: Promise<void> | null = null;
  private backoffTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private stableTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private missedPongs = 0;

  private dialWaiter: Waiter<void> | null = null;
  private authWaiter: Waiter<HelloOkFrame> | null = null;
  private lossWaiter: Waiter<void> | null = null;

  private reconnectAttempts = 0;
  private authRejections = 0;
  private requestId = 0;
  private readonly pending = new Map<string, PendingRequest>();
  private lastConnectedAt: string | null = null;
  private lastDisconnectedAt: string | null = null;
  private lastError: string | null = null;
  private started = false;

  private readonly secrets: CredentialRevealer;
  private readonly tunnels: TunnelOpener | null;
  private readonly createTransport: TransportFactory;
  private readonly random: () => number;

  constructor(
    config: ConnectionConfig,
    private readonly options: BridgeOptions,
    deps: GatewayConnectionDeps
  ) {
    this.config = Object.freeze({ ...config });
    this.queue = new OutboundQueue(options.queueCapacity);
    this.secrets = deps.secrets;
    this.tunnels = deps.tunnels ?? null;
    this.createTransport = deps.createTransport ?? createWebSocketTransport;
    this.random = deps.random ?? Math.random;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    if (this.config.autoConnect) {
      this.connect();
    }
  }

  async stop(): Promise<void> {
    this.started = false;
    await this.disconnect();
  }

  /** Takes effect on the next connection attempt. */
  updateConfig(config: ConnectionConfig): void {
    if (config.tunnel && !this.tunnels) {
      throw new Error("Tunnel configured but no tunnel manager was provided");
    }
    this.config = Object.freeze({ ...config });
  }

  connect(): void {
    switch (this.state) {
      case "connecting":
      case "authenticating":
      case "connected":
        return;
      case "reconnecting":
        this.clearBackoff();
        break;
      case "disconnected":
      case "failed":
        this.reconnectAttempts = 0;
        this.authRejections = 0;
        break;
    }
    this.startAttempt();
  }

  /**
   * Cancels whatever is in progress. Resolves once the socket and then the
   * tunnel are closed. Queued entries are kept for the next connect.
   */
  async disconnect(): Promise<void> {
    this.clearBackoff();
    this.attemptController?.abort();
    this.attemptController = null;
    const task = this.attemptTask;
    if (this.state !== "disconnected") {
      this.lastDisconnectedAt = new Date().toISOString();
      this.setState("disconnected");
    }
    if (task) {
      await task;
    }
  }

  getSnapshot(): ConnectionSnapshot {
    return Object.freeze({
      state: this.state,
      endpoint: this.activeEndpoint,
      reconnectAttempts: this.reconnectAttempts,
      authRejections: this.authRejections,
      queueDepth: this.queue.size(),
      lastConnectedAt: this.lastConnectedAt ?? undefined,
      lastDisconnectedAt: this.lastDisconnectedAt ?? undefined,
      lastError: this.lastError ?? undefined,
    });
  }

  getHello(): HelloOkFrame | null {
    return this.hello;
  }

  supportsMethod(method: string): boolean {
    const methods = this.hello?.features?.methods;
    return Array.isArray(methods) && methods.includes(method);
  }

  /**
   * Best-effort ordered delivery. Entries wait in the bounded queue until
   * the connection is up; on overflow the oldest entry not already being
   * written is dropped.
   */
  send(sessionId: string, payload: OutboundFrame): void {
    const dropped = this.queue.enqueue({ sessionId, payload, enqueuedAt: Date.now() }, this.inFlight);
    if (dropped) {
      console.warn(`[gateway] ${new QueueOverflowError(dropped.sessionId).message}`);
      this.events.emit("queueOverflow", dropped.sessionId, dropped);
    }
    if (this.state === "connected") {
      void this.flushQueue();
    }
  }

  async request(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    const transport = this.transport;
    if (this.state !== "connected" || !transport) {
      throw new TransportError("Gateway socket is not connected");
    }

    const id = `req_${++this.requestId}`;
    const response = new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(id);
        reject(new TransportError(`Gateway request timeout: ${method}`));
      }, this.options.requestTimeoutMs);
      this.pending.set(id, { method, resolve, reject, timeout });
    });

    try {
      await this.writeFrame(transport, { type: "req", id, method, params });
    } catch (error) {
      const pending = this.pending.get(id);
      if (pending) {
        clearTimeout(pending.timeout);
        this.pending.delete(id);
      }
      throw error;
    }
    return response;
  }

  private startAttempt(): void {
    const controller = new AbortController();
    this.attemptController = controller;
    this.setState("connecting");
    const previous = this.attemptTask ?? Promise.resolve();
    const task = previous.then(() => this.runAttempt(controller.signal));
    this.attemptTask = task;
    void task.then(() => {
      if (this.attemptTask === task) {
        this.attemptTask = null;
      }
    });
  }

  private async runAttempt(signal: AbortSignal): Promise<void> {
    const config = this.config;
    let tunnelOpened = false;
    let failure: Error = new TransportError("Connection lost");

    try {
      if (signal.aborted) {
        return;
      }
      let url = config.endpointURL;
      if (config.tunnel) {
        if (!this.tunnels) {
          throw new TunnelError("Tunnel configured but no tunnel manager was provided", "network");
        }
        const endpoint = await this.tunnels.open(config.tunnel);
        tunnelOpened = true;
        if (signal.aborted) {
          return;
        }
        url = tunneledEndpoint(url, endpoint);
      }
      this.activeEndpoint = url;

      const transport = await this.dial(url, signal);
      this.setState("authenticating");
      const hello = await this.authenticate(transport, config.credential, signal);
      this.onAuthenticated(hello);
      await waitWithin<void>(signal, null, () => new TransportError("unreachable"), (waiter) => {
        this.lossWaiter = waiter;
      });
    } catch (error) {
      failure = toError(error);
    } finally {
      // The tunnel carries the socket, so it goes only after the socket has closed.
      await this.releaseTransport();
      if (tunnelOpened && this.tunnels) {
        try {
          await this.tunnels.close();
        } catch (error) {
          console.error("[gateway] failed to close tunnel", error);
        }
      }
    }

    if (signal.aborted || failure instanceof AttemptCancelledError) {
      return;
    }
    this.afterFailure(failure);
  }

  private dial(url: string, signal: AbortSignal): Promise<GatewayTransport> {
    console.log(`[gateway] connecting to ${url}`);
    const transport = this.createTransport(url);
    this.transport = transport;

    transport.onOpen(() => {
      if (this.transport === transport) {
        this.dialWaiter?.resolve();
      }
    });
    transport.onMessage((data) => this.handleMessage(transport, data));
    transport.onError((error) => {
      if (this.transport !== transport) {
        return;
      }
      this.failActivePhase(new TransportError(describeConnectionError(error, url)));
    });
    transport.onClose((code, reason) => {
      if (this.transport !== transport) {
        return;
      }
      const detail = reason ? `${code} ${reason}` : String(code);
      this.failActivePhase(new TransportError(`Gateway connection closed (${detail})`));
    });

    return waitWithin<void>(
      signal,
      this.options.connectTimeoutMs,
      () => new TransportError(`Connect to ${url} timed out after ${this.options.connectTimeoutMs}ms`),
      (waiter) => {
        this.dialWaiter = waiter;
      }
    ).then(() => transport);
  }

  private async authenticate(
    transport: GatewayTransport,
    credential: Credential,
    signal: AbortSignal
  ): Promise<HelloOkFrame> {
    // Revealed here and dropped with this frame; never stored or logged.
    const secret = this.secrets.reveal(credential.stored);
    const ack = waitWithin<HelloOkFrame>(
      signal,
      this.options.authTimeoutMs,
      () => new TransportError(`No auth acknowledgement within ${this.options.authTimeoutMs}ms`),
      (waiter) => {
        this.authWaiter = waiter;
      }
    );
    const [hello] = await Promise.all([ack, this.writeFrame(transport, buildAuthFrame(credential, secret))]);
    return hello;
  }

  private onAuthenticated(hello: HelloOkFrame): void {
    this.hello = hello;
    this.authRejections = 0;
    this.lastError = null;
    this.lastConnectedAt = new Date().toISOString();
    this.setState("connected");
    this.events.emit("hello", hello);
    this.startHeartbeat();
    this.stableTimer = setTimeout(() => {
      this.stableTimer = null;
      this.reconnectAttempts = 0;
    }, this.options.stableAfterMs);
    void this.flushQueue();
  }

  private afterFailure(error: Error): void {
    this.lastError = error.message;
    this.lastDisconnectedAt = new Date().toISOString();

    if (error instanceof KeyMissingError || error instanceof DecryptFailureError) {
      console.error(`[gateway] credential unavailable: ${error.message}`);
      this.events.emit("secretUnavailable", error);
      this.setState("failed");
      return;
    }
    if (error instanceof TunnelError && !error.retryable) {
      console.error(`[gateway] ${error.message}; not retrying`);
      this.setState("failed");
      return;
    }
    if (error instanceof AuthError) {
      this.authRejections += 1;
      const final = this.authRejections >= this.options.maxAuthRejections;
      console.warn(
        `[gateway] authentication rejected (${this.authRejections}/${this.options.maxAuthRejections})`
      );
      this.events.emit("authRejected", {
        attempt: this.authRejections,
        final,
        reason: error.message,
      });
      if (final) {
        this.setState("failed");
        return;
      }
    }

    this.reconnectAttempts += 1;
    const maxAttempts = this.options.maxReconnectAttempts;
    if (maxAttempts > 0 && this.reconnectAttempts > maxAttempts) {
      console.error(`[gateway] max reconnect attempts exceeded (${maxAttempts})`);
      this.setState("failed");
      return;
    }

    const delay = computeBackoffDelay(
      {
        baseMs: this.options.reconnectBaseMs,
        maxMs: this.options.reconnectMaxMs,
        jitterRatio: this.options.jitterRatio,
      },
      this.reconnectAttempts - 1,
      this.random
    );
    this.setState("reconnecting");
    console.warn(`[gateway] ${error.message}; retrying in ${delay}ms (attempt ${this.reconnectAttempts})`);
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = null;
      if (this.state === "reconnecting") {
        this.startAttempt();
      }
    }, delay);
  }

  private failActivePhase(error: Error): void {
    const waiter = this.dialWaiter ?? this.authWaiter ?? this.lossWaiter;
    waiter?.reject(error);
  }

  private async releaseTransport(): Promise<void> {
    // An auth acknowledgement may still be awaited after its frame failed to write.
    const closed = new TransportError("Gateway connection closed");
    this.dialWaiter?.reject(closed);
    this.authWaiter?.reject(closed);
    this.lossWaiter?.reject(closed);
    this.stopHeartbeat();
    if (this.stableTimer) {
      clearTimeout(this.stableTimer);
      this.stableTimer = null;
    }
    const transport = this.transport;
    this.transport = null;
    this.hello = null;
    this.rejectPending(new TransportError("Gateway connection closed"));
    if (transport) {
      await transport.dispose(this.state === "disconnected");
    }
  }

  private rejectPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pending.clear();
  }

  private clearBackoff(): void {
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const transport = this.transport;
      if (!transport) {
        return;
      }
      if (this.awaitingPong) {
        this.missedPongs += 1;
        if (this.missedPongs >= this.options.heartbeatMissThreshold) {
          this.failActivePhase(
            new TransportError(`Heartbeat timed out after ${this.missedPongs} missed pongs`)
          );
          return;
        }
      }
      this.awaitingPong = true;
      this.writeFrame(transport, { type: "ping" }).catch((error: unknown) => {
        this.failActivePhase(toError(error));
      });
    }, this.options.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.awaitingPong = false;
    this.missedPongs = 0;
  }

  private writeFrame(transport: GatewayTransport, frame: OutboundFrame): Promise<void> {
    return new Promise((resolve, reject) => {
      transport.send(encodeFrame(frame), (error) => {
        if (error) {
          reject(new TransportError(`Failed to write ${frame.type} frame: ${error.message}`));
          return;
        }
        resolve();
      });
    });
  }

  private async flushQueue(): Promise<void> {
    if (this.flushing) {
      return;
    }
    this.flushing = true;
    try {
      while (this.state === "connected" && this.transport) {
        const entry = this.queue.peek();
        if (!entry) {
          break;
        }
        this.inFlight = entry;
        try {
          await this.writeFrame(this.transport, entry.payload);
        } catch (error) {
          this.failActivePhase(toError(error));
          break;
        } finally {
          this.inFlight = null;
        }
        this.queue.remove(entry);
      }
    } finally {
      this.flushing = false;
    }
  }

  private handleMessage(transport: GatewayTransport, data: RawFrame): void {
    if (this.transport !== transport) {
      return;
    }
    const decoded = decodeFrame(data);
    if (!decoded.ok) {
      console.warn(`[gateway] skipping frame: ${decoded.error.message}`);
      return;
    }

    const frame = decoded.frame;
    switch (frame.type) {
      case "hello-ok":
        if (this.authWaiter) {
          this.authWaiter.resolve(frame);
        } else {
          console.warn("[gateway] ignoring unexpected hello-ok");
        }
        return;
      case "auth-error":
        if (this.authWaiter) {
          this.authWaiter.reject(new AuthError(frame.message ?? "Authentication rejected"));
        } else {
          console.warn("[gateway] ignoring unexpected auth-error");
        }
        return;
      case "ping":
        this.writeFrame(transport, { type: "pong" }).catch((error: unknown) => {
          this.failActivePhase(toError(error));
        });
        return;
      case "pong":
        this.awaitingPong = false;
        this.missedPongs = 0;
        return;
      case "res":
        this.handleResponse(frame);
        return;
      case "delta":
      case "end":
        if (this.state !== "connected") {
          console.warn(`[gateway] dropping ${frame.type} frame received before authentication`);
          return;
        }
        this.events.emit("streamFrame", frame);
        return;
      case "shutdown":
        console.warn(
          `[gateway] gateway shutting down${frame.reason ? `: ${frame.reason}` : ""}`
        );
        this.events.emit("gatewayShutdown", frame);
        return;
      case "unknown":
        return;
    }
  }

  private handleResponse(frame: ResponseFrame): void {
    const pending = this.pending.get(frame.id);
    if (!pending) {
      return;
    }
    clearTimeout(pending.timeout);
    this.pending.delete(frame.id);
    if (frame.ok) {
      pending.resolve(frame.payload);
    } else {
      pending.reject(
        new GatewayRequestError(
          frame.error?.message ?? `Gateway error: ${pending.method}`,
          pending.method,
          frame.error?.code
        )
      );
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    if (next === "disconnected" || next === "failed") {
      this.activeEndpoint = null;
    }
    console.log(`[gateway] ${previous} -> ${next}`);
    this.events.emit("connectionStateChanged", this.getSnapshot(), previous);
  }
}
