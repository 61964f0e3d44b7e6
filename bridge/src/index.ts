import { DecryptFailureError, KeyMissingError } from "./errors";
import { EventChannel } from "./event-channel";
import { createBridgeStore, type BridgeStore } from "./bridge-store";
import { GatewayConnection } from "./gateway-connection";
import {
  abortChat,
  deleteRemoteSession,
  fetchChatHistory,
  fetchHealth,
  listSessions,
  METHOD_SESSIONS_DELETE,
  type GatewayAgent,
  type HistoryEntry,
  type RemoteSession,
} from "./gateway-methods";
import { SecretStore } from "./secret-store";
import { SessionPointerFile } from "./session-pointer";
import { SessionRegistry } from "./session-registry";
import {
  loadBridgeOptions,
  parseSettings,
  saveSettings,
  settingsPaths,
  toConnectionConfig,
  type GatewaySettings,
} from "./settings";
import type { TransportFactory } from "./transport";
import { TunnelManager, type SshSession } from "./tunnel-manager";
import type { BridgeEvents, BridgeOptions, ConnectionSnapshot, Message, Session } from "./types";

export type GatewayBridgeInit = {
  configDir: string;
  settings: GatewaySettings;
  options?: BridgeOptions;
  createTransport?: TransportFactory;
  createSshSession?: () => SshSession;
  readKeyFile?: (path: string) => string;
  random?: () => number;
};

/**
 * Wires SecretStore, TunnelManager, GatewayConnection and SessionRegistry
 * together and exposes the operations a client UI needs.
 */
export class GatewayBridge {
  readonly events = new EventChannel<BridgeEvents>("bridge");
  readonly store: BridgeStore = createBridgeStore();
  readonly secrets: SecretStore;
  readonly connection: GatewayConnection;
  readonly sessions: SessionRegistry;

  private settings: GatewaySettings;
  private readonly configDir: string;
  private readonly pointer: SessionPointerFile;
  private readonly readKeyFile?: (path: string) => string;
  private readonly unsubscribers: Array<() => void> = [];
  private started = false;
  // secretUnavailable goes out once until the credential works or is replaced.
  private secretReported = false;

  constructor(init: GatewayBridgeInit) {
    const paths = settingsPaths(init.configDir);
    this.configDir = init.configDir;
    this.settings = init.settings;
    this.readKeyFile = init.readKeyFile;
    this.secrets = new SecretStore(paths.keyFile);
    this.pointer = new SessionPointerFile(paths.pointerFile);

    const tunnels = new TunnelManager({
      createSession: init.createSshSession,
      revealPassword: (stored) => this.secrets.reveal(stored),
    });
    this.connection = new GatewayConnection(
      toConnectionConfig(init.settings, init.readKeyFile, init.configDir),
      init.options ?? loadBridgeOptions(),
      {
        secrets: this.secrets,
        tunnels,
        createTransport: init.createTransport,
        random: init.random,
      }
    );
    this.sessions = new SessionRegistry(this.connection);
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.wireEvents();
    this.checkSecrets();
    this.restorePointer();
    this.connection.start();
  }

  async stop(): Promise<void> {
    this.started = false;
    await this.connection.stop();
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  connect(): void {
    this.connection.connect();
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  getSnapshot(): ConnectionSnapshot {
    return this.connection.getSnapshot();
  }

  /**
   * Persists new settings; the connection picks them up on its next attempt.
   * Settings that cannot produce a connection config are rejected before
   * gateway.json is touched.
   */
  updateSettings(settings: GatewaySettings): void {
    const validated = parseSettings(settings);
    toConnectionConfig(validated, this.readKeyFile, this.configDir);
    const persisted = saveSettings(this.configDir, validated, this.secrets);
    this.connection.updateConfig(toConnectionConfig(persisted, this.readKeyFile, this.configDir));
    this.settings = persisted;
    this.secretReported = false;
  }

  getSettings(): GatewaySettings {
    return { ...this.settings };
  }

  createSession(botId: string): Session {
    const session = this.sessions.create(botId);
    this.pointer.write({ sessionId: session.id, botId });
    return session;
  }

  selectSession(sessionId: string): void {
    this.sessions.select(sessionId);
    const session = this.sessions.get(sessionId);
    if (session) {
      this.pointer.write({ sessionId, botId: session.botId });
    }
  }

  /**
   * Removes the session locally. With `remote`, the Gateway is asked to drop
   * it as well when it advertises support for that.
   */
  async deleteSession(sessionId: string, options: { remote?: boolean } = {}): Promise<boolean> {
    const removed = this.sessions.delete(sessionId);
    this.syncPointer();
    if (
      options.remote &&
      this.connection.getSnapshot().state === "connected" &&
      this.connection.supportsMethod(METHOD_SESSIONS_DELETE)
    ) {
      await deleteRemoteSession(this.connection, sessionId);
    }
    return removed;
  }

  sendMessage(sessionId: string, text: string): Message {
    return this.sessions.appendOutbound(sessionId, text);
  }

  fetchHistory(sessionId: string, limit?: number): Promise<HistoryEntry[]> {
    return fetchChatHistory(this.connection, sessionId, limit);
  }

  abort(sessionId: string, runId?: string): Promise<void> {
    return abortChat(this.connection, sessionId, runId);
  }

  /** Agents the Gateway knows about, each with its recent sessions. */
  fetchAgents(): Promise<GatewayAgent[]> {
    return fetchHealth(this.connection);
  }

  listRemoteSessions(limit?: number): Promise<RemoteSession[]> {
    return listSessions(this.connection, limit);
  }

  private wireEvents(): void {
    const { connection, sessions, store } = this;
    this.unsubscribers.push(
      connection.events.on("connectionStateChanged", (snapshot, previous) => {
        if (snapshot.state === "connected") {
          this.secretReported = false;
        }
        store.getState().setConnection(snapshot, previous);
        this.events.emit("connectionStateChanged", snapshot, previous);
      }),
      connection.events.on("authRejected", (rejection) => {
        this.events.emit("authRejected", rejection);
      }),
      connection.events.on("queueOverflow", (sessionId) => {
        store.getState().recordOverflow(sessionId);
        this.events.emit("queueOverflow", sessionId);
      }),
      connection.events.on("gatewayShutdown", (frame) => {
        store.getState().recordShutdown(frame.reason);
        this.events.emit("gatewayShutdown", frame);
      }),
      connection.events.on("secretUnavailable", (error) => {
        store.getState().setSecretUnavailable(true);
        this.reportSecretUnavailable(error);
      }),
      connection.events.on("streamFrame", (frame) => {
        sessions.routeInbound(frame);
      }),
      sessions.events.on("sessionCreated", (session) => {
        store.getState().upsertSession(session);
      }),
      sessions.events.on("sessionDeleted", (sessionId) => {
        store.getState().removeSession(sessionId);
      }),
      sessions.events.on("activeSessionChanged", (sessionId) => {
        store.getState().setActiveSession(sessionId);
      }),
      sessions.events.on("sessionMessageUpdated", (sessionId, message) => {
        store.getState().recordMessage(sessionId, message);
        this.events.emit("sessionMessageUpdated", sessionId, message);
      }),
      sessions.events.on("sessionMessageCompleted", (sessionId, message) => {
        store.getState().recordMessage(sessionId, message);
        this.events.emit("sessionMessageCompleted", sessionId, message);
      })
    );
  }

  private checkSecrets(): void {
    const probe = this.secrets.probe([
      this.settings.gateway_token,
      this.settings.gateway_password,
      this.settings.ssh_password,
    ]);
    if (probe.unreadable === 0) {
      return;
    }
    const error = probe.keyMissing
      ? new KeyMissingError(this.secrets.keyPath)
      : new DecryptFailureError(`${probe.unreadable} stored secret(s) cannot be decrypted`);
    this.store.getState().setSecretUnavailable(true);
    this.reportSecretUnavailable(error);
  }

  private reportSecretUnavailable(error: Error): void {
    if (this.secretReported) {
      return;
    }
    this.secretReported = true;
    this.events.emit("secretUnavailable", error);
  }

  private restorePointer(): void {
    const pointer = this.pointer.read();
    if (!pointer) {
      return;
    }
    try {
      this.sessions.restore(pointer.sessionId, pointer.botId);
    } catch (error) {
      console.warn("[bridge] could not restore current session", error);
      this.pointer.clear();
    }
  }

  private syncPointer(): void {
    const activeId = this.sessions.activeSessionId;
    const active = activeId ? this.sessions.get(activeId) : null;
    if (active) {
      this.pointer.write({ sessionId: active.id, botId: active.botId });
    } else {
      this.pointer.clear();
    }
  }
}

export { GatewayConnection } from "./gateway-connection";
export type { CredentialRevealer, GatewayConnectionDeps, TunnelOpener } from "./gateway-connection";
export { SessionRegistry, SessionInputError, createSessionId, isSessionId } from "./session-registry";
export { StreamAssembler } from "./stream-assembler";
export type { ApplyOutcome } from "./stream-assembler";
export { SecretStore, ENCRYPTED_MARKER } from "./secret-store";
export { TunnelManager, Ssh2Session } from "./tunnel-manager";
export type { SshSession, TunnelManagerOptions } from "./tunnel-manager";
export { decodeFrame, encodeFrame } from "./message-codec";
export type { DecodeResult, RawFrame } from "./message-codec";
export { createWebSocketTransport } from "./transport";
export type { GatewayTransport, TransportFactory } from "./transport";
export { EventChannel } from "./event-channel";
export { computeBackoffDelay } from "./backoff";
export { createBridgeStore } from "./bridge-store";
export type { BridgeState, BridgeStore, SessionSummary } from "./bridge-store";
export * from "./errors";
export * from "./settings";
export * from "./gateway-methods";
export type * from "./types";
