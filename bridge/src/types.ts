export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "connected"
  | "reconnecting"
  | "failed";

export type CredentialKind = "token" | "password";

/**
 * Credential as persisted. `stored` is either legacy plaintext or a value
 * carrying the `enc:` marker; the plaintext is only produced while
 * authenticating.
 */
export type Credential = {
  kind: CredentialKind;
  stored: string;
};

/** `password` is kept in its stored form, like Credential.stored. */
export type SshAuth =
  | { method: "password"; password: string }
  | { method: "privateKey"; privateKey: string; passphrase?: string }
  | { method: "agent"; agentSocket?: string };

export type TunnelConfig = {
  sshUser: string;
  sshHost: string;
  sshPort: number;
  sshAuth: SshAuth;
  localPort: number;
  remoteHost: string;
  remotePort: number;
};

export type TunnelEndpoint = {
  host: string;
  port: number;
};

export type ConnectionConfig = {
  endpointURL: string;
  credential: Credential;
  autoConnect: boolean;
  tunnel?: TunnelConfig;
};

export type BridgeOptions = {
  connectTimeoutMs: number;
  authTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatMissThreshold: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  jitterRatio: number;
  maxReconnectAttempts: number;
  maxAuthRejections: number;
  queueCapacity: number;
  stableAfterMs: number;
  requestTimeoutMs: number;
};

export type ConnectionSnapshot = {
  state: ConnectionState;
  endpoint: string | null;
  reconnectAttempts: number;
  authRejections: number;
  queueDepth: number;
  lastConnectedAt?: string;
  lastDisconnectedAt?: string;
  lastError?: string;
};

// Wire frames

export type AuthFrame = {
  type: "auth";
  token?: string;
  password?: string;
};

export type UserMessageFrame = {
  type: "message";
  channel: string;
  text: string;
};

export type PingFrame = { type: "ping" };

export type PongFrame = { type: "pong" };

export type RequestFrame = {
  type: "req";
  id: string;
  method: string;
  params: Record<string, unknown>;
};

export type OutboundFrame =
  | AuthFrame
  | UserMessageFrame
  | PingFrame
  | PongFrame
  | RequestFrame;

export type FragmentKind = "content" | "thinking";

export type DeltaFrame = {
  type: "delta";
  channel: string;
  kind: FragmentKind;
  text: string;
  seq: number;
};

export type EndFrame = {
  type: "end";
  channel: string;
  seq: number;
};

export type HelloOkFrame = {
  type: "hello-ok";
  features?: {
    methods?: string[];
    events?: string[];
  };
};

export type AuthErrorFrame = {
  type: "auth-error";
  message?: string;
};

export type ResponseFrame = {
  type: "res";
  id: string;
  ok: boolean;
  payload?: unknown;
  error?: {
    message?: string;
    code?: string | number;
  };
};

export type ShutdownFrame = {
  type: "shutdown";
  reason?: string;
  restartExpectedMs?: number;
};

export type UnknownFrame = {
  type: "unknown";
  rawType: string;
};

export type StreamFrame = DeltaFrame | EndFrame;

export type InboundFrame =
  | DeltaFrame
  | EndFrame
  | HelloOkFrame
  | AuthErrorFrame
  | ResponseFrame
  | ShutdownFrame
  | PingFrame
  | PongFrame
  | UnknownFrame;

// Sessions

export type MessageRole = "user" | "assistant";

export type Message = {
  readonly role: MessageRole;
  readonly contentSoFar: string;
  readonly thinkingSoFar?: string;
  readonly complete: boolean;
  readonly sequenceIndex: number;
};

export type Fragment = {
  kind: FragmentKind | "end";
  delta: string;
  sequenceIndex: number;
};

export type Session = {
  readonly id: string;
  readonly botId: string;
  readonly messages: readonly Message[];
  readonly createdAt: string;
};

export type OutboundQueueEntry = {
  sessionId: string;
  payload: OutboundFrame;
  enqueuedAt: number;
};

// Events

export type AuthRejection = {
  attempt: number;
  final: boolean;
  reason: string;
};

export type ConnectionEvents = {
  connectionStateChanged: [snapshot: ConnectionSnapshot, previous: ConnectionState];
  authRejected: [rejection: AuthRejection];
  queueOverflow: [sessionId: string, dropped: OutboundQueueEntry];
  streamFrame: [frame: StreamFrame];
  hello: [frame: HelloOkFrame];
  gatewayShutdown: [frame: ShutdownFrame];
  secretUnavailable: [error: Error];
};

export type SessionEvents = {
  sessionCreated: [session: Session];
  sessionDeleted: [sessionId: string];
  activeSessionChanged: [sessionId: string | null];
  sessionMessageUpdated: [sessionId: string, message: Message];
  sessionMessageCompleted: [sessionId: string, message: Message];
};

export type BridgeEvents = {
  connectionStateChanged: ConnectionEvents["connectionStateChanged"];
  authRejected: ConnectionEvents["authRejected"];
  queueOverflow: [sessionId: string];
  gatewayShutdown: ConnectionEvents["gatewayShutdown"];
  secretUnavailable: ConnectionEvents["secretUnavailable"];
  sessionMessageUpdated: SessionEvents["sessionMessageUpdated"];
  sessionMessageCompleted: SessionEvents["sessionMessageCompleted"];
};
