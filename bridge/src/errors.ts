export type BridgeErrorCode =
  | "TRANSPORT"
  | "AUTH"
  | "TUNNEL"
  | "DECRYPT_FAILURE"
  | "KEY_MISSING"
  | "PROTOCOL_DECODE"
  | "QUEUE_OVERFLOW"
  | "REQUEST";

export class GatewayBridgeError extends Error {
  constructor(
    message: string,
    readonly code: BridgeErrorCode,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = "GatewayBridgeError";
  }
}

export class TransportError extends GatewayBridgeError {
  constructor(message: string) {
    super(message, "TRANSPORT", true);
    this.name = "TransportError";
  }
}

export class AuthError extends GatewayBridgeError {
  constructor(message: string) {
    super(message, "AUTH", true);
    this.name = "AuthError";
  }
}

export type TunnelErrorKind = "auth" | "network" | "port-in-use";

export class TunnelError extends GatewayBridgeError {
  constructor(
    message: string,
    readonly kind: TunnelErrorKind
  ) {
    // Bad SSH credentials are never retried automatically.
    super(message, "TUNNEL", kind !== "auth");
    this.name = "TunnelError";
  }
}

export class DecryptFailureError extends GatewayBridgeError {
  constructor(message: string) {
    super(message, "DECRYPT_FAILURE", false);
    this.name = "DecryptFailureError";
  }
}

export class KeyMissingError extends GatewayBridgeError {
  constructor(readonly keyPath: string) {
    super(`Encryption key file not found: ${keyPath}`, "KEY_MISSING", false);
    this.name = "KeyMissingError";
  }
}

export class ProtocolDecodeError extends GatewayBridgeError {
  constructor(
    message: string,
    readonly rawType?: string
  ) {
    super(message, "PROTOCOL_DECODE", true);
    this.name = "ProtocolDecodeError";
  }
}

export class QueueOverflowError extends GatewayBridgeError {
  constructor(readonly sessionId: string) {
    super(`Outbound queue full; dropped oldest entry for ${sessionId}`, "QUEUE_OVERFLOW", true);
    this.name = "QueueOverflowError";
  }
}

/** A `res` frame with `ok: false`. `gatewayCode` is whatever code the Gateway attached. */
export class GatewayRequestError extends GatewayBridgeError {
  constructor(
    message: string,
    readonly method: string,
    readonly gatewayCode?: string | number
  ) {
    super(message, "REQUEST", false);
    this.name = "GatewayRequestError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Turns low-level socket failures into a line a user can act on.
 */
export function describeConnectionError(error: unknown, endpoint: string): string {
  const err = toError(error);
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  switch (code) {
    case "ECONNREFUSED":
      return `Connection refused by ${endpoint}: is the Gateway running on that port?`;
    case "ECONNRESET":
      return `Connection to ${endpoint} was reset: check the address and that the Gateway is up`;
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return `Could not resolve the Gateway host in ${endpoint}`;
    case "ETIMEDOUT":
      return `Timed out reaching ${endpoint}`;
    default:
      break;
  }
  if (/Unexpected server response/i.test(err.message)) {
    return `${endpoint} did not answer as a WebSocket server (${err.message})`;
  }
  return err.message;
}
