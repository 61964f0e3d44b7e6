import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { SecretStore } from "./secret-store";
import type { BridgeOptions, ConnectionConfig, SshAuth, TunnelConfig } from "./types";

export const SETTINGS_FILE = "gateway.json";
export const KEY_FILE = ".gateway_key";
export const POINTER_FILE = "current_session.json";

export const DEFAULT_GATEWAY_URL = "ws://127.0.0.1:18789";

export const SENSITIVE_KEYS = ["gateway_token", "gateway_password", "ssh_password"] as const;

/** Read in order when gateway_token is empty; the first non-blank first line wins. */
export const TOKEN_FILES = ["gateway_token.txt", ".gateway_token"] as const;

const wsUrl = z
  .string()
  .url()
  .refine((value) => /^wss?:\/\//i.test(value), "must use ws:// or wss://");

export const gatewaySettingsSchema = z
  .object({
    gateway_ws_url: wsUrl,
    gateway_token: z.string().default(""),
    gateway_password: z.string().default(""),
    auto_login: z.boolean().default(false),
    ssh_enabled: z.boolean().default(false),
    ssh_username: z.string().default(""),
    ssh_server: z.string().default(""),
    ssh_port: z.number().int().min(1).max(65535).default(22),
    ssh_password: z.string().default(""),
    ssh_private_key_path: z.string().default(""),
    encrypt_secrets: z.boolean().default(true),
  })
  .superRefine((settings, ctx) => {
    if (!settings.ssh_enabled) {
      return;
    }
    for (const key of ["ssh_username", "ssh_server"] as const) {
      if (!settings[key].trim()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "required when ssh_enabled is true",
        });
      }
    }
  });

export type GatewaySettings = z.infer<typeof gatewaySettingsSchema>;

export class SettingsError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

export function settingsPaths(configDir: string) {
  return {
    settingsFile: join(configDir, SETTINGS_FILE),
    keyFile: join(configDir, KEY_FILE),
    pointerFile: join(configDir, POINTER_FILE),
  };
}

export function parseSettings(raw: unknown): GatewaySettings {
  const result = gatewaySettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new SettingsError(`Invalid gateway settings: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function loadSettings(configDir: string): GatewaySettings {
  const { settingsFile } = settingsPaths(configDir);
  if (!existsSync(settingsFile)) {
    throw new SettingsError(`Settings file not found: ${settingsFile}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(settingsFile, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Settings file is not valid JSON: ${reason}`);
  }
  return parseSettings(raw);
}

/**
 * Writes gateway.json. Sensitive values are sealed unless the user opted out
 * with `encrypt_secrets: false`, in which case they are written as given.
 */
export function saveSettings(
  configDir: string,
  settings: GatewaySettings,
  secrets: Pick<SecretStore, "seal">
): GatewaySettings {
  const persisted: GatewaySettings = { ...parseSettings(settings) };
  if (persisted.encrypt_secrets) {
    for (const key of SENSITIVE_KEYS) {
      persisted[key] = secrets.seal(persisted[key]);
    }
  }
  mkdirSync(configDir, { recursive: true });
  writeFileSync(settingsPaths(configDir).settingsFile, `${JSON.stringify(persisted, null, 2)}\n`, "utf8");
  console.log(`[settings] saved ${SETTINGS_FILE}`);
  return persisted;
}

function defaultPort(url: URL): number {
  if (url.port) {
    return Number(url.port);
  }
  return url.protocol === "wss:" ? 443 : 80;
}

function splitServer(server: string, fallbackPort: number): { host: string; port: number } {
  const match = /^(.+):(\d+)$/.exec(server.trim());
  if (match && !match[1].includes(":")) {
    return { host: match[1], port: Number(match[2]) };
  }
  return { host: server.trim(), port: fallbackPort };
}

export function toTunnelConfig(
  settings: GatewaySettings,
  readKey: (path: string) => string = (path) => readFileSync(path, "utf8")
): TunnelConfig {
  if (!settings.ssh_username || !settings.ssh_server) {
    throw new SettingsError("SSH tunnel enabled but ssh_username or ssh_server is empty", [
      "ssh_username",
      "ssh_server",
    ]);
  }
  const url = new URL(settings.gateway_ws_url);
  const gatewayPort = defaultPort(url);
  const server = splitServer(settings.ssh_server, settings.ssh_port);

  let sshAuth: SshAuth;
  if (settings.ssh_private_key_path) {
    sshAuth = { method: "privateKey", privateKey: readKey(settings.ssh_private_key_path) };
  } else if (settings.ssh_password) {
    sshAuth = { method: "password", password: settings.ssh_password };
  } else {
    sshAuth = { method: "agent" };
  }

  // The Gateway listens on the remote loopback; the local side mirrors its port.
  return {
    sshUser: settings.ssh_username,
    sshHost: server.host,
    sshPort: server.port,
    sshAuth,
    localPort: gatewayPort,
    remoteHost: "127.0.0.1",
    remotePort: gatewayPort,
  };
}

function readFirstLine(path: string): string {
  if (!existsSync(path)) {
    return "";
  }
  return (readFileSync(path, "utf8").split(/\r?\n/, 1)[0] ?? "").trim();
}

/**
 * gateway_token, or when that is empty the first line of a token file
 * dropped next to gateway.json.
 */
export function resolveGatewayToken(settings: GatewaySettings, configDir?: string): string {
  const token = settings.gateway_token.trim();
  if (token || !configDir) {
    return token;
  }
  for (const name of TOKEN_FILES) {
    const fromFile = readFirstLine(join(configDir, name));
    if (fromFile) {
      return fromFile;
    }
  }
  return "";
}

export function toConnectionConfig(
  settings: GatewaySettings,
  readKey?: (path: string) => string,
  configDir?: string
): ConnectionConfig {
  const token = resolveGatewayToken(settings, configDir);
  const credential = token
    ? { kind: "token" as const, stored: token }
    : { kind: "password" as const, stored: settings.gateway_password };
  return {
    endpointURL: settings.gateway_ws_url,
    credential,
    autoConnect: settings.auto_login,
    ...(settings.ssh_enabled ? { tunnel: toTunnelConfig(settings, readKey) } : {}),
  };
}

export const DEFAULT_BRIDGE_OPTIONS: BridgeOptions = {
  connectTimeoutMs: 10000,
  authTimeoutMs: 10000,
  heartbeatIntervalMs: 15000,
  heartbeatMissThreshold: 3,
  reconnectBaseMs: 1000,
  reconnectMaxMs: 30000,
  jitterRatio: 0.2,
  maxReconnectAttempts: 0,
  maxAuthRejections: 3,
  queueCapacity: 100,
  stableAfterMs: 30000,
  requestTimeoutMs: 10000,
};

type NumberBounds = {
  integer?: boolean;
  min?: number;
};

// Values outside the bounds fall back to the default. Without `min`, zero and
// negatives are rejected.
function parseNumber(value: string | undefined, fallback: number, bounds: NumberBounds = {}): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  if (bounds.integer && !Number.isInteger(parsed)) {
    return fallback;
  }
  if (bounds.min === undefined ? parsed <= 0 : parsed < bounds.min) {
    return fallback;
  }
  return parsed;
}

const COUNT: NumberBounds = { integer: true, min: 1 };

export function loadBridgeOptions(env: NodeJS.ProcessEnv = process.env): BridgeOptions {
  const defaults = DEFAULT_BRIDGE_OPTIONS;
  return {
    connectTimeoutMs: parseNumber(env.GATEWAY_CONNECT_TIMEOUT_MS, defaults.connectTimeoutMs),
    authTimeoutMs: parseNumber(env.GATEWAY_AUTH_TIMEOUT_MS, defaults.authTimeoutMs),
    heartbeatIntervalMs: parseNumber(env.GATEWAY_HEARTBEAT_INTERVAL_MS, defaults.heartbeatIntervalMs),
    heartbeatMissThreshold: parseNumber(
      env.GATEWAY_HEARTBEAT_MISS_THRESHOLD,
      defaults.heartbeatMissThreshold,
      COUNT
    ),
    reconnectBaseMs: parseNumber(env.GATEWAY_RECONNECT_BASE_MS, defaults.reconnectBaseMs),
    reconnectMaxMs: parseNumber(env.GATEWAY_RECONNECT_MAX_MS, defaults.reconnectMaxMs),
    jitterRatio: defaults.jitterRatio,
    // 0 means unlimited.
    maxReconnectAttempts: parseNumber(
      env.GATEWAY_MAX_RECONNECT_ATTEMPTS,
      defaults.maxReconnectAttempts,
      { integer: true, min: 0 }
    ),
    maxAuthRejections: parseNumber(env.GATEWAY_MAX_AUTH_REJECTIONS, defaults.maxAuthRejections, COUNT),
    queueCapacity: parseNumber(env.GATEWAY_QUEUE_CAPACITY, defaults.queueCapacity, COUNT),
    stableAfterMs: parseNumber(env.GATEWAY_STABLE_AFTER_MS, defaults.stableAfterMs),
    requestTimeoutMs: parseNumber(env.GATEWAY_REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs),
  };
}
