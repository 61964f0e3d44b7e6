import net from "net";
import type { Duplex } from "stream";
import { Client, type ConnectConfig } from "ssh2";
import { TunnelError, toError } from "./errors";
import type { TunnelConfig, TunnelEndpoint } from "./types";

const LOCAL_HOST = "127.0.0.1";
const DEFAULT_READY_TIMEOUT_MS = 15000;

/**
 * The slice of an SSH client the tunnel needs. Production uses ssh2; tests
 * pass an in-process fake.
 */
export interface SshSession {
  connect(config: ConnectConfig): Promise<void>;
  forwardOut(srcHost: string, srcPort: number, dstHost: string, dstPort: number): Promise<Duplex>;
  onClose(listener: () => void): void;
  end(): void;
}

export class Ssh2Session implements SshSession {
  private readonly client = new Client();

  constructor() {
    // ssh2 emits "error" after the session is up too; without a listener
    // that would crash the process.
    this.client.on("error", (error) => {
      console.warn(`[tunnel] ssh session error: ${error.message}`);
    });
  }

  connect(config: ConnectConfig): Promise<void> {
    return new Promise((resolve, reject) => {
      const onReady = (): void => {
        this.client.off("error", onError);
        resolve();
      };
      const onError = (error: Error): void => {
        this.client.off("ready", onReady);
        reject(error);
      };
      this.client.once("ready", onReady);
      this.client.once("error", onError);
      this.client.connect(config);
    });
  }

  forwardOut(srcHost: string, srcPort: number, dstHost: string, dstPort: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      this.client.forwardOut(srcHost, srcPort, dstHost, dstPort, (error, channel) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(channel);
      });
    });
  }

  onClose(listener: () => void): void {
    this.client.on("close", listener);
  }

  end(): void {
    this.client.end();
  }
}

export type TunnelManagerOptions = {
  createSession?: () => SshSession;
  readyTimeoutMs?: number;
  /** Turns a stored SSH password into plaintext right before negotiation. */
  revealPassword?: (stored: string) => string;
};

type ActiveTunnel = {
  key: string;
  config: TunnelConfig;
  session: SshSession;
  server: net.Server;
  sockets: Set<net.Socket>;
  endpoint: TunnelEndpoint;
};

function describeTarget(config: TunnelConfig): string {
  return `${config.sshUser}@${config.sshHost}:${config.sshPort} -> ${config.remoteHost}:${config.remotePort}`;
}

function tunnelKey(config: TunnelConfig): string {
  return JSON.stringify([
    config.sshUser,
    config.sshHost,
    config.sshPort,
    config.sshAuth,
    config.localPort,
    config.remoteHost,
    config.remotePort,
  ]);
}

export function classifySshFailure(error: unknown, config: TunnelConfig): TunnelError {
  if (error instanceof TunnelError) {
    return error;
  }
  const err = toError(error);
  const level = "level" in err ? err.level : undefined;
  if (level === "client-authentication") {
    return new TunnelError(
      `SSH authentication failed for ${config.sshUser}@${config.sshHost}`,
      "auth"
    );
  }
  return new TunnelError(`SSH connection to ${config.sshHost} failed: ${err.message}`, "network");
}

export function buildConnectConfig(
  config: TunnelConfig,
  readyTimeoutMs: number,
  revealPassword: (stored: string) => string = (stored) => stored
): ConnectConfig {
  const connectConfig: ConnectConfig = {
    host: config.sshHost,
    port: config.sshPort,
    username: config.sshUser,
    readyTimeout: readyTimeoutMs,
    keepaliveInterval: 30000,
    keepaliveCountMax: 3,
  };
  const auth = config.sshAuth;
  switch (auth.method) {
    case "password":
      connectConfig.password = revealPassword(auth.password);
      break;
    case "privateKey":
      connectConfig.privateKey = auth.privateKey;
      if (auth.passphrase) {
        connectConfig.passphrase = auth.passphrase;
      }
      break;
    case "agent": {
      const agent = auth.agentSocket ?? process.env.SSH_AUTH_SOCK;
      if (!agent) {
        throw new TunnelError("SSH agent authentication requested but no agent socket is available", "auth");
      }
      connectConfig.agent = agent;
      break;
    }
  }
  return connectConfig;
}

/**
 * Owns at most one SSH local port forward. open/close run one at a time so
 * overlapping connect and disconnect requests cannot interleave.
 */
export class TunnelManager {
  private active: ActiveTunnel | null = null;
  private chain: Promise<unknown> = Promise.resolve();
  private readonly createSession: () => SshSession;
  private readonly readyTimeoutMs: number;
  private readonly revealPassword: (stored: string) => string;

  constructor(options: TunnelManagerOptions = {}) {
    this.createSession = options.createSession ?? (() => new Ssh2Session());
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.revealPassword = options.revealPassword ?? ((stored) => stored);
  }

  open(config: TunnelConfig): Promise<TunnelEndpoint> {
    return this.serialize(() => this.openNow(config));
  }

  close(): Promise<void> {
    return this.serialize(() => this.closeNow());
  }

  isOpen(): boolean {
    return this.active !== null;
  }

  endpoint(): TunnelEndpoint | null {
    return this.active ? { ...this.active.endpoint } : null;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task, task);
    // The caller observes failures through `run`; the chain only orders work.
    this.chain = run.catch(() => undefined);
    return run;
  }

  private async openNow(config: TunnelConfig): Promise<TunnelEndpoint> {
    const key = tunnelKey(config);
    if (this.active) {
      if (this.active.key === key) {
        return { ...this.active.endpoint };
      }
      await this.closeNow();
    }

    // Secret failures surface as they are, before any session exists.
    const connectConfig = buildConnectConfig(config, this.readyTimeoutMs, this.revealPassword);
    console.log(`[tunnel] opening ${describeTarget(config)}`);
    const session = this.createSession();
    let server: net.Server | null = null;
    try {
      await session.connect(connectConfig);
    } catch (error) {
      session.end();
      const failure = classifySshFailure(error, config);
      console.error(`[tunnel] ${failure.message}`);
      throw failure;
    }

    const sockets = new Set<net.Socket>();
    try {
      server = net.createServer((socket) => {
        this.forward(session, socket, config, sockets);
      });
      const port = await listen(server, config.localPort);
      const tunnel: ActiveTunnel = {
        key,
        config,
        session,
        server,
        sockets,
        endpoint: { host: LOCAL_HOST, port },
      };
      this.active = tunnel;
      session.onClose(() => {
        if (this.active === tunnel) {
          console.warn("[tunnel] ssh session closed by remote");
          this.active = null;
          void releaseServer(tunnel.server, tunnel.sockets);
        }
      });
      console.log(`[tunnel] forwarding ${LOCAL_HOST}:${port} -> ${config.remoteHost}:${config.remotePort}`);
      return { ...tunnel.endpoint };
    } catch (error) {
      if (server) {
        await releaseServer(server, sockets);
      }
      session.end();
      const err = toError(error);
      const code = "code" in err ? err.code : undefined;
      if (code === "EADDRINUSE" || code === "EACCES") {
        const failure = new TunnelError(`Local port ${config.localPort} is not available`, "port-in-use");
        console.error(`[tunnel] ${failure.message}`);
        throw failure;
      }
      throw classifySshFailure(err, config);
    }
  }

  private async closeNow(): Promise<void> {
    const tunnel = this.active;
    if (!tunnel) {
      return;
    }
    this.active = null;
    await releaseServer(tunnel.server, tunnel.sockets);
    tunnel.session.end();
    console.log(`[tunnel] closed ${describeTarget(tunnel.config)}`);
  }

  private forward(
    session: SshSession,
    socket: net.Socket,
    config: TunnelConfig,
    sockets: Set<net.Socket>
  ): void {
    sockets.add(socket);
    socket.on("close", () => {
      sockets.delete(socket);
    });
    socket.on("error", (error) => {
      console.warn(`[tunnel] local socket error: ${error.message}`);
    });

    session
      .forwardOut(
        socket.remoteAddress ?? LOCAL_HOST,
        socket.remotePort ?? 0,
        config.remoteHost,
        config.remotePort
      )
      .then((channel) => {
        if (socket.destroyed) {
          channel.destroy();
          return;
        }
        channel.on("error", (error: Error) => {
          console.warn(`[tunnel] forwarded channel error: ${error.message}`);
        });
        channel.on("close", () => socket.destroy());
        socket.on("close", () => channel.destroy());
        socket.pipe(channel).pipe(socket);
      })
      .catch((error: unknown) => {
        console.warn(`[tunnel] forwardOut failed: ${toError(error).message}`);
        socket.destroy();
      });
  }
}

function listen(server: net.Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once("error", onError);
    server.listen(port, LOCAL_HOST, () => {
      server.off("error", onError);
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Tunnel listener has no TCP address"));
        return;
      }
      resolve(address.port);
    });
  });
}

function releaseServer(server: net.Server, sockets: Set<net.Socket>): Promise<void> {
  for (const socket of sockets) {
    socket.destroy();
  }
  sockets.clear();
  if (!server.listening) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}
