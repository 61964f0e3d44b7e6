import { EventChannel } from "./event-channel";
import { StreamAssembler } from "./stream-assembler";
import type { Fragment, Message, OutboundFrame, Session, SessionEvents, StreamFrame } from "./types";

/** The part of GatewayConnection the registry sends through. */
export type OutboundSink = {
  send(sessionId: string, payload: OutboundFrame): void;
};

export class SessionInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionInputError";
  }
}

const SESSION_PREFIX = "agent:";

let sessionCounter = 0;

export function createSessionId(botId: string, now: number = Date.now()): string {
  sessionCounter += 1;
  return `${SESSION_PREFIX}${botId}:${now.toString(36)}-${sessionCounter.toString(36)}`;
}

export function isSessionId(value: string): boolean {
  const parts = value.split(":");
  return parts.length >= 3 && parts[0] === "agent" && parts[1].length > 0 && parts[2].length > 0;
}

type SessionEntry = {
  id: string;
  botId: string;
  createdAt: string;
  assembler: StreamAssembler;
  order: number;
};

function toFragment(frame: StreamFrame): Fragment {
  if (frame.type === "end") {
    return { kind: "end", delta: "", sequenceIndex: frame.seq };
  }
  return { kind: frame.kind, delta: frame.text, sequenceIndex: frame.seq };
}

/**
 * Maps channel ids to sessions. Every session keeps accumulating in the
 * background; `activeSessionId` only tracks which one is displayed.
 */
export class SessionRegistry {
  readonly events = new EventChannel<SessionEvents>("sessions");

  private readonly sessions = new Map<string, SessionEntry>();
  private active: string | null = null;
  private created = 0;

  constructor(private readonly sink: OutboundSink) {}

  get activeSessionId(): string | null {
    return this.active;
  }

  create(botId: string): Session {
    if (!botId.trim()) {
      throw new SessionInputError("botId is required");
    }
    const entry = this.register(createSessionId(botId), botId);
    this.select(entry.id);
    return this.toSession(entry);
  }

  /** Re-creates a session from a persisted pointer. Existing ids are reused. */
  restore(id: string, botId: string): Session {
    if (!isSessionId(id)) {
      throw new SessionInputError(`Not a session id: ${id}`);
    }
    const entry = this.sessions.get(id) ?? this.register(id, botId);
    this.select(entry.id);
    return this.toSession(entry);
  }

  select(id: string): void {
    if (!this.sessions.has(id)) {
      throw new SessionInputError(`Unknown session: ${id}`);
    }
    if (this.active === id) {
      return;
    }
    this.active = id;
    this.events.emit("activeSessionChanged", id);
  }

  delete(id: string): boolean {
    if (!this.sessions.delete(id)) {
      return false;
    }
    console.log(`[sessions] deleted ${id}`);
    this.events.emit("sessionDeleted", id);

    if (this.active === id) {
      let next: SessionEntry | null = null;
      for (const entry of this.sessions.values()) {
        if (!next || entry.order > next.order) {
          next = entry;
        }
      }
      this.active = next ? next.id : null;
      this.events.emit("activeSessionChanged", this.active);
    }
    return true;
  }

  get(id: string): Session | null {
    const entry = this.sessions.get(id);
    return entry ? this.toSession(entry) : null;
  }

  list(): Session[] {
    return Array.from(this.sessions.values(), (entry) => this.toSession(entry));
  }

  appendOutbound(sessionId: string, text: string): Message {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionInputError(`Unknown session: ${sessionId}`);
    }
    if (!text.trim()) {
      throw new SessionInputError("Message text is empty");
    }
    const message = entry.assembler.appendUser(text);
    this.events.emit("sessionMessageUpdated", sessionId, message);
    this.events.emit("sessionMessageCompleted", sessionId, message);
    this.sink.send(sessionId, { type: "message", channel: sessionId, text });
    return message;
  }

  routeInbound(frame: StreamFrame): void {
    const entry = this.sessions.get(frame.channel);
    if (!entry) {
      console.log(`[sessions] dropping ${frame.type} seq=${frame.seq} for unknown channel ${frame.channel}`);
      return;
    }
    const outcome = entry.assembler.apply(toFragment(frame));
    if (outcome.status === "discarded") {
      return;
    }
    if (frame.type === "delta") {
      this.events.emit("sessionMessageUpdated", entry.id, outcome.message);
    }
    if (outcome.completed) {
      this.events.emit("sessionMessageCompleted", entry.id, outcome.message);
    }
  }

  private register(id: string, botId: string): SessionEntry {
    const entry: SessionEntry = {
      id,
      botId,
      createdAt: new Date().toISOString(),
      assembler: new StreamAssembler(id),
      order: ++this.created,
    };
    this.sessions.set(id, entry);
    console.log(`[sessions] created ${id}`);
    this.events.emit("sessionCreated", this.toSession(entry));
    return entry;
  }

  private toSession(entry: SessionEntry): Session {
    return Object.freeze({
      id: entry.id,
      botId: entry.botId,
      createdAt: entry.createdAt,
      messages: Object.freeze(entry.assembler.messages()),
    });
  }
}
