import { createStore } from "zustand/vanilla";
import type { ConnectionSnapshot, ConnectionState, Message, Session } from "./types";

export type SessionSummary = {
  id: string;
  botId: string;
  createdAt: string;
  messageCount: number;
  streaming: boolean;
  lastMessage?: Message;
};

export type OverflowNotice = {
  sessionId: string;
  at: number;
};

export type BridgeState = {
  connection: ConnectionSnapshot;
  previousState: ConnectionState | null;
  activeSessionId: string | null;
  sessions: Record<string, SessionSummary>;
  lastOverflow?: OverflowNotice;
  lastShutdownReason?: string;
  secretUnavailable: boolean;
  lastUpdated: number;
  setConnection: (snapshot: ConnectionSnapshot, previous: ConnectionState) => void;
  upsertSession: (session: Session) => void;
  removeSession: (sessionId: string) => void;
  setActiveSession: (sessionId: string | null) => void;
  recordMessage: (sessionId: string, message: Message) => void;
  recordOverflow: (sessionId: string) => void;
  recordShutdown: (reason: string | undefined) => void;
  setSecretUnavailable: (value: boolean) => void;
};

const INITIAL_CONNECTION: ConnectionSnapshot = {
  state: "disconnected",
  endpoint: null,
  reconnectAttempts: 0,
  authRejections: 0,
  queueDepth: 0,
};

function summarize(session: Session): SessionSummary {
  const last = session.messages[session.messages.length - 1];
  return {
    id: session.id,
    botId: session.botId,
    createdAt: session.createdAt,
    messageCount: session.messages.length,
    streaming: session.messages.some((message) => !message.complete),
    ...(last ? { lastMessage: last } : {}),
  };
}

/**
 * Read model for the presentation layer. The bridge writes into it from its
 * event channels; views only subscribe.
 */
export function createBridgeStore() {
  return createStore<BridgeState>((set) => ({
    connection: INITIAL_CONNECTION,
    previousState: null,
    activeSessionId: null,
    sessions: {},
    lastOverflow: undefined,
    lastShutdownReason: undefined,
    secretUnavailable: false,
    lastUpdated: 0,
    setConnection: (snapshot, previous) =>
      set((current) => ({
        connection: snapshot,
        previousState: previous,
        secretUnavailable: snapshot.state === "connected" ? false : current.secretUnavailable,
        lastUpdated: Date.now(),
      })),
    upsertSession: (session) =>
      set((current) => ({
        sessions: { ...current.sessions, [session.id]: summarize(session) },
        lastUpdated: Date.now(),
      })),
    removeSession: (sessionId) =>
      set((current) => {
        if (!current.sessions[sessionId]) return current;
        const { [sessionId]: _removed, ...rest } = current.sessions;
        return { sessions: rest, lastUpdated: Date.now() };
      }),
    setActiveSession: (sessionId) => set({ activeSessionId: sessionId, lastUpdated: Date.now() }),
    recordMessage: (sessionId, message) =>
      set((current) => {
        const summary = current.sessions[sessionId];
        if (!summary) return current;
        const isNew = message.sequenceIndex >= summary.messageCount;
        return {
          sessions: {
            ...current.sessions,
            [sessionId]: {
              ...summary,
              messageCount: isNew ? message.sequenceIndex + 1 : summary.messageCount,
              streaming: message.role === "assistant" ? !message.complete : summary.streaming,
              lastMessage: message,
            },
          },
          lastUpdated: Date.now(),
        };
      }),
    recordOverflow: (sessionId) =>
      set({ lastOverflow: { sessionId, at: Date.now() }, lastUpdated: Date.now() }),
    recordShutdown: (reason) => set({ lastShutdownReason: reason, lastUpdated: Date.now() }),
    setSecretUnavailable: (value) => set({ secretUnavailable: value, lastUpdated: Date.now() }),
  }));
}

export type BridgeStore = ReturnType<typeof createBridgeStore>;
