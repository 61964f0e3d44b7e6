import { z } from "zod";
import type { GatewayConnection } from "./gateway-connection";

export const METHOD_CHAT_HISTORY = "chat.history";
export const METHOD_CHAT_ABORT = "chat.abort";
export const METHOD_SESSIONS_DELETE = "sessions.delete";
export const METHOD_SESSIONS_LIST = "sessions.list";
export const METHOD_HEALTH = "health";

export const HISTORY_LIMIT_MAX = 1000;
export const DEFAULT_AGENT_ID = "main";

type RequestClient = Pick<GatewayConnection, "request">;

const contentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const historyMessageSchema = z.object({
  role: z.string(),
  content: z.union([z.string(), z.array(contentBlockSchema)]).optional(),
  text: z.string().optional(),
});

const historyPayloadSchema = z.object({
  messages: z.array(historyMessageSchema).default([]),
});

const deletePayloadSchema = z.object({
  deleted: z.boolean().optional(),
});

const remoteSessionSchema = z.object({
  key: z.string(),
  updatedAt: z.number().optional(),
});

// Items are checked one by one so a single odd entry does not hide the rest.
const sessionsBlockSchema = z.object({
  recent: z.array(z.unknown()).default([]),
});

const healthAgentSchema = z.object({
  agentId: z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  sessions: sessionsBlockSchema.optional(),
});

const healthPayloadSchema = z.object({
  agents: z.array(healthAgentSchema).default([]),
  sessions: sessionsBlockSchema.optional(),
});

const sessionsListPayloadSchema = z.object({
  sessions: z.array(z.unknown()).default([]),
});

export type HistoryEntry = {
  role: "user" | "assistant";
  text: string;
};

export type RemoteSession = {
  key: string;
  updatedAt?: number;
};

export type GatewayAgent = {
  agentId: string;
  name: string;
  recent: RemoteSession[];
};

function flattenContent(message: z.infer<typeof historyMessageSchema>): string {
  if (typeof message.content === "string") {
    return message.content;
  }
  if (message.content) {
    return message.content
      .filter((block) => block.type === "text" && typeof block.text === "string")
      .map((block) => block.text ?? "")
      .join("");
  }
  return message.text ?? "";
}

function requireKey(sessionKey: string): string {
  const key = sessionKey.trim();
  if (!key) {
    throw new Error("sessionKey is required");
  }
  return key;
}

function clampLimit(limit: number): number {
  return Math.max(1, Math.min(HISTORY_LIMIT_MAX, Math.floor(limit)));
}

function toRemoteSessions(items: unknown[]): RemoteSession[] {
  const sessions: RemoteSession[] = [];
  for (const item of items) {
    const parsed = remoteSessionSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }
    const key = parsed.data.key.trim();
    if (!key) {
      continue;
    }
    sessions.push(parsed.data.updatedAt === undefined ? { key } : { key, updatedAt: parsed.data.updatedAt });
  }
  return sessions;
}

/**
 * Last `limit` messages of a session as the Gateway stored them. Entries with
 * roles other than user/assistant (tool calls, system notes) are skipped.
 */
export async function fetchChatHistory(
  client: RequestClient,
  sessionKey: string,
  limit = 20
): Promise<HistoryEntry[]> {
  const params = {
    sessionKey: requireKey(sessionKey),
    limit: clampLimit(limit),
  };
  const payload = historyPayloadSchema.safeParse(await client.request(METHOD_CHAT_HISTORY, params));
  if (!payload.success) {
    throw new Error(`Unexpected ${METHOD_CHAT_HISTORY} payload`);
  }
  const entries: HistoryEntry[] = [];
  for (const message of payload.data.messages) {
    if (message.role !== "user" && message.role !== "assistant") {
      continue;
    }
    entries.push({ role: message.role, text: flattenContent(message) });
  }
  return entries;
}

export async function abortChat(
  client: RequestClient,
  sessionKey: string,
  runId?: string
): Promise<void> {
  const params: Record<string, unknown> = { sessionKey: requireKey(sessionKey) };
  if (runId) {
    params.runId = runId;
  }
  await client.request(METHOD_CHAT_ABORT, params);
}

/** Returns whether the Gateway reports the session as deleted. */
export async function deleteRemoteSession(client: RequestClient, sessionKey: string): Promise<boolean> {
  const payload = deletePayloadSchema.safeParse(
    await client.request(METHOD_SESSIONS_DELETE, { key: requireKey(sessionKey) })
  );
  return payload.success ? payload.data.deleted === true : false;
}

/**
 * Agents reported by `health`, each with its recent sessions. A Gateway that
 * lists no agents gets a single default agent carrying the top-level recent
 * sessions.
 */
export async function fetchHealth(client: RequestClient): Promise<GatewayAgent[]> {
  const payload = healthPayloadSchema.safeParse(await client.request(METHOD_HEALTH, {}));
  if (!payload.success) {
    throw new Error(`Unexpected ${METHOD_HEALTH} payload`);
  }
  const agents: GatewayAgent[] = [];
  for (const agent of payload.data.agents) {
    const agentId = (agent.agentId ?? agent.id ?? "").trim();
    if (!agentId || agents.some((known) => known.agentId === agentId)) {
      continue;
    }
    agents.push({
      agentId,
      name: agent.name?.trim() || agentId,
      recent: toRemoteSessions(agent.sessions?.recent ?? []),
    });
  }
  if (agents.length === 0) {
    agents.push({
      agentId: DEFAULT_AGENT_ID,
      name: DEFAULT_AGENT_ID,
      recent: toRemoteSessions(payload.data.sessions?.recent ?? []),
    });
  }
  return agents;
}

export async function listSessions(client: RequestClient, limit = 10): Promise<RemoteSession[]> {
  const payload = sessionsListPayloadSchema.safeParse(
    await client.request(METHOD_SESSIONS_LIST, { limit: clampLimit(limit) })
  );
  if (!payload.success) {
    throw new Error(`Unexpected ${METHOD_SESSIONS_LIST} payload`);
  }
  return toRemoteSessions(payload.data.sessions);
}
