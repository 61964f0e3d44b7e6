import { z } from "zod";
import { ProtocolDecodeError } from "./errors";
import type { InboundFrame, OutboundFrame } from "./types";

const channel = z.string().min(1);
const seq = z.number().int().nonnegative();

const deltaSchema = z.object({
  type: z.literal("delta"),
  channel,
  kind: z.enum(["content", "thinking"]),
  text: z.string(),
  seq,
});

const endSchema = z.object({
  type: z.literal("end"),
  channel,
  seq,
});

const helloOkSchema = z.object({
  type: z.literal("hello-ok"),
  features: z
    .object({
      methods: z.array(z.string()).optional(),
      events: z.array(z.string()).optional(),
    })
    .optional(),
});

const authErrorSchema = z.object({
  type: z.literal("auth-error"),
  message: z.string().optional(),
});

const responseSchema = z.object({
  type: z.literal("res"),
  id: z.string().min(1),
  ok: z.boolean(),
  payload: z.unknown().optional(),
  error: z
    .object({
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).optional(),
    })
    .optional(),
});

const shutdownSchema = z.object({
  type: z.literal("shutdown"),
  reason: z.string().optional(),
  restartExpectedMs: z.number().nonnegative().optional(),
});

const pingSchema = z.object({ type: z.literal("ping") });
const pongSchema = z.object({ type: z.literal("pong") });

const inboundSchema = z.discriminatedUnion("type", [
  deltaSchema,
  endSchema,
  helloOkSchema,
  authErrorSchema,
  responseSchema,
  shutdownSchema,
  pingSchema,
  pongSchema,
]);

export type DecodeResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; error: ProtocolDecodeError };

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}

export type RawFrame = string | Buffer | ArrayBuffer | Buffer[];

function rawToString(raw: RawFrame): string {
  if (typeof raw === "string") {
    return raw;
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return raw.toString("utf8");
}

/**
 * Decodes one inbound frame. Failures are frame-local: the caller logs and
 * skips them. Unknown types decode to an `unknown` frame so newer Gateways
 * can add frame kinds without breaking older clients.
 */
export function decodeFrame(raw: RawFrame): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawToString(raw));
  } catch {
    return { ok: false, error: new ProtocolDecodeError("Frame is not valid JSON") };
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { ok: false, error: new ProtocolDecodeError("Frame is not a JSON object") };
  }
  const type = "type" in parsed ? parsed.type : undefined;
  if (typeof type !== "string" || type.length === 0) {
    return { ok: false, error: new ProtocolDecodeError("Frame has no type") };
  }
  if (!inboundSchema.optionsMap.has(type)) {
    return { ok: true, frame: { type: "unknown", rawType: type } };
  }

  const result = inboundSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return {
      ok: false,
      error: new ProtocolDecodeError(`Invalid ${type} frame: ${detail}`, type),
    };
  }
  return { ok: true, frame: result.data };
}
