import { z } from "zod";
import type { DocumentSnapshot } from "./documentState.mjs";
import { MalformedMessageError } from "./errors.mjs";
import type { TextSyncErrorCode } from "./errors.mjs";

export const DEFAULT_USER_ID = "anonymous";

/* ---------------- client -> server ---------------- */

export const EditBodySchema = z.object({
  content: z.string(),
  user_id: z.string().nullable().optional(),
  timestamp: z.string().optional()
});

// the server stamps socket edits on arrival, so a client clock is never read
export const InboundMessageSchema = EditBodySchema.extend({
  type: z.literal("text_update"),
  timestamp: z.unknown().optional()
});

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

/** A validated edit, before the hub stamps it with a time and an origin. */
export interface EditRequest {
  content: string;
  userId: string | null;
  timestamp?: Date;
}

/* ---------------- server -> client ---------------- */

const TextUpdateSchema = z.object({
  type: z.literal("text_update"),
  content: z.string(),
  user_id: z.string().nullable(),
  timestamp: z.string(),
  echo: z.boolean()
});

const InitialStateSchema = z.object({
  type: z.literal("initial_state"),
  content: z.string(),
  last_updated: z.string(),
  last_editor: z.string().nullable(),
  user_count: z.number().int().nonnegative()
});

const UserCountSchema = z.object({
  type: z.literal("user_count_update"),
  user_count: z.number().int().nonnegative()
});

const ErrorSchema = z.object({
  type: z.literal("error"),
  code: z.string(),
  message: z.string()
});

export const OutboundMessageSchema = z.discriminatedUnion("type", [
  TextUpdateSchema,
  InitialStateSchema,
  UserCountSchema,
  ErrorSchema
]);

export type TextUpdateMessage = z.infer<typeof TextUpdateSchema>;
export type InitialStateMessage = z.infer<typeof InitialStateSchema>;
export type UserCountMessage = z.infer<typeof UserCountSchema>;
export type ErrorMessage = z.infer<typeof ErrorSchema>;
export type OutboundMessage = z.infer<typeof OutboundMessageSchema>;

/* ---------------- parsing ---------------- */

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "message"}: ${issue.message}`)
    .join("; ");
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new MalformedMessageError("Payload is not valid JSON");
  }
}

export function parseTimestamp(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedMessageError(`timestamp: "${value}" is not a date`);
  }
  return date;
}

function userIdOf(userId: string | null | undefined): string | null {
  // an explicit null is kept, only a missing id falls back
  return userId === undefined ? DEFAULT_USER_ID : userId;
}

/** Validates one WebSocket frame from a client. */
export function parseInboundMessage(raw: string): EditRequest {
  const result = InboundMessageSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new MalformedMessageError(describeIssues(result.error));
  }
  return { content: result.data.content, userId: userIdOf(result.data.user_id) };
}

/** Validates the already-decoded JSON body of `POST /text`. */
export function parseEditBody(body: unknown): EditRequest {
  const result = EditBodySchema.safeParse(body);
  if (!result.success) {
    throw new MalformedMessageError(describeIssues(result.error));
  }
  const timestamp = parseTimestamp(result.data.timestamp);
  return {
    content: result.data.content,
    userId: userIdOf(result.data.user_id),
    ...(timestamp ? { timestamp } : {})
  };
}

/** Validates one frame from the server, on the client side. */
export function parseOutboundMessage(raw: string): OutboundMessage {
  const result = OutboundMessageSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new MalformedMessageError(describeIssues(result.error));
  }
  return result.data;
}

/* ---------------- building ---------------- */

export function textUpdateMessage(snapshot: DocumentSnapshot, echo: boolean): TextUpdateMessage {
  return {
    type: "text_update",
    content: snapshot.content,
    user_id: snapshot.lastEditor,
    timestamp: snapshot.lastModified.toISOString(),
    echo
  };
}

export function initialStateMessage(snapshot: DocumentSnapshot, userCount: number): InitialStateMessage {
  return {
    type: "initial_state",
    content: snapshot.content,
    last_updated: snapshot.lastModified.toISOString(),
    last_editor: snapshot.lastEditor,
    user_count: userCount
  };
}

export function userCountMessage(userCount: number): UserCountMessage {
  return { type: "user_count_update", user_count: userCount };
}

export function errorMessage(code: TextSyncErrorCode, message: string): ErrorMessage {
  return { type: "error", code, message };
}

export function encodeMessage(message: OutboundMessage): string {
  return JSON.stringify(message);
}
