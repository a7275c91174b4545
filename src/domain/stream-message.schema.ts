// =============================================================================
// Stream Message Schema — Wire shapes of the line-delimited GSP protocol
// =============================================================================

import { z } from "zod";

export const MESSAGE_KINDS = ["streamHeader", "layout", "layoutRoot", "stateUpdate"] as const;

export const MessageKindSchema = z.enum(MESSAGE_KINDS);

export type MessageKind = z.infer<typeof MessageKindSchema>;

const IdSchema = z.string().min(1);

/** Any object carrying a string discriminator; checked before the variant schema. */
export const MessageEnvelopeSchema = z.object({ type: z.string() }).passthrough();

export const StreamHeaderSchema = z.object({
  type: z.literal("streamHeader"),
  sessionId: IdSchema,
  rootId: IdSchema.optional(),
  state: z.record(z.string(), z.unknown()).optional(),
});

export const LayoutSchema = z.object({
  type: z.literal("layout"),
  id: IdSchema,
  kind: z.string().min(1),
  properties: z.record(z.string(), z.unknown()).default({}),
  children: z.array(IdSchema).default([]),
  sessionId: IdSchema.optional(),
});

export const LayoutRootSchema = z.object({
  type: z.literal("layoutRoot"),
  rootId: IdSchema,
  sessionId: IdSchema.optional(),
});

export const StateUpdateSchema = z.object({
  type: z.literal("stateUpdate"),
  values: z.record(z.string(), z.unknown()),
  sessionId: IdSchema.optional(),
});

export const StreamMessageSchema = z.discriminatedUnion("type", [
  StreamHeaderSchema,
  LayoutSchema,
  LayoutRootSchema,
  StateUpdateSchema,
]);

export type StreamHeaderMessage = z.infer<typeof StreamHeaderSchema>;
export type LayoutMessage = z.infer<typeof LayoutSchema>;
export type LayoutRootMessage = z.infer<typeof LayoutRootSchema>;
export type StateUpdateMessage = z.infer<typeof StateUpdateSchema>;
export type StreamMessage = z.infer<typeof StreamMessageSchema>;

export function isMessageKind(value: string): value is MessageKind {
  return MessageKindSchema.safeParse(value).success;
}

// -----------------------------------------------------------------------------
// Client requests (outbound, never part of the inbound stream)
// -----------------------------------------------------------------------------

export const ClientRequestSchema = z.object({
  kind: z.string().min(1),
  payload: z.unknown(),
  sessionId: IdSchema.optional(),
  sourceNodeId: IdSchema.optional(),
  timestamp: z.number(),
});

export type ClientRequest = z.infer<typeof ClientRequestSchema>;
