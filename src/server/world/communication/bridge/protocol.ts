/**
 * rosbridge v2 JSON frames
 */

import { z } from "zod";

const publishFrame = z.object({
  op: z.literal("publish"),
  topic: z.string(),
  msg: z.unknown(),
});

const serviceResponseFrame = z.object({
  op: z.literal("service_response"),
  id: z.string().optional(),
  service: z.string(),
  values: z.unknown(),
  result: z.boolean(),
});

const actionFeedbackFrame = z.object({
  op: z.literal("action_feedback"),
  id: z.string().optional(),
  action: z.string(),
  values: z.unknown(),
});

const actionResultFrame = z.object({
  op: z.literal("action_result"),
  id: z.string().optional(),
  action: z.string(),
  values: z.unknown(),
  status: z.number().int().optional(),
  result: z.boolean(),
});

const statusFrame = z.object({
  op: z.literal("status"),
  id: z.string().optional(),
  level: z.string().optional(),
  msg: z.string().optional(),
});

export const incomingFrameSchema = z.discriminatedUnion("op", [
  publishFrame,
  serviceResponseFrame,
  actionFeedbackFrame,
  actionResultFrame,
  statusFrame,
]);

export type IncomingFrame = z.infer<typeof incomingFrameSchema>;

export type OutgoingFrame =
  | { op: "subscribe"; id: string; topic: string; type: string }
  | { op: "unsubscribe"; id: string; topic: string }
  | { op: "advertise"; id: string; topic: string; type: string }
  | { op: "publish"; topic: string; msg: unknown }
  | { op: "call_service"; id: string; service: string; type?: string; args: unknown }
  | { op: "send_action_goal"; id: string; action: string; action_type: string; args: unknown; feedback: boolean }
  | { op: "cancel_action_goal"; id: string; action: string };

export function decodeFrame(data: string): IncomingFrame | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return undefined;
  }
  const parsed = incomingFrameSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function encodeFrame(frame: OutgoingFrame): string {
  return JSON.stringify(frame);
}
