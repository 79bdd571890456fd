/**
 * @module @sprig/plugin-runtime/engine/process-protocol
 *
 * IPC messages between ProcessEngine and a grammar process.
 * Both sides validate what they receive; nothing crossing the channel is
 * trusted as typed.
 */

import { z } from 'zod';

export const instantiateMessageSchema = z.object({
  type: z.literal('instantiate'),
  languageId: z.string(),
  bytes: z.instanceof(Uint8Array),
});

export const highlightMessageSchema = z.object({
  type: z.literal('highlight'),
  requestId: z.number().int(),
  source: z.string(),
});

/** Parent → grammar process */
export const parentMessageSchema = z.discriminatedUnion('type', [instantiateMessageSchema, highlightMessageSchema]);

export type ParentMessage = z.infer<typeof parentMessageSchema>;

const exitStatusSchema = z.discriminatedUnion('tag', [
  z.object({ tag: z.literal('ok') }),
  z.object({ tag: z.literal('err'), val: z.number().optional() }),
]);

const capabilityEventSchema = z.object({
  kind: z.enum(['exit', 'stdout', 'stderr', 'stdin', 'random']),
  bytes: z.number().optional(),
  status: exitStatusSchema.optional(),
});

const serializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z.string(),
  details: z.record(z.unknown()).optional(),
});

/** Grammar process → parent */
export const childMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), pid: z.number() }),
  z.object({ type: z.literal('instantiated'), languageId: z.string().optional() }),
  z.object({ type: z.literal('failed'), error: serializedErrorSchema }),
  z.object({ type: z.literal('result'), requestId: z.number().int(), payload: z.unknown() }),
  z.object({
    type: z.literal('error'),
    requestId: z.number().int(),
    message: z.string(),
    exit: exitStatusSchema.optional(),
  }),
  z.object({ type: z.literal('effect'), event: capabilityEventSchema }),
]);

export type ChildMessage = z.infer<typeof childMessageSchema>;
