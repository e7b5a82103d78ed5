import { z } from 'zod';

export const PROTOCOL_VERSION = '1';

export const participantRoleSchema = z.enum(['manager', 'regular']);
export const admissionDecisionSchema = z.enum(['approved', 'rejected', 'withdrawn', 'expired', 'closed']);

export const boardEventSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('action'), sequence: z.number().int().nonnegative(), payload: z.string() }),
  z.object({ kind: z.literal('clear') }),
  z.object({ kind: z.literal('chat'), from: z.string(), text: z.string() })
]);

export type ParticipantRole = z.infer<typeof participantRoleSchema>;
export type AdmissionDecision = z.infer<typeof admissionDecisionSchema>;
export type BoardEvent = z.infer<typeof boardEventSchema>;

// client -> server

export const helloMessageSchema = z.object({
  type: z.literal('hello'),
  participantId: z.string(),
  role: participantRoleSchema,
  version: z.string().optional()
});

const requestId = z.string().optional();

export const boardRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('approve'), requestId, participantId: z.string() }),
  z.object({ type: z.literal('refuse'), requestId, participantId: z.string() }),
  z.object({ type: z.literal('canvas_action'), requestId, payload: z.string() }),
  z.object({ type: z.literal('clear_canvas'), requestId }),
  z.object({ type: z.literal('chat'), requestId, text: z.string() }),
  z.object({ type: z.literal('kick'), requestId, participantId: z.string() }),
  z.object({ type: z.literal('new_board'), requestId }),
  z.object({ type: z.literal('open_board'), requestId, name: z.string() }),
  z.object({ type: z.literal('save_board'), requestId, name: z.string() }),
  z.object({ type: z.literal('close_board'), requestId }),
  z.object({ type: z.literal('get_state'), requestId }),
  z.object({ type: z.literal('leave'), requestId })
]);

export type HelloMessage = z.infer<typeof helloMessageSchema>;
export type BoardRequest = z.infer<typeof boardRequestSchema>;
export type BoardRequestType = BoardRequest['type'];

// server -> client

export const boardOutgoingMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('welcome'), participantId: z.string(), role: participantRoleSchema, admission: z.enum(['active', 'pending']) }),
  z.object({ type: z.literal('ack'), requestId: z.string().optional(), result: z.unknown().optional() }),
  z.object({ type: z.literal('error'), requestId: z.string().optional(), code: z.string(), message: z.string() }),
  z.object({ type: z.literal('event'), event: boardEventSchema }),
  z.object({ type: z.literal('membership'), participants: z.array(z.string()) }),
  z.object({ type: z.literal('join_request'), participantId: z.string() }),
  z.object({ type: z.literal('join_withdrawn'), participantId: z.string() }),
  z.object({ type: z.literal('decision'), decision: admissionDecisionSchema }),
  z.object({ type: z.literal('disconnect'), reason: z.string() })
]);

export type BoardOutgoingMessage = z.infer<typeof boardOutgoingMessageSchema>;

export type ParseResult<T> = { ok: true; message: T } | { ok: false; reason: string };

export function parseFrame<T>(schema: z.ZodType<T>, raw: string): ParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'frame is not valid JSON' };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join('.') || 'frame'}: ${issue.message}` : 'invalid frame' };
  }
  return { ok: true, message: parsed.data };
}
