/**
 * RPC Message Types
 * JSON messages exchanged with a long-lived provider worker.
 */
import { z } from 'zod';

export type RpcFraming = 'line' | 'content-length';

export interface RpcRequest {
  id: number;
  session_id: number;
  method: string;
  params: Record<string, unknown>;
}

const RpcErrorSchema = z.union([
  z.string(),
  z.object({ code: z.number().optional(), message: z.string() }).passthrough(),
]);

export const RpcResponseSchema = z.object({
  id: z.number().int().nonnegative(),
  session_id: z.number().int().nonnegative().optional(),
  result: z.unknown().optional(),
  error: RpcErrorSchema.nullable().optional(),
});

export const RpcNotificationSchema = z.object({
  method: z.string().min(1),
  session_id: z.number().int().nonnegative().optional(),
  params: z.unknown().optional(),
});

export type RpcResponse = z.infer<typeof RpcResponseSchema>;
export type RpcNotification = z.infer<typeof RpcNotificationSchema>;

export type RpcResult =
  | { ok: true; result: unknown }
  /** `raw` is set when the answer itself could not be decoded. */
  | { ok: false; error: string; raw?: string };

export type RpcCallback = (response: RpcResult) => void;

export interface PendingRequest {
  requestId: number;
  sessionId: number;
  method: string;
  callback: RpcCallback;
  sentAt: number;
}

/**
 * Result payload shared by list-producing providers. Directory listings may
 * come as `{entries, dir, total}` instead.
 */
export const LinesResultSchema = z.union([
  z.object({
    lines: z.array(z.string()),
    total: z.number().int().nonnegative().optional(),
  }),
  z
    .object({
      entries: z.array(z.string()),
      dir: z.string().optional(),
      total: z.number().int().nonnegative().optional(),
    })
    .transform(({ entries, total }) => ({ lines: entries, total })),
]);

export type LinesResult = z.infer<typeof LinesResultSchema>;
