/**
 * RPC Correlator
 *
 * Matches responses from a long-lived worker to the requests that asked for
 * them. Request ids are never reused and each id is answered at most once.
 * A session id groups requests of one calling context; bumping it makes
 * every outstanding answer stale.
 */
import { DecodeError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { createFrameDecoder, encodeFrame, type FrameDecoder } from './codec.js';
import {
  RpcNotificationSchema,
  RpcResponseSchema,
  type PendingRequest,
  type RpcCallback,
  type RpcFraming,
  type RpcNotification,
  type RpcRequest,
  type RpcResponse,
} from './types.js';

export interface RpcCorrelatorOptions {
  /** Writes one encoded frame to the worker. */
  write: (frame: string) => void;
  framing?: RpcFraming;
  /** Malformed input; the connection stays up. */
  onDiagnostic?: (error: DecodeError) => void;
  /** Messages the worker sends on its own initiative. */
  onNotification?: (notification: RpcNotification) => void;
  logger?: Logger;
}

export class RpcCorrelator {
  private readonly write: (frame: string) => void;
  private readonly framing: RpcFraming;
  private readonly decoder: FrameDecoder;
  private readonly onDiagnostic?: (error: DecodeError) => void;
  private readonly onNotification?: (notification: RpcNotification) => void;
  private readonly logger: Logger;

  private readonly pending = new Map<number, PendingRequest>();
  private nextRequestId = 1;
  private _sessionId = 1;
  private _staleCount = 0;

  constructor(options: RpcCorrelatorOptions) {
    this.write = options.write;
    this.framing = options.framing ?? 'line';
    this.onDiagnostic = options.onDiagnostic;
    this.onNotification = options.onNotification;
    this.logger = options.logger ?? silentLogger;
    this.decoder = createFrameDecoder(this.framing, (header) =>
      this.report(new DecodeError('Frame header without Content-Length', header)),
    );
  }

  /** Send a request; `callback` fires at most once, with the answer. */
  send(method: string, params: Record<string, unknown>, callback: RpcCallback): number {
    const request: RpcRequest = {
      id: this.nextRequestId++,
      session_id: this._sessionId,
      method,
      params,
    };
    this.pending.set(request.id, {
      requestId: request.id,
      sessionId: request.session_id,
      method,
      callback,
      sentAt: Date.now(),
    });
    try {
      this.write(encodeFrame(this.framing, request));
    } catch (err) {
      this.pending.delete(request.id);
      throw err;
    }
    return request.id;
  }

  /** Fire-and-forget message; no id, no answer. */
  notify(method: string, params: Record<string, unknown>): void {
    this.write(encodeFrame(this.framing, { session_id: this._sessionId, method, params }));
  }

  /** Raw worker output; may hold partial or several frames. */
  feed(chunk: Buffer | string): void {
    for (const raw of this.decoder.feed(chunk)) {
      this.onMessage(raw);
    }
  }

  /** Handle one complete frame body. */
  onMessage(raw: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      this.report(new DecodeError('Invalid JSON from worker', raw, { cause: err }));
      return;
    }

    const response = RpcResponseSchema.safeParse(decoded);
    if (response.success) {
      this.dispatchResponse(response.data);
      return;
    }

    const notification = RpcNotificationSchema.safeParse(decoded);
    if (notification.success) {
      this.dispatchNotification(notification.data);
      return;
    }

    const error = new DecodeError(`Unrecognized message: ${response.error.issues[0]?.message ?? 'invalid shape'}`, raw);
    this.report(error);
    this.failPending(decoded, error);
  }

  /**
   * Start a new session. Requests of earlier sessions are forgotten; their
   * callbacks never fire.
   */
  newSession(): number {
    this._sessionId++;
    for (const [id, entry] of this.pending) {
      if (entry.sessionId !== this._sessionId) this.pending.delete(id);
    }
    return this._sessionId;
  }

  /** Answer every outstanding request with an error, e.g. when the worker is gone. */
  failAll(reason: string): number {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      entry.callback({ ok: false, error: reason });
    }
    return entries.length;
  }

  get sessionId(): number {
    return this._sessionId;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Responses dropped as stale or duplicate. */
  get staleCount(): number {
    return this._staleCount;
  }

  private dispatchResponse(response: RpcResponse): void {
    const entry = this.pending.get(response.id);
    if (!entry) {
      this._staleCount++;
      this.logger.debug(`dropped response for unknown id ${response.id}`);
      return;
    }

    this.pending.delete(response.id);
    const sessionId = response.session_id ?? entry.sessionId;
    if (sessionId !== this._sessionId) {
      this._staleCount++;
      this.logger.debug(`dropped response ${response.id} from session ${sessionId}`);
      return;
    }

    if (response.error !== undefined && response.error !== null) {
      const error = typeof response.error === 'string' ? response.error : response.error.message;
      entry.callback({ ok: false, error });
      return;
    }
    entry.callback({ ok: true, result: response.result });
  }

  /** A malformed answer still settles its request when the id is readable. */
  private failPending(decoded: unknown, error: DecodeError): void {
    if (typeof decoded !== 'object' || decoded === null || !('id' in decoded)) return;
    const id = decoded.id;
    if (typeof id !== 'number') return;
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    entry.callback({ ok: false, error: error.message, raw: error.raw });
  }

  private dispatchNotification(notification: RpcNotification): void {
    if (notification.session_id !== undefined && notification.session_id !== this._sessionId) {
      this._staleCount++;
      return;
    }
    this.onNotification?.(notification);
  }

  private report(error: DecodeError): void {
    this.logger.warn(error.message);
    this.onDiagnostic?.(error);
  }
}
