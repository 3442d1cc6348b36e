import WebSocket from 'ws';
import type { Logger } from '../logger.js';
import { Backoff } from '../services/backoff.js';
import { notifyExporters, type Exporter } from '../services/fanout.js';
import { isUpdatedKey, parseUpdateMessage, type UpdateMessage } from '../types/health.js';
import type { Receiver } from './types.js';

export type PullState = 'connecting' | 'connected' | 'stopped';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type WsPullReceiverOptions = {
  url: string;
  exporters: readonly Exporter[];
  logger: Logger;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  sleep?: Sleep;
};

// Remote closed on purpose; anything else counts as a failed session.
const CLEAN_CLOSE_CODES = new Set([1000, 1001]);

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

function decode(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

/**
 * Pull ingestion: keeps a WebSocket open to another bridge's broadcast
 * endpoint and re-exports every frame it receives.
 */
export class WsPullReceiver implements Receiver {
  readonly name = 'ws-pull';
  private readonly backoff: Backoff;
  private readonly abort = new AbortController();
  private readonly sleep: Sleep;
  private socket?: WebSocket;
  private loop?: Promise<void>;
  private _state: PullState = 'connecting';

  constructor(private readonly opts: WsPullReceiverOptions) {
    this.backoff = new Backoff({
      initialMs: opts.initialBackoffMs ?? 1000,
      maxMs: opts.maxBackoffMs ?? 10 * 60 * 1000
    });
    this.sleep = opts.sleep ?? abortableSleep;
  }

  get state(): PullState {
    return this._state;
  }

  async start() {
    this.loop ??= this.run().catch((err: unknown) => {
      this.opts.logger.error({ err }, 'Pull loop stopped');
    });
  }

  async stop() {
    this.abort.abort();
    this.socket?.terminate();
    await this.loop;
    this._state = 'stopped';
  }

  private async run() {
    const { logger } = this.opts;
    while (!this.abort.signal.aborted) {
      const err = await this.session();
      if (this.abort.signal.aborted) break;

      if (err) {
        const wait = this.backoff.fail();
        logger.error({ err, durationMs: wait }, 'Reconnecting in');
        await this.sleep(wait, this.abort.signal);
      } else {
        const wait = this.backoff.succeed();
        logger.info({ durationMs: wait }, 'Reconnecting in');
        await this.sleep(wait, this.abort.signal);
      }
    }
  }

  /** One connect-read cycle; resolves with the error that ended it, or null. */
  private session(): Promise<Error | null> {
    const { url, exporters, logger } = this.opts;
    this._state = 'connecting';

    return new Promise((resolve) => {
      let failure: Error | null = null;
      let ws: WebSocket;
      try {
        ws = new WebSocket(url);
      } catch (e) {
        resolve(new Error(`dialing websocket: ${e instanceof Error ? e.message : String(e)}`));
        return;
      }
      this.socket = ws;

      ws.on('open', () => {
        this._state = 'connected';
        logger.info({ url }, 'WebSocket connected, now receiving messages...');
      });

      ws.on('message', (raw) => {
        if (failure) return;
        let msg: UpdateMessage;
        try {
          msg = parseUpdateMessage(decode(raw));
        } catch (e) {
          failure = new Error(`decoding websocket message: ${e instanceof Error ? e.message : String(e)}`);
          ws.terminate();
          return;
        }
        const { data, updatedKey } = msg;
        if (!isUpdatedKey(updatedKey)) {
          logger.warn({ updatedKey }, 'Unknown key');
          return;
        }
        logger.debug({ updatedKey, data }, 'Received msg');
        notifyExporters(exporters, data, updatedKey, logger);
      });

      ws.on('error', (err) => {
        failure ??= new Error(`websocket: ${err.message}`);
      });

      ws.on('close', (code) => {
        this.socket = undefined;
        this._state = 'connecting';
        if (!failure && !CLEAN_CLOSE_CODES.has(code) && !this.abort.signal.aborted) {
          failure = new Error(`websocket closed with code ${code}`);
        }
        resolve(failure);
      });
    });
  }
}
