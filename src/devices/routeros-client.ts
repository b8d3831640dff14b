/**
 * RouterOS API Client
 *
 * One TCP session to one device. Commands are tagged so replies can be
 * matched even if several are in flight; every command and the initial
 * connect are bounded by the configured timeout.
 *
 * Login supports both flavours:
 *   - RouterOS >= 6.43: /login =name= =password=  -> !done
 *   - older releases:   /login                     -> !done =ret=<challenge>
 *                       /login =name= =response=00<md5(0x00 + password + challenge)>
 */

import * as net from 'net';
import { createHash } from 'crypto';
import {
  RouterOSError,
  RouterOSReply,
  SentenceParser,
  buildCommand,
  encodeSentence,
  parseReply,
} from './routeros-protocol';

export interface RouterOSClientOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  timeoutMs: number;
}

export interface CommandResult {
  records: Record<string, string>[];
  /** Attributes carried on the closing !done */
  done: Record<string, string>;
}

interface PendingCommand {
  command: string;
  records: Record<string, string>[];
  resolve: (result: CommandResult) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class RouterOSClient {
  private readonly options: RouterOSClientOptions;
  private socket: net.Socket | null = null;
  private parser = new SentenceParser();
  private pending: Map<string, PendingCommand> = new Map();
  private nextTag = 0;

  constructor(options: RouterOSClientOptions) {
    this.options = options;
  }

  /**
   * Open the TCP session and authenticate. Aborting `signal` closes the
   * half-open session at once and rejects.
   */
  static async open(options: RouterOSClientOptions, signal?: AbortSignal): Promise<RouterOSClient> {
    const client = new RouterOSClient(options);
    const abort = (): void => client.close();
    signal?.addEventListener('abort', abort, { once: true });
    try {
      if (signal?.aborted) {
        throw new RouterOSError('closed', `Session to ${options.host} aborted`);
      }
      await client.connect();
      await client.login();
      if (signal?.aborted) {
        throw new RouterOSError('closed', `Session to ${options.host} aborted`);
      }
    } catch (err) {
      client.close();
      throw err;
    } finally {
      signal?.removeEventListener('abort', abort);
    }
    return client;
  }

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  connect(): Promise<void> {
    const { host, port, timeoutMs } = this.options;

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;
      this.parser.reset();
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(new RouterOSError('timeout', `Connect to ${host}:${port} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.setNoDelay(true);

      socket.on('connect', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => this.handleData(chunk));

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(err);
          return;
        }
        this.failAll(err);
      });

      socket.on('close', () => {
        if (this.socket === socket) {
          this.socket = null;
        }
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(new RouterOSError('closed', `Connection to ${host}:${port} closed before connect`));
        }
        this.failAll(new RouterOSError('closed', `Connection to ${host}:${port} closed`));
      });

      socket.connect(port, host);
    });
  }

  async login(): Promise<void> {
    const { username, password } = this.options;
    try {
      const first = await this.request('/login', { name: username, password });
      const challenge = first.done.ret;
      if (challenge) {
        const digest = createHash('md5')
          .update(Buffer.from([0x00]))
          .update(password, 'utf-8')
          .update(Buffer.from(challenge, 'hex'))
          .digest('hex');
        await this.request('/login', { name: username, response: `00${digest}` });
      }
    } catch (err) {
      if (err instanceof RouterOSError && err.kind === 'trap') {
        throw new RouterOSError('login', `Login rejected for ${username}@${this.options.host}: ${err.message}`);
      }
      throw err;
    }
  }

  /** Run a command and return its !re records. */
  async command(command: string, params: Record<string, string> = {}): Promise<Record<string, string>[]> {
    const result = await this.request(command, params);
    return result.records;
  }

  request(command: string, params: Record<string, string> = {}): Promise<CommandResult> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new RouterOSError('closed', `Not connected to ${this.options.host}`));
    }

    const tag = String(++this.nextTag);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(tag);
        reject(new RouterOSError('timeout', `${command} timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      this.pending.set(tag, { command, records: [], resolve, reject, timer });
      socket.write(encodeSentence(buildCommand(command, params, tag)));
    });
  }

  /** Idempotent. Fails every outstanding command. */
  close(): void {
    const socket = this.socket;
    this.socket = null;
    if (socket && !socket.destroyed) {
      socket.destroy();
    }
    this.parser.reset();
    this.failAll(new RouterOSError('closed', `Connection to ${this.options.host} closed`));
  }

  private handleData(chunk: Buffer): void {
    let sentences: string[][];
    try {
      sentences = this.parser.feed(chunk);
    } catch (err) {
      this.failAll(err instanceof Error ? err : new RouterOSError('protocol', String(err)));
      this.close();
      return;
    }

    for (const words of sentences) {
      let reply: RouterOSReply;
      try {
        reply = parseReply(words);
      } catch (err) {
        this.failAll(err instanceof Error ? err : new RouterOSError('protocol', String(err)));
        this.close();
        return;
      }
      this.dispatch(reply);
    }
  }

  private dispatch(reply: RouterOSReply): void {
    if (reply.type === '!fatal') {
      this.failAll(new RouterOSError('fatal', reply.message ?? 'fatal error'));
      this.close();
      return;
    }

    const pending = reply.tag !== undefined ? this.pending.get(reply.tag) : undefined;
    if (!pending || reply.tag === undefined) return;

    switch (reply.type) {
      case '!re':
        pending.records.push(reply.attributes);
        break;
      case '!trap':
        // The device still sends !done for this tag; it is ignored once removed.
        this.settle(reply.tag, pending);
        pending.reject(new RouterOSError('trap', reply.attributes.message ?? `${pending.command} failed`));
        break;
      case '!done':
      case '!empty':
        this.settle(reply.tag, pending);
        pending.resolve({ records: pending.records, done: reply.attributes });
        break;
    }
  }

  private settle(tag: string, pending: PendingCommand): void {
    clearTimeout(pending.timer);
    this.pending.delete(tag);
  }

  private failAll(err: Error): void {
    const entries = Array.from(this.pending.entries());
    this.pending.clear();
    for (const [, pending] of entries) {
      clearTimeout(pending.timer);
      pending.reject(err);
    }
  }
}
