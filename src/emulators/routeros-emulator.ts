/**
 * RouterOSEmulator: in-process stand-in for a MikroTik API endpoint
 *
 * Listens on a real TCP port and speaks enough of the RouterOS API for
 * the poller: /login (plain or legacy challenge), /queue/simple/print,
 * /system/identity/print and /quit. Tests and local runs point device
 * entries at it instead of a router.
 *
 * Fault knobs:
 *   responseDelayMs  delay before every reply
 *   hang             swallow commands without replying
 */

import * as net from 'net';
import { createHash, randomBytes } from 'crypto';
import { SentenceParser, encodeSentence } from '../devices/routeros-protocol';

export interface EmulatedQueue {
  name: string;
  target?: string;
  /** "rx/tx" bytes per second */
  rate: string;
  bytes?: string;
  packets?: string;
}

export interface RouterOSEmulatorOptions {
  username: string;
  password: string;
  identity?: string;
  queues?: EmulatedQueue[];
  legacyLogin?: boolean;
  responseDelayMs?: number;
}

interface EmulatorRequest {
  command: string;
  params: Record<string, string>;
  tag?: string;
}

interface SessionState {
  authenticated: boolean;
  challenge: Buffer | null;
}

export interface EmulatorLogEntry {
  timestamp: number;
  command: string;
}

function parseRequest(words: string[]): EmulatorRequest {
  const [command = '', ...rest] = words;
  const request: EmulatorRequest = { command, params: {} };
  for (const word of rest) {
    if (word.startsWith('.tag=')) {
      request.tag = word.slice('.tag='.length);
    } else if (word.startsWith('=')) {
      const sep = word.indexOf('=', 1);
      if (sep === -1) request.params[word.slice(1)] = '';
      else request.params[word.slice(1, sep)] = word.slice(sep + 1);
    }
  }
  return request;
}

export class RouterOSEmulator {
  private readonly options: RouterOSEmulatorOptions;
  private server: net.Server | null = null;
  private sockets: Set<net.Socket> = new Set();
  private queues: EmulatedQueue[];
  private _log: EmulatorLogEntry[] = [];
  private _logins = 0;

  responseDelayMs: number;
  hang = false;

  constructor(options: RouterOSEmulatorOptions) {
    this.options = options;
    this.queues = options.queues ?? [];
    this.responseDelayMs = options.responseDelayMs ?? 0;
  }

  /** Start listening; resolves to the bound port. */
  start(port = 0, host = '127.0.0.1'): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.accept(socket));
      this.server = server;
      server.once('error', reject);
      server.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Emulator bound to a non-TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  /** Drop every session and stop listening. */
  stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  /** Currently open client sessions */
  get connectionCount(): number {
    return this.sockets.size;
  }

  /** Successful logins since start */
  get loginCount(): number {
    return this._logins;
  }

  setQueues(queues: EmulatedQueue[]): void {
    this.queues = queues;
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    const parser = new SentenceParser();
    const session: SessionState = { authenticated: false, challenge: null };

    socket.on('data', (chunk: Buffer) => {
      let sentences: string[][];
      try {
        sentences = parser.feed(chunk);
      } catch {
        socket.destroy();
        return;
      }
      for (const words of sentences) {
        this.handle(socket, session, parseRequest(words));
      }
    });
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => this.sockets.delete(socket));
  }

  private handle(socket: net.Socket, session: SessionState, request: EmulatorRequest): void {
    this._log.push({ timestamp: Date.now(), command: request.command });
    if (this.hang) return;

    const replies = this.respond(session, request);
    const send = (): void => {
      if (socket.destroyed) return;
      for (const words of replies) {
        socket.write(encodeSentence(request.tag !== undefined && words[0] !== '!fatal' ? [...words, `.tag=${request.tag}`] : words));
      }
      if (request.command === '/quit') socket.end();
    };

    if (this.responseDelayMs > 0) {
      setTimeout(send, this.responseDelayMs);
    } else {
      send();
    }
  }

  private respond(session: SessionState, request: EmulatorRequest): string[][] {
    const { command, params } = request;

    if (command === '/login') {
      return this.login(session, params);
    }
    if (command === '/quit') {
      return [['!fatal', 'session terminated on request']];
    }
    if (!session.authenticated) {
      return [['!trap', '=message=not logged in'], ['!done']];
    }

    switch (command) {
      case '/queue/simple/print':
        return [
          ...this.queues.map((q, i) => [
            '!re',
            `=.id=*${(i + 1).toString(16).toUpperCase()}`,
            `=name=${q.name}`,
            `=target=${q.target ?? ''}`,
            `=rate=${q.rate}`,
            `=bytes=${q.bytes ?? '0/0'}`,
            `=packets=${q.packets ?? '0/0'}`,
          ]),
          ['!done'],
        ];
      case '/system/identity/print':
        return [['!re', `=name=${this.options.identity ?? 'MikroTik'}`], ['!done']];
      default:
        return [['!trap', '=message=no such command prefix'], ['!done']];
    }
  }

  private login(session: SessionState, params: Record<string, string>): string[][] {
    const denied = [['!trap', '=message=invalid user name or password (6)'], ['!done']];
    const { username, password } = this.options;

    if (this.options.legacyLogin) {
      if (params.response === undefined) {
        session.challenge = randomBytes(16);
        return [['!done', `=ret=${session.challenge.toString('hex')}`]];
      }
      if (!session.challenge || params.name !== username) return denied;
      const expected = '00' + createHash('md5')
        .update(Buffer.from([0x00]))
        .update(password, 'utf-8')
        .update(session.challenge)
        .digest('hex');
      session.challenge = null;
      if (params.response !== expected) return denied;
    } else if (params.name !== username || params.password !== password) {
      return denied;
    }

    session.authenticated = true;
    this._logins++;
    return [['!done']];
  }
}
