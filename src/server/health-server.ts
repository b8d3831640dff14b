/**
 * Health check HTTP server.
 *
 * GET /ping    → 200 "pong" (liveness for process supervisors)
 * GET /health  → 200 {"status":"ok",...} while the poller is running,
 *                503 {"status":"degraded",...} otherwise
 */

import * as http from 'http';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { DeviceHealth } from '../devices/device-connection';
import { PollerStats } from '../poller/types';

export interface HealthSources {
  getPollerStats(): PollerStats;
  getDeviceHealth(): DeviceHealth[];
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  uptimeSeconds: number;
  poller: PollerStats;
  devices: {
    total: number;
    connected: number;
    list: DeviceHealth[];
  };
}

export class HealthServer {
  private readonly sources: HealthSources;
  private readonly log: Logger;
  private server: http.Server | null = null;
  private readonly startedAt = Date.now();

  constructor(sources: HealthSources) {
    this.sources = sources;
    this.log = getLogger('Health');
  }

  getStatus(): HealthStatus {
    const poller = this.sources.getPollerStats();
    const list = this.sources.getDeviceHealth();
    return {
      status: poller.state === 'running' ? 'ok' : 'degraded',
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      poller,
      devices: {
        total: list.length,
        connected: list.filter((d) => d.state === 'connected').length,
        list,
      },
    };
  }

  /** Listen; resolves to the bound port. */
  start(port: number, host = '0.0.0.0'): Promise<number> {
    const server = http.createServer((req, res) => this.handle(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (err: NodeJS.ErrnoException) => {
          this.log.error({ error: err.message }, 'Health server error');
        });
        const address = server.address();
        const bound = address !== null && typeof address !== 'string' ? address.port : port;
        this.log.info({ port: bound }, 'Health endpoint listening');
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (req.method === 'GET' && req.url === '/ping') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('pong');
      return;
    }

    if (req.method === 'GET' && req.url === '/health') {
      const status = this.getStatus();
      res.writeHead(status.status === 'ok' ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(status, null, 2));
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found' }));
  }
}
