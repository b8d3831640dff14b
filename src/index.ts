#!/usr/bin/env node

/**
 * Bandwidth Poller
 *
 * Polls every active RouterOS access device for simple-queue rates at a
 * fixed cadence and appends one sample per mapped subscription queue to a
 * Redis stream.
 *
 * Usage:
 *   bandwidth-poller                      # Use config.yml in current directory
 *   bandwidth-poller --config ./my.yml    # Use a specific config file
 *   bandwidth-poller --verbose            # Debug logging
 */

import * as path from 'path';
import { loadConfig, Config } from './config';
import { initLogger, getLogger } from './logger';
import { FileInventory } from './inventory/file-inventory';
import { DevicePool } from './pool/device-pool';
import { Publisher } from './publisher/publisher';
import { RedisStreamSink } from './publisher/stream-sink';
import { Poller } from './poller/poller';
import { HealthServer } from './server/health-server';

interface CliOptions {
  configPath?: string;
  verbose: boolean;
}

function printHelp(): void {
  console.log('');
  console.log('  Bandwidth Poller');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./config.yml)');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --help, -h            Show this help');
  console.log('');
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) {
          throw new Error('--config requires a path');
        }
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/** Wire the service together from a resolved config. */
export function buildService(config: Config): { poller: Poller; pool: DevicePool; health: HealthServer | null } {
  const inventory = new FileInventory(path.resolve(config.inventory.path));

  const pool = new DevicePool(
    { directory: inventory, mappings: inventory },
    {
      vendor: config.devices.vendor,
      refreshIntervalMs: config.devices.refreshIntervalMs,
      connection: {
        timeoutMs: config.devices.timeoutMs,
        backoff: config.devices.backoff,
      },
    },
  );

  const publisher = new Publisher(
    new RedisStreamSink({ url: config.stream.url }),
    { streamName: config.stream.name, maxLength: config.stream.maxLength },
  );

  const poller = new Poller(pool, publisher, config.polling);

  const health = config.health.enabled
    ? new HealthServer({
      getPollerStats: () => poller.getStats(),
      getDeviceHealth: () => pool.getDeviceHealth(),
    })
    : null;

  return { poller, pool, health };
}

async function main(): Promise<void> {
  const cli = parseArgs(process.argv);
  const config = loadConfig(cli.configPath);

  initLogger({
    level: cli.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });
  const log = getLogger('Main');

  log.info(
    {
      intervalMs: config.polling.intervalMs,
      inventory: config.inventory.path,
      stream: config.stream.name,
      maxLength: config.stream.maxLength,
    },
    'Configuration loaded',
  );

  const { poller, health } = buildService(config);

  if (health) {
    await health.start(config.health.port);
  }

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    poller.stop()
      .then(() => health?.stop())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await poller.run();
  await health?.stop();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
