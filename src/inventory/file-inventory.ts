/**
 * File Inventory
 *
 * Device directory and queue-mapping store backed by one YAML file. The
 * file is re-parsed whenever its mtime changes, so edits are picked up by
 * the next pool refresh without a restart.
 *
 * Expected format:
 * ```yaml
 * devices:
 *   - id: nas-1
 *     vendor: mikrotik
 *     host: 10.0.0.1
 *     port: 8728
 *     username: poller
 *     password: secret
 *     active: true
 *     queues:
 *       pppoe-alice: 5f0c...   # queue name -> subscription id
 * ```
 */

import { promises as fsp, Stats } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z, ZodError } from 'zod';
import { formatZodError } from '../config-schema';
import { ROUTEROS_DEFAULT_PORT } from '../devices/routeros-connection';
import { DeviceDirectory, InventoryDevice, QueueMappingStore } from './types';

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const inventoryDeviceSchema = z.object({
  id: idSchema,
  name: z.string().optional(),
  vendor: z.string().default('mikrotik'),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(ROUTEROS_DEFAULT_PORT),
  username: z.string().optional(),
  password: z.string().optional(),
  active: z.boolean().default(true),
  queues: z.record(z.string(), idSchema).default({}),
});

export const inventoryFileSchema = z.object({
  devices: z.array(inventoryDeviceSchema).default([]),
});

type InventoryFile = z.output<typeof inventoryFileSchema>;

/** Parse inventory YAML text. Throws with one line per validation issue. */
export function parseInventoryYaml(text: string): InventoryFile {
  const doc: unknown = parseYaml(text) ?? {};
  try {
    return inventoryFileSchema.parse(doc);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Inventory] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

export class FileInventory implements DeviceDirectory, QueueMappingStore {
  private readonly filePath: string;
  private cached: { mtimeMs: number; data: InventoryFile } | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async listActiveDevices(vendor: string): Promise<InventoryDevice[]> {
    const data = await this.load();
    return data.devices
      .filter((d) => d.active && d.vendor === vendor)
      .map((d) => ({
        id: d.id,
        name: d.name,
        vendor: d.vendor,
        host: d.host,
        port: d.port,
        username: d.username,
        password: d.password,
        active: d.active,
      }));
  }

  async getDeviceMapping(deviceId: string): Promise<Map<string, string>> {
    const data = await this.load();
    const device = data.devices.find((d) => d.id === deviceId);
    return new Map(device ? Object.entries(device.queues) : []);
  }

  private async load(): Promise<InventoryFile> {
    let stat: Stats;
    try {
      stat = await fsp.stat(this.filePath);
    } catch (err) {
      throw new Error(`[Inventory] Cannot read ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (this.cached && this.cached.mtimeMs === stat.mtimeMs) {
      return this.cached.data;
    }

    const raw = await fsp.readFile(this.filePath, 'utf-8');
    const data = parseInventoryYaml(raw);
    this.cached = { mtimeMs: stat.mtimeMs, data };
    return data;
  }
}
