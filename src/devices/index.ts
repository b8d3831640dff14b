/**
 * Connection factory.
 *
 * Usage:
 *   import { createConnection } from './devices';
 *   const conn = createConnection(endpoint, options);
 */

export * from './device-connection';
export { RouterOSConnection, ROUTEROS_DEFAULT_PORT } from './routeros-connection';

import { ConnectionOptions, DeviceConnection, DeviceEndpoint } from './device-connection';
import { RouterOSConnection } from './routeros-connection';

export type ConnectionFactory = (endpoint: DeviceEndpoint, options: ConnectionOptions) => DeviceConnection;

export const SUPPORTED_VENDORS = ['mikrotik'] as const;

/** Create the vendor-specific connection for a device. */
export function createConnection(endpoint: DeviceEndpoint, options: ConnectionOptions): DeviceConnection {
  switch (endpoint.vendor) {
    case 'mikrotik':
      return new RouterOSConnection(endpoint, options);
    default:
      throw new Error(`Unsupported device vendor: ${endpoint.vendor}`);
  }
}
