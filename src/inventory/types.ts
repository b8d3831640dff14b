/**
 * Inventory Types
 *
 * The poller does not own device inventory or queue mappings. Both come
 * from outside through these two interfaces; FileInventory is the
 * implementation that ships with the service.
 */

/** A device as listed by the inventory */
export interface InventoryDevice {
  id: string;
  name?: string;
  vendor: string;
  host: string;
  port: number;
  username?: string;
  password?: string;
  active: boolean;
}

export interface DeviceDirectory {
  /** Active devices of the given vendor */
  listActiveDevices(vendor: string): Promise<InventoryDevice[]>;
}

export interface QueueMappingStore {
  /** Queue name -> subscription id for one device */
  getDeviceMapping(deviceId: string): Promise<Map<string, string>>;
}
