/**
 * Device Tree Builder
 *
 * Populates a UsbTree<UsbDevice> from a DeviceLister snapshot.
 */

import { DevicePathError } from '../path/path.error.ts';
import { UsbTreeError } from '../tree/tree.error.ts';
import { UsbTree } from '../tree/usb.tree.ts';
import type { DeviceLister, DeviceRecord } from '../type/device.type.ts';
import { logger } from '../type/logger.type.ts';
import { UsbDevice } from './usb.device.ts';

function listAll(listDevices: DeviceLister): DeviceRecord[] {
  try {
    return [...listDevices()];
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw UsbTreeError.listDevices(detail, e);
  }
}

/**
 * Enumerate devices and index them by path.
 *
 * @throws UsbTreeError LIST_DEVICES when the lister fails
 * @throws UsbTreeError INVALID_PATH when a record's bus or ports are out of range
 */
export function buildUsbTree(listDevices: DeviceLister): UsbTree<UsbDevice> {
  const records = listAll(listDevices);
  const tree = new UsbTree<UsbDevice>();

  for (const record of records) {
    const device = UsbDevice.fromRecord(record);
    try {
      tree.insertPath(device.path(), device);
    } catch (e) {
      if (e instanceof DevicePathError) {
        throw UsbTreeError.invalidPath(e, `${record.busNumber}:${record.portChain.join('.')}`);
      }
      throw e;
    }
  }

  logger.debug(`[buildUsbTree] Indexed ${tree.size} devices on ${tree.buses().length} buses`);
  return tree;
}
