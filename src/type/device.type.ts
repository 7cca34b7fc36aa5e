/**
 * Device Records
 *
 * Shape of what the platform enumeration layer hands over. Enumeration
 * itself is not part of this library; anything that can produce these
 * records (an OS binding, a JSON snapshot, a test fixture) plugs in as a
 * DeviceLister.
 */

export type UsbSpeed = 'low' | 'full' | 'high' | 'super' | 'super-plus';

export interface DeviceRecord {
  busNumber: number;
  /** Hub ports from the root hub down; empty for a root hub. */
  portChain: readonly number[];
  deviceAddress: number;
  vendorId: number;
  productId: number;
  class: number;
  subclass: number;
  protocol: number;
  productString?: string;
  manufacturerString?: string;
  serialNumber?: string;
  speed?: UsbSpeed;
}

/** Synchronous device enumeration. May throw; buildUsbTree wraps the failure. */
export type DeviceLister = () => Iterable<DeviceRecord>;
