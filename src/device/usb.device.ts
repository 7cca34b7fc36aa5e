/**
 * USB Device
 *
 * Payload stored in the device tree. Built from a DeviceRecord; printed as
 * "Device 004: ID 046d:c52b Unifying Receiver".
 */

import { DevicePath } from '../path/device.path.ts';
import type { DeviceRecord, UsbSpeed } from '../type/device.type.ts';

const HUB_CLASS = 0x09;

function hex4(value: number): string {
  return value.toString(16).padStart(4, '0');
}

/** Plain fields of a UsbDevice. */
export interface UsbDeviceInfo {
  vid: number;
  pid: number;
  bus: number;
  /** Device address on the bus. */
  address: number;
  /** Product string, or empty. */
  name: string;
  manufacturer?: string;
  product?: string;
  serial?: string;
  class: number;
  subclass: number;
  protocol: number;
  speed?: UsbSpeed;
  portPath: readonly number[];
}

export class UsbDevice implements UsbDeviceInfo {
  readonly vid: number;
  readonly pid: number;
  readonly bus: number;
  readonly address: number;
  readonly name: string;
  readonly manufacturer?: string;
  readonly product?: string;
  readonly serial?: string;
  readonly class: number;
  readonly subclass: number;
  readonly protocol: number;
  readonly speed?: UsbSpeed;
  readonly portPath: readonly number[];

  constructor(info: UsbDeviceInfo) {
    this.vid = info.vid;
    this.pid = info.pid;
    this.bus = info.bus;
    this.address = info.address;
    this.name = info.name;
    this.manufacturer = info.manufacturer;
    this.product = info.product;
    this.serial = info.serial;
    this.class = info.class;
    this.subclass = info.subclass;
    this.protocol = info.protocol;
    this.speed = info.speed;
    this.portPath = [...info.portPath];
  }

  static fromRecord(record: DeviceRecord): UsbDevice {
    return new UsbDevice({
      vid: record.vendorId,
      pid: record.productId,
      bus: record.busNumber,
      address: record.deviceAddress,
      name: record.productString ?? '',
      manufacturer: record.manufacturerString,
      product: record.productString,
      serial: record.serialNumber,
      class: record.class,
      subclass: record.subclass,
      protocol: record.protocol,
      speed: record.speed,
      portPath: [...record.portChain],
    });
  }

  /** "vvvv:pppp", lowercase hex. */
  vidPid(): string {
    return `${hex4(this.vid)}:${hex4(this.pid)}`;
  }

  isHub(): boolean {
    return this.class === HUB_CLASS;
  }

  /** @throws DevicePathError when bus or ports are outside 0–255 */
  path(): DevicePath {
    return new DevicePath(this.bus, this.portPath);
  }

  pathKey(): string {
    return this.path().toString();
  }

  toString(): string {
    const name = this.name === '' ? 'Unknown Device' : this.name;
    return `Device ${String(this.address).padStart(3, '0')}: ID ${this.vidPid()} ${name}`;
  }
}

/** True when `filters` is empty or any [vid, pid] pair matches. */
export function matchesVidPid(
  device: UsbDevice,
  filters: ReadonlyArray<readonly [number, number]>,
): boolean {
  if (filters.length === 0) return true;
  return filters.some(([vid, pid]) => device.vid === vid && device.pid === pid);
}
