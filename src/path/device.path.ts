/**
 * Device Path
 *
 * Canonical address of a location in a USB topology: a bus number plus
 * the chain of hub ports leading to the device.
 *
 * String form is `bus:port.port.port`, e.g. "1:2.3.4". A bus root has an
 * empty chain and renders as "2:". Parsing and rendering are exact
 * inverses, and the rendered form is the key used by UsbTree.
 */

import { DevicePathError } from './path.error.ts';

const MAX_BYTE = 255;
const DECIMAL = /^[0-9]+$/;

/** Parse an unsigned 8-bit decimal. Returns undefined on anything else. */
function parseByte(text: string): number | undefined {
  if (!DECIMAL.test(text)) return undefined;
  const value = Number(text);
  return value <= MAX_BYTE ? value : undefined;
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_BYTE;
}

export class DevicePath {
  readonly bus: number;
  readonly ports: readonly number[];

  /**
   * @throws DevicePathError when `bus` or any port is not an integer in 0–255
   */
  constructor(bus: number, ports: readonly number[] = []) {
    if (!isByte(bus)) {
      throw new DevicePathError('INVALID_BUS', String(bus));
    }
    for (const port of ports) {
      if (!isByte(port)) {
        throw new DevicePathError('INVALID_PORT', String(port));
      }
    }
    this.bus = bus;
    this.ports = Object.freeze([...ports]);
  }

  /** Path of the bus root itself (no ports). */
  static busOnly(bus: number): DevicePath {
    return new DevicePath(bus, []);
  }

  /**
   * Parse "bus:port.port" into a DevicePath.
   *
   * Splits at the first colon. An empty remainder is a bus root; otherwise
   * every dot-separated token must be a decimal in 0–255.
   */
  static parse(text: string): DevicePath {
    const colon = text.indexOf(':');
    if (colon < 0) {
      throw new DevicePathError('INVALID_FORMAT');
    }

    const busText = text.slice(0, colon);
    const portText = text.slice(colon + 1);

    if (busText === '') {
      throw new DevicePathError('MISSING_BUS');
    }

    const bus = parseByte(busText);
    if (bus === undefined) {
      throw new DevicePathError('INVALID_BUS', busText);
    }

    if (portText === '') {
      return new DevicePath(bus, []);
    }

    const ports = portText.split('.').map((token) => {
      const port = parseByte(token);
      if (port === undefined) {
        throw new DevicePathError('INVALID_PORT', token);
      }
      return port;
    });

    return new DevicePath(bus, ports);
  }

  /** Like parse, but returns undefined instead of throwing. */
  static tryParse(text: string): DevicePath | undefined {
    try {
      return DevicePath.parse(text);
    } catch (e) {
      if (e instanceof DevicePathError) return undefined;
      throw e;
    }
  }

  /** Number of ports in the chain. */
  get depth(): number {
    return this.ports.length;
  }

  isBusOnly(): boolean {
    return this.ports.length === 0;
  }

  /** One level up, or undefined for a bus root. */
  parent(): DevicePath | undefined {
    if (this.ports.length === 0) return undefined;
    return new DevicePath(this.bus, this.ports.slice(0, -1));
  }

  child(port: number): DevicePath {
    return new DevicePath(this.bus, [...this.ports, port]);
  }

  isAncestorOf(other: DevicePath): boolean {
    if (this.bus !== other.bus) return false;
    if (this.ports.length >= other.ports.length) return false;
    return this.ports.every((port, i) => other.ports[i] === port);
  }

  isDescendantOf(other: DevicePath): boolean {
    return other.isAncestorOf(this);
  }

  equals(other: DevicePath): boolean {
    return (
      this.bus === other.bus &&
      this.ports.length === other.ports.length &&
      this.ports.every((port, i) => other.ports[i] === port)
    );
  }

  /** Bus number as a map key ("1", "10"). */
  busKey(): string {
    return String(this.bus);
  }

  /** Canonical string key; same as toString(). */
  toKey(): string {
    return this.toString();
  }

  toString(): string {
    return `${this.bus}:${this.ports.join('.')}`;
  }
}
