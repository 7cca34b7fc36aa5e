/**
 * Device Path Errors
 *
 * Raised while parsing or constructing a DevicePath.
 */

export type DevicePathErrorCode =
  | 'MISSING_BUS'
  | 'INVALID_BUS'
  | 'INVALID_PORT'
  | 'INVALID_FORMAT';

const MESSAGES: Record<DevicePathErrorCode, (input?: string) => string> = {
  MISSING_BUS: () => 'missing bus number',
  INVALID_BUS: (input) => `invalid bus number: '${input}'`,
  INVALID_PORT: (input) => `invalid port number: '${input}'`,
  INVALID_FORMAT: () => "invalid format, expected 'bus:port.path'",
};

export class DevicePathError extends Error {
  constructor(
    public readonly code: DevicePathErrorCode,
    /** Offending bus or port text, for INVALID_BUS and INVALID_PORT. */
    public readonly input?: string,
  ) {
    super(MESSAGES[code](input));
    this.name = 'DevicePathError';
  }
}
