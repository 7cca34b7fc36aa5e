/**
 * USB Tree Errors
 */

export type UsbTreeErrorCode = 'LIST_DEVICES' | 'DEVICE_NOT_FOUND' | 'INVALID_PATH';

export class UsbTreeError extends Error {
  /** Lookup string for DEVICE_NOT_FOUND, path text for INVALID_PATH. */
  readonly path?: string;

  constructor(
    message: string,
    public readonly code: UsbTreeErrorCode,
    options: { path?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'UsbTreeError';
    this.path = options.path;
  }

  static deviceNotFound(path: string): UsbTreeError {
    return new UsbTreeError(`device not found at path: '${path}'`, 'DEVICE_NOT_FOUND', { path });
  }

  static invalidPath(cause: Error, path?: string): UsbTreeError {
    return new UsbTreeError(`invalid device path: ${cause.message}`, 'INVALID_PATH', {
      path,
      cause,
    });
  }

  static listDevices(detail: string, cause?: unknown): UsbTreeError {
    return new UsbTreeError(`failed to list USB devices: ${detail}`, 'LIST_DEVICES', { cause });
  }
}
