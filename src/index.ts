/**
 * usb-port-tree
 *
 * Path-indexed USB topology: canonical "bus:port.port" addresses, a per-bus
 * port trie with flat lookup, and a text tree renderer.
 */

// Types
export type { DeviceLister, DeviceRecord, UsbSpeed } from './type/device.type.ts';
export { type Logger, logger, resetLogger, setLogger } from './type/logger.type.ts';

// Paths
export { DevicePath } from './path/device.path.ts';
export { DevicePathError, type DevicePathErrorCode } from './path/path.error.ts';

// Tree
export { PortTrie } from './tree/port.trie.ts';
export { UsbTree } from './tree/usb.tree.ts';
export { UsbTreeError, type UsbTreeErrorCode } from './tree/tree.error.ts';

// Devices
export { matchesVidPid, UsbDevice, type UsbDeviceInfo } from './device/usb.device.ts';
export { buildUsbTree } from './device/device.builder.ts';

// Rendering
export { TreeFormatter, type TreeFormatterOptions } from './renderer/tree.formatter.ts';
export { TreeStyle, type TreeStyleOptions } from './renderer/tree.style.ts';
export { colorForDepth, colorize, DEPTH_PALETTE, type DepthColor } from './util/color.util.ts';
