import { afterEach, describe, expect, test, vi } from 'vitest';
import { buildUsbTree } from '../../src/device/device.builder.ts';
import { DevicePathError } from '../../src/path/path.error.ts';
import { TreeFormatter } from '../../src/renderer/tree.formatter.ts';
import { TreeStyle } from '../../src/renderer/tree.style.ts';
import { UsbTreeError } from '../../src/tree/tree.error.ts';
import { resetLogger, setLogger } from '../../src/type/logger.type.ts';
import { record } from './test.util.ts';

function catchTreeError(fn: () => unknown): UsbTreeError {
  try {
    fn();
  } catch (e) {
    if (e instanceof UsbTreeError) return e;
    throw e;
  }
  throw new Error('expected a UsbTreeError');
}

const SNAPSHOT = [
  record({ busNumber: 1, portChain: [], deviceAddress: 1, productString: 'Root Hub' }),
  record({
    busNumber: 1,
    portChain: [2],
    deviceAddress: 2,
    vendorId: 0x05e3,
    productId: 0x0610,
    productString: 'USB 2.0 Hub',
  }),
  record({
    busNumber: 1,
    portChain: [2, 1],
    deviceAddress: 4,
    vendorId: 0x046d,
    productId: 0xc52b,
    class: 0,
    productString: 'Receiver',
  }),
  record({
    busNumber: 1,
    portChain: [1],
    deviceAddress: 3,
    vendorId: 0x0bda,
    productId: 0x8153,
    class: 0,
  }),
];

describe('buildUsbTree', () => {
  afterEach(() => {
    resetLogger();
  });

  test('indexes every record by its path', () => {
    const tree = buildUsbTree(() => SNAPSHOT);
    expect(tree.size).toBe(4);
    expect(tree.get('1:2.1')?.name).toBe('Receiver');
    expect(tree.getSubtree('1:2').map((d) => d.address).sort()).toEqual([2, 4]);
  });

  test('accepts any iterable', () => {
    function* lister() {
      yield record({ busNumber: 5, portChain: [3] });
    }
    expect(buildUsbTree(lister).buses()).toEqual(['5']);
  });

  test('renders the snapshot', () => {
    const tree = buildUsbTree(() => SNAPSHOT);
    const out = new TreeFormatter(tree, { style: TreeStyle.ascii().withColor(false) }).format();
    expect(out.split('\n')).toEqual([
      'Bus 001: Device 001: ID 1d6b:0002 Root Hub',
      '|-- Device 003: ID 0bda:8153 Unknown Device',
      '`-- Device 002: ID 05e3:0610 USB 2.0 Hub',
      '    `-- Device 004: ID 046d:c52b Receiver',
      '',
      '',
    ]);
  });

  test('lister failure becomes LIST_DEVICES', () => {
    const failure = new Error('permission denied');
    const err = catchTreeError(() =>
      buildUsbTree(() => {
        throw failure;
      }),
    );
    expect(err.code).toBe('LIST_DEVICES');
    expect(err.message).toBe('failed to list USB devices: permission denied');
    expect(err.cause).toBe(failure);
  });

  test('non-Error failure detail is stringified', () => {
    const err = catchTreeError(() =>
      buildUsbTree(() => {
        throw 'no backend';
      }),
    );
    expect(err.message).toBe('failed to list USB devices: no backend');
  });

  test('out-of-range record is surfaced as INVALID_PATH', () => {
    const err = catchTreeError(() =>
      buildUsbTree(() => [record({ busNumber: 1, portChain: [2] }), record({ busNumber: 256 })]),
    );
    expect(err.code).toBe('INVALID_PATH');
    expect(err.path).toBe('256:');
    expect(err.cause).toBeInstanceOf(DevicePathError);
  });

  test('logs a debug summary', () => {
    const debug = vi.fn();
    setLogger({ debug, warn: vi.fn() });
    buildUsbTree(() => SNAPSHOT);
    expect(debug).toHaveBeenCalledWith('[buildUsbTree] Indexed 4 devices on 1 buses');
  });
});
