/**
 * USB Tree
 *
 * Hierarchical index over USB device locations. Combines:
 * - a flat Map from canonical path string ("1:2.3") to payload, for O(1) lookup
 * - one PortTrie per bus whose values are keys into that Map, for O(depth)
 *   subtree queries and ordered rendering
 *
 * The flat Map owns every payload; tries only hold keys. insertPath() is the
 * single writer to both, which keeps every trie key resolvable.
 */

import { DevicePath } from '../path/device.path.ts';
import { DevicePathError } from '../path/path.error.ts';
import { logger } from '../type/logger.type.ts';
import { PortTrie } from './port.trie.ts';
import { UsbTreeError } from './tree.error.ts';

export class UsbTree<T> {
  private readonly entriesByKey = new Map<string, T>();
  private readonly tree = new Map<string, PortTrie<string>>();

  /** Read-only view of path key → payload. */
  get devices(): ReadonlyMap<string, T> {
    return this.entriesByKey;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  isEmpty(): boolean {
    return this.entriesByKey.size === 0;
  }

  // ── Writes ────────────────────────────────────────────────────────────

  /** Store `value` at `path`, replacing any previous value at that exact path. */
  insertPath(path: DevicePath, value: T): void {
    const key = path.toString();
    this.entriesByKey.set(key, value);

    const busKey = path.busKey();
    let trie = this.tree.get(busKey);
    if (!trie) {
      trie = new PortTrie<string>();
      this.tree.set(busKey, trie);
    }
    trie.insert(path.ports, key);
  }

  /**
   * Insert by bus id and port chain.
   *
   * @throws UsbTreeError INVALID_PATH when the bus is not a decimal in 0–255
   *   or a port is out of range
   */
  insert(bus: string, ports: readonly number[], value: T): void {
    let path: DevicePath;
    try {
      if (bus.includes(':')) throw new DevicePathError('INVALID_BUS', bus);
      path = new DevicePath(DevicePath.parse(`${bus}:`).bus, ports);
    } catch (e) {
      if (e instanceof DevicePathError) {
        throw UsbTreeError.invalidPath(e, `${bus}:${ports.join('.')}`);
      }
      throw e;
    }
    this.insertPath(path, value);
  }

  // ── Point lookups ─────────────────────────────────────────────────────

  getByPath(path: DevicePath): T | undefined {
    return this.entriesByKey.get(path.toString());
  }

  /**
   * Look up by path string. Tries the text as a key first, then parses it and
   * retries with the canonical form (so "1:02.3" finds "1:2.3").
   */
  get(path: string): T | undefined {
    const direct = this.entriesByKey.get(path);
    if (direct !== undefined) return direct;

    const parsed = DevicePath.tryParse(path);
    return parsed ? this.entriesByKey.get(parsed.toString()) : undefined;
  }

  /** @throws UsbTreeError DEVICE_NOT_FOUND */
  tryGet(path: string): T {
    const value = this.get(path);
    if (value === undefined) throw UsbTreeError.deviceNotFound(path);
    return value;
  }

  /** @throws UsbTreeError DEVICE_NOT_FOUND */
  tryGetByPath(path: DevicePath): T {
    const value = this.getByPath(path);
    if (value === undefined) throw UsbTreeError.deviceNotFound(path.toString());
    return value;
  }

  // ── Subtree queries ───────────────────────────────────────────────────

  /**
   * The value at `path` (if any) and every value below it.
   * Empty when the bus or the path is unknown.
   */
  getSubtreeByPath(path: DevicePath): T[] {
    const node = this.tree.get(path.busKey())?.lookup(path.ports);
    if (!node) return [];
    return this.resolveKeys(node.descendants());
  }

  /** String form of getSubtreeByPath. Unparsable text yields []. */
  getSubtree(path: string): T[] {
    const parsed = DevicePath.tryParse(path);
    return parsed ? this.getSubtreeByPath(parsed) : [];
  }

  /** Bus keys, sorted as strings ("10" before "2"). */
  buses(): string[] {
    return [...this.tree.keys()].sort();
  }

  /** Structural index for one bus. Values are keys into `devices`. */
  busTree(bus: string): PortTrie<string> | undefined {
    return this.tree.get(bus);
  }

  entries(): IterableIterator<[string, T]> {
    return this.entriesByKey.entries();
  }

  private resolveKeys(keys: string[]): T[] {
    const result: T[] = [];
    for (const key of keys) {
      const value = this.entriesByKey.get(key);
      if (value === undefined) {
        logger.warn(`[UsbTree] Dangling key in trie: ${key}`);
        continue;
      }
      result.push(value);
    }
    return result;
  }
}
