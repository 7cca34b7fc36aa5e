/**
 * Tree Formatter
 *
 * Renders a UsbTree as indented text, one section per bus:
 *
 *   Bus 001
 *   ├── Device 002: ID 05e3:0610 USB 2.0 Hub
 *   │   └── Device 004: ID 046d:c52b Receiver
 *   └── Device 003: ID 0bda:8153 Ethernet
 *
 * Buses follow UsbTree.buses(); siblings follow PortTrie.childPorts(), so
 * output is identical for identical input. Trie keys that no longer resolve
 * are skipped.
 */

import type { PortTrie } from '../tree/port.trie.ts';
import type { UsbTree } from '../tree/usb.tree.ts';
import { logger } from '../type/logger.type.ts';
import { colorize } from '../util/color.util.ts';
import { TreeStyle } from './tree.style.ts';

export interface TreeFormatterOptions<T> {
  style?: TreeStyle;
  /** Text for one payload. Defaults to String(value). */
  describe?: (value: T) => string;
}

export class TreeFormatter<T> {
  readonly style: TreeStyle;
  private readonly tree: UsbTree<T>;
  private readonly describe: (value: T) => string;

  constructor(tree: UsbTree<T>, options: TreeFormatterOptions<T> = {}) {
    this.tree = tree;
    this.style = options.style ?? TreeStyle.default();
    this.describe = options.describe ?? String;
  }

  static plain<T>(tree: UsbTree<T>): TreeFormatter<T> {
    return new TreeFormatter(tree, { style: TreeStyle.plain() });
  }

  format(): string {
    const lines: string[] = [];

    for (const bus of this.tree.buses()) {
      const busTree = this.tree.busTree(bus);

      if (this.style.showHeader) {
        lines.push(this.paint(this.busLabel(bus, busTree), 0));
      } else {
        const root = this.resolve(busTree?.value);
        if (root !== undefined) lines.push(this.paint(root, 0));
      }

      if (busTree) {
        const ports = busTree.childPorts();
        ports.forEach((port, i) => {
          const child = busTree.child(port);
          if (child) this.renderNode(child, '', i === ports.length - 1, 1, lines);
        });
      }

      lines.push('');
    }

    return lines.map((line) => line + '\n').join('');
  }

  toString(): string {
    return this.format();
  }

  // ── Private ───────────────────────────────────────────────────────────

  private renderNode(
    node: PortTrie<string>,
    prefix: string,
    isLast: boolean,
    depth: number,
    lines: string[],
  ): void {
    const text = this.resolve(node.value);
    if (text !== undefined) {
      const connector = depth === 0 ? '' : isLast ? this.style.corner : this.style.branch;
      lines.push(prefix + connector + this.paint(text, depth));
    }

    let childPrefix = '';
    if (depth > 0) {
      childPrefix = prefix + (isLast ? this.style.indent : this.style.vertical);
    }

    const ports = node.childPorts();
    ports.forEach((port, i) => {
      const child = node.child(port);
      if (child) this.renderNode(child, childPrefix, i === ports.length - 1, depth + 1, lines);
    });
  }

  /** "Bus 001", or "Bus 001: <root payload>" when the bus root carries one. */
  private busLabel(bus: string, busTree: PortTrie<string> | undefined): string {
    const label = `Bus ${bus.padStart(3, '0')}`;
    const root = this.resolve(busTree?.value);
    return root === undefined ? label : `${label}: ${root}`;
  }

  private resolve(key: string | undefined): string | undefined {
    if (key === undefined) return undefined;
    const value = this.tree.devices.get(key);
    if (value === undefined) {
      logger.warn(`[TreeFormatter] Skipping unresolved key: ${key}`);
      return undefined;
    }
    return this.describe(value);
  }

  private paint(text: string, depth: number): string {
    return this.style.colored ? colorize(text, depth) : text;
  }
}
