/**
 * Port Trie
 *
 * Prefix tree keyed by chains of single-byte port numbers. Each node holds
 * at most one value; intermediate nodes (hubs without a payload) may be
 * empty. Children live in a Map, so no order is implied by storage;
 * childPorts() is the only place ordering is imposed.
 */

export class PortTrie<T> {
  private payload?: T;
  private readonly children = new Map<number, PortTrie<T>>();

  /** Value stored at this node, if any. */
  get value(): T | undefined {
    return this.payload;
  }

  /**
   * Store `value` at the node for `ports`, creating missing intermediate
   * nodes. Replaces an existing value at that node only.
   */
  insert(ports: readonly number[], value: T): void {
    let node: PortTrie<T> = this;
    for (const port of ports) {
      let next = node.children.get(port);
      if (!next) {
        next = new PortTrie<T>();
        node.children.set(port, next);
      }
      node = next;
    }
    node.payload = value;
  }

  /** Node at `ports`, or undefined if any segment is missing. Empty chain → this. */
  lookup(ports: readonly number[]): PortTrie<T> | undefined {
    let node: PortTrie<T> | undefined = this;
    for (const port of ports) {
      node = node.children.get(port);
      if (!node) return undefined;
    }
    return node;
  }

  /** Immediate child for `port`. */
  child(port: number): PortTrie<T> | undefined {
    return this.children.get(port);
  }

  /**
   * Every value in this subtree, pre-order: own value first, then each
   * child's subtree. Sibling order is unspecified.
   */
  descendants(): T[] {
    const result: T[] = [];
    const stack: PortTrie<T>[] = [this];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      if (node.payload !== undefined) {
        result.push(node.payload);
      }
      // Reverse so the first child is visited next.
      const kids = [...node.children.values()];
      for (let i = kids.length - 1; i >= 0; i--) {
        stack.push(kids[i]);
      }
    }

    return result;
  }

  /** Immediate child ports, ascending. */
  childPorts(): number[] {
    return [...this.children.keys()].sort((a, b) => a - b);
  }

  /** Immediate children that carry a value. Order unspecified. */
  directChildren(): Array<[number, T]> {
    const result: Array<[number, T]> = [];
    for (const [port, child] of this.children) {
      if (child.payload !== undefined) {
        result.push([port, child.payload]);
      }
    }
    return result;
  }
}
