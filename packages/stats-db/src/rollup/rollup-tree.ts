import { keyPath, lastId, parentKey } from "../topology";
import type { EntitySeries, HierarchicalKey } from "../types";

export interface RollupNode {
  key: HierarchicalKey;
  series: EntitySeries;
}

export interface ParentGroup {
  parent: HierarchicalKey;
  /** Children by their own identifier. */
  children: Map<string, RollupNode>;
}

/**
 * The nodes of one level, grouped under their parent keys.
 */
export class RollupLevel {
  private readonly groups = new Map<string, ParentGroup>();

  constructor(nodes: Iterable<RollupNode> = []) {
    for (const node of nodes) {
      this.add(node);
    }
  }

  add(node: RollupNode): void {
    const parent = parentKey(node.key);
    if (!parent) {
      throw new RangeError(`Root key ${keyPath(node.key)} has no parent`);
    }
    const path = keyPath(parent);
    let group = this.groups.get(path);
    if (!group) {
      group = { parent, children: new Map() };
      this.groups.set(path, group);
    }
    group.children.set(lastId(node.key), node);
  }

  parents(): ParentGroup[] {
    return Array.from(this.groups.values());
  }
}
