import type { HierarchicalKey } from "./types";

export const TOPOLOGY = [
  "channel",
  "package",
  "version",
  "subdir",
  "basename",
] as const;

export type LevelName = (typeof TOPOLOGY)[number];

export const LEAF_DEPTH = TOPOLOGY.length;

export function levelName(depth: number): LevelName {
  const name = TOPOLOGY[depth - 1];
  if (name === undefined) {
    throw new RangeError(`No topology level at depth ${depth}`);
  }
  return name;
}

export function levelOf(key: HierarchicalKey): LevelName {
  return levelName(key.length);
}

/** Level name of the children of `key`, or undefined for a leaf. */
export function childLevelName(key: HierarchicalKey): LevelName | undefined {
  return key.length < LEAF_DEPTH ? TOPOLOGY[key.length] : undefined;
}

export function parentKey(key: HierarchicalKey): HierarchicalKey | undefined {
  return key.length > 1 ? key.slice(0, -1) : undefined;
}

export function lastId(key: HierarchicalKey): string {
  const id = key[key.length - 1];
  if (id === undefined) {
    throw new RangeError("Empty key");
  }
  return id;
}

/** Stable string identity of a key. */
export function keyPath(key: HierarchicalKey): string {
  return JSON.stringify(key);
}

export function formatKey(key: HierarchicalKey): string {
  return key.join("::");
}
