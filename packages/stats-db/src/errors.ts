import { formatKey, lastId } from "./topology";
import type { HierarchicalKey } from "./types";

export class DataIntegrityError extends Error {
  readonly key: HierarchicalKey;

  constructor(key: HierarchicalKey, message: string) {
    super(`Data integrity error for ${formatKey(key)}: ${message}`);
    this.name = "DataIntegrityError";
    this.key = key;
  }
}

export class PersistenceError extends Error {
  readonly key: HierarchicalKey;

  constructor(key: HierarchicalKey, cause: unknown) {
    super(
      `Failed to persist ${formatKey(key)}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "PersistenceError";
    this.key = key;
  }
}

/** A parent left as stored because one of its children failed. */
export class IncompleteRollupError extends Error {
  readonly key: HierarchicalKey;
  readonly child: HierarchicalKey;

  constructor(key: HierarchicalKey, child: HierarchicalKey) {
    super(`${formatKey(key)} was not rolled up: child ${lastId(child)} failed`);
    this.name = "IncompleteRollupError";
    this.key = key;
    this.child = child;
  }
}

export class CountSourceError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`Request to ${url} failed: ${message}`);
    this.name = "CountSourceError";
    this.url = url;
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
