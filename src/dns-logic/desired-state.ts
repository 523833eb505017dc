import type { DesiredState, ResourceRecord } from "../types.ts";
import { getAbsoluteHostName } from "./records.ts";

/**
 * Accumulates staged record sets for one batch.
 * Owned by exactly one writer; callers only ever see frozen snapshots.
 */
export class DesiredStateBuilder {
  #records = new Map<string, ReadonlyArray<ResourceRecord>>();

  /** Replaces whatever was staged for the name before */
  stage(name: string, records: Iterable<ResourceRecord>) {
    const absoluteName = getAbsoluteHostName(name);
    const list = Array.from(records);
    for (const record of list) {
      if (record.name !== absoluteName) throw new Error(
        `BUG: record for ${record.name} staged under ${absoluteName}`);
    }
    this.#records.set(absoluteName, Object.freeze(list));
  }

  has(name: string) {
    return this.#records.has(getAbsoluteHostName(name));
  }

  get size() {
    return this.#records.size;
  }

  snapshot(): DesiredState {
    return new Map(this.#records);
  }
}
