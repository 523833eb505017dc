import type { DesiredState, ResourceRecord, ZoneDiff } from "../types.ts";
import { recordKey } from "./records.ts";

function keyed(records: Iterable<ResourceRecord>) {
  const byKey = new Map<string, ResourceRecord>();
  for (const record of records) {
    byKey.set(recordKey(record), record);
  }
  return byKey;
}

/**
 * Everything to add and remove so that `existing` becomes `desired`.
 * Records present on both sides are left out of the change entirely.
 */
export function buildZoneDiff(
  desired: Iterable<ResourceRecord>,
  existing: Iterable<ResourceRecord>,
): ZoneDiff {
  const desiredByKey = keyed(desired);
  const existingByKey = keyed(existing);

  const additions = new Array<ResourceRecord>();
  for (const [key, record] of desiredByKey) {
    if (!existingByKey.has(key)) additions.push(record);
  }
  const deletions = new Array<ResourceRecord>();
  for (const [key, record] of existingByKey) {
    if (!desiredByKey.has(key)) deletions.push(record);
  }
  return { additions, deletions };
}

export function isEmptyDiff(diff: ZoneDiff): boolean {
  return diff.additions.length === 0 && diff.deletions.length === 0;
}

export function flattenDesiredState(state: DesiredState): Array<ResourceRecord> {
  return Array.from(state.values()).flat();
}
