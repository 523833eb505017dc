import type { DnsZoneProvider, ResourceRecord, ZoneDiff } from "../../types.ts";
import { ZoneStateError } from "../../errors.ts";
import { getAbsoluteHostName, recordKey } from "../../dns-logic/records.ts";

function rrsetKey(record: ResourceRecord) {
  return `${record.name} ${record.type}`;
}

/**
 * Zones held in this process, with the same all-or-nothing change rules as
 * the hosted providers: deletions must match exactly and additions must not
 * collide with a live record set.
 */
export class InMemoryZoneProvider implements DnsZoneProvider {
  readonly providerId = 'memory';
  #zones = new Map<string, Map<string, ResourceRecord>>();

  listCalls = 0;
  readonly appliedChanges = new Array<{zone: string, change: ZoneDiff}>();

  private getZone(zone: string) {
    let records = this.#zones.get(zone);
    if (!records) {
      records = new Map();
      this.#zones.set(zone, records);
    }
    return records;
  }

  /** Writes records directly, as an operator or another instance might */
  putRecords(zone: string, ...records: ResourceRecord[]) {
    const live = this.getZone(zone);
    for (const record of records) live.set(rrsetKey(record), record);
  }

  removeRecords(zone: string, ...records: ResourceRecord[]) {
    const live = this.getZone(zone);
    for (const record of records) live.delete(rrsetKey(record));
  }

  allRecords(zone: string): Array<ResourceRecord> {
    return Array.from(this.getZone(zone).values());
  }

  async ListRecords(zone: string, fqdn: string): Promise<Array<ResourceRecord>> {
    this.listCalls++;
    const absoluteName = getAbsoluteHostName(fqdn);
    return this.allRecords(zone).filter(x => x.name === absoluteName);
  }

  async ApplyChange(zone: string, change: ZoneDiff): Promise<void> {
    const next = new Map(this.getZone(zone));
    for (const deletion of change.deletions) {
      const live = next.get(rrsetKey(deletion));
      if (!live) throw new ZoneStateError('notFound');
      if (recordKey(live) !== recordKey(deletion)) throw new ZoneStateError('preconditionFailed');
      next.delete(rrsetKey(deletion));
    }
    for (const addition of change.additions) {
      if (next.has(rrsetKey(addition))) throw new ZoneStateError('alreadyExists');
      next.set(rrsetKey(addition), addition);
    }
    this.#zones.set(zone, next);
    this.appliedChanges.push({ zone, change });
  }
}
