import { HttpError } from "../../errors.ts";
import type { CloudDnsApiSurface, Schema$Change, Schema$ResourceRecordSet } from "./api.ts";

function rrsetKey(rrset: Pick<Schema$ResourceRecordSet, 'name' | 'type'>) {
  return `${rrset.name.toLowerCase()} ${rrset.type}`;
}

function sameRrset(a: Schema$ResourceRecordSet, b: Schema$ResourceRecordSet) {
  const dataA = [...a.rrdatas ?? []].sort();
  const dataB = [...b.rrdatas ?? []].sort();
  return rrsetKey(a) === rrsetKey(b)
    && (a.ttl ?? 0) === (b.ttl ?? 0)
    && JSON.stringify(dataA) === JSON.stringify(dataB);
}

function apiError(status: number, reason: string, message: string) {
  return new HttpError('google', status, reason, JSON.stringify({
    error: { code: status, message, errors: [{ reason, message }] },
  }));
}

/** Behaves like one Cloud DNS project, checking changes the way the real API does */
export class CloudDnsApiMock implements CloudDnsApiSurface {

  #zones = new Map<string, Map<string, Schema$ResourceRecordSet>>();
  readonly submittedChanges = new Array<{zoneName: string, change: Schema$Change}>();
  listCalls = 0;
  /** Next submitChange fails with this instead of being applied */
  failNextChangeWith: Error | null = null;

  addMockedZone(zoneName: string, rrsets: Array<Schema$ResourceRecordSet> = []) {
    const zone = new Map<string, Schema$ResourceRecordSet>();
    for (const rrset of rrsets) zone.set(rrsetKey(rrset), rrset);
    this.#zones.set(zoneName, zone);
  }

  /** Changes the zone behind the writer's back */
  putRecordSet(zoneName: string, rrset: Schema$ResourceRecordSet) {
    this.getZone(zoneName).set(rrsetKey(rrset), rrset);
  }

  getRecordSets(zoneName: string) {
    return Array.from(this.getZone(zoneName).values());
  }

  private getZone(zoneName: string) {
    const zone = this.#zones.get(zoneName);
    if (!zone) throw apiError(404, 'notFound', `The 'parameters.managedZone' resource named '${zoneName}' does not exist.`);
    return zone;
  }

  async *listAllRecords(projectId: string, zoneName: string, fqdn?: string): AsyncGenerator<Schema$ResourceRecordSet> {
    this.listCalls++;
    for (const rrset of this.getZone(zoneName).values()) {
      if (fqdn && rrset.name.toLowerCase() !== fqdn.toLowerCase()) continue;
      yield rrset;
    }
  }

  async submitChange(projectId: string, zoneName: string, change: Schema$Change): Promise<Schema$Change> {
    this.submittedChanges.push({ zoneName, change });
    if (this.failNextChangeWith) {
      const err = this.failNextChangeWith;
      this.failNextChangeWith = null;
      throw err;
    }

    const zone = this.getZone(zoneName);
    const next = new Map(zone);
    for (const deletion of change.deletions ?? []) {
      const live = next.get(rrsetKey(deletion));
      if (!live) throw apiError(404, 'notFound',
        `The 'entity.change.deletions[${deletion.name}][${deletion.type}]' resource named '${deletion.name}' does not exist.`);
      if (!sameRrset(live, deletion)) throw apiError(412, 'preconditionFailed',
        `Precondition not met for 'entity.change.deletions[${deletion.name}][${deletion.type}]'`);
      next.delete(rrsetKey(deletion));
    }
    for (const addition of change.additions ?? []) {
      if (next.has(rrsetKey(addition))) throw apiError(409, 'alreadyExists',
        `The resource 'entity.change.additions[${addition.name}][${addition.type}]' already exists`);
      next.set(rrsetKey(addition), addition);
    }

    this.#zones.set(zoneName, next);
    return {
      kind: 'dns#change',
      ...change,
      id: `${this.submittedChanges.length}`,
      startTime: '1971-01-01T00:00:00.000Z',
      status: 'done',
    };
  }
}
