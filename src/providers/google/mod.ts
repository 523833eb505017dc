import type { GoogleProviderConfig } from "../../config.ts";
import type { DnsZoneProvider, ResourceRecord, ZoneDiff } from "../../types.ts";
import { HttpError, ZoneStateError } from "../../errors.ts";
import { getAbsoluteHostName, isSupportedRecordType, makeRecord } from "../../dns-logic/records.ts";
import { log } from "../../lib/logging.ts";

import {
  type CloudDnsApiSurface, type Schema$ResourceRecordSet,
  ErrorResponse, GoogleCloudDnsApi,
} from "./api.ts";

// https://cloud.google.com/dns/docs/troubleshooting
const RetryableErrorReasons = new Set(['preconditionFailed', 'notFound', 'alreadyExists']);

/**
 * Google Cloud DNS. A change is applied atomically by the API,
 * and deletions have to match the live record set exactly.
 */
export class GoogleCloudDnsProvider implements DnsZoneProvider {
  constructor(
    public readonly config: GoogleProviderConfig,
    private readonly api: CloudDnsApiSurface = new GoogleCloudDnsApi(),
  ) {}
  readonly providerId = 'google';

  /** Managed zone names can't contain dots */
  zoneNameFor(zone: string): string {
    return this.config.zone_names?.[zone] ?? zone.replaceAll('.', '-');
  }

  async ListRecords(zone: string, fqdn: string): Promise<Array<ResourceRecord>> {
    const absoluteName = getAbsoluteHostName(fqdn);
    const records = new Array<ResourceRecord>();
    for await (const rrset of this.api.listAllRecords(this.config.project_id, this.zoneNameFor(zone), absoluteName)) {
      // The name filter should make this a no-op
      if (getAbsoluteHostName(rrset.name) !== absoluteName) continue;
      if (!isSupportedRecordType(rrset.type)) {
        log.debug(`Ignoring ${rrset.type} record set at ${rrset.name}`);
        continue;
      }
      records.push(makeRecord({
        name: rrset.name,
        type: rrset.type,
        ttl: rrset.ttl ?? 0,
        rrdatas: rrset.rrdatas ?? [],
      }));
    }
    return records;
  }

  async ApplyChange(zone: string, change: ZoneDiff): Promise<void> {
    const zoneName = this.zoneNameFor(zone);
    const toRrset = (record: ResourceRecord): Schema$ResourceRecordSet => ({
      kind: 'dns#resourceRecordSet',
      name: record.name,
      type: record.type,
      ttl: record.ttl,
      rrdatas: [...record.rrdatas],
    });

    try {
      const submitted = await this.api.submitChange(this.config.project_id, zoneName, {
        additions: change.additions.map(toRrset),
        deletions: change.deletions.map(toRrset),
      });
      log.info(`Cloud DNS change ${submitted.id} on ${zoneName} at ${submitted.startTime} is ${submitted.status}`);
    } catch (err) {
      throw classifyChangeError(err);
    }
  }
}

/**
 * A lone error with a stale-state reason means the zone moved under us.
 * Anything else, including several errors at once, is not worth retrying.
 */
export function classifyChangeError(err: unknown): unknown {
  if (!(err instanceof HttpError)) return err;
  const parsed = ErrorResponse.safeParse(err.json());
  if (!parsed.success) return err;

  const { errors } = parsed.data.error;
  if (errors.length !== 1) return err;
  const reason = errors[0].reason;
  if (reason && RetryableErrorReasons.has(reason)) {
    return new ZoneStateError(reason);
  }
  return err;
}
