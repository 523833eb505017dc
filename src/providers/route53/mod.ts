import {
  InvalidChangeBatch,
  type R53Change,
  type R53ResourceRecordSet,
  type ListResourceRecordSetsCommandInput,
} from "../../deps.ts";

import type { Route53ProviderConfig } from "../../config.ts";
import type { DnsZoneProvider, ResourceRecord, ZoneDiff } from "../../types.ts";
import { ZoneStateError } from "../../errors.ts";
import { getAbsoluteHostName, isSupportedRecordType, makeRecord } from "../../dns-logic/records.ts";
import { log } from "../../lib/logging.ts";

import { Route53Api, type Route53ApiSurface } from "./api.ts";

/** Route 53 escapes some characters in names it hands back */
function unescapeName(name: string) {
  return name.replace(/\\(\d{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * AWS Route 53. A change batch is applied atomically,
 * and DELETE actions have to match the live record set exactly.
 */
export class Route53Provider implements DnsZoneProvider {
  constructor(
    public readonly config: Route53ProviderConfig,
    private readonly api: Route53ApiSurface = new Route53Api(config.region ?? 'us-east-1'),
  ) {}
  readonly providerId = 'route53';
  #hostedZoneIds = new Map<string, Promise<string>>();

  hostedZoneIdFor(zone: string): Promise<string> {
    const configured = this.config.hosted_zone_ids?.[zone];
    if (configured) return Promise.resolve(configured);

    let idPromise = this.#hostedZoneIds.get(zone);
    if (!idPromise) {
      idPromise = this.api.findHostedZoneId(getAbsoluteHostName(zone)).then(id => {
        if (!id) throw new Error(`No Route 53 hosted zone found for ${zone}`);
        return id;
      }).catch((err: unknown) => {
        // Don't cache failures
        this.#hostedZoneIds.delete(zone);
        throw err;
      });
      this.#hostedZoneIds.set(zone, idPromise);
    }
    return idPromise;
  }

  async ListRecords(zone: string, fqdn: string): Promise<Array<ResourceRecord>> {
    const absoluteName = getAbsoluteHostName(fqdn);
    const records = new Array<ResourceRecord>();

    const request: ListResourceRecordSetsCommandInput = {
      HostedZoneId: await this.hostedZoneIdFor(zone),
      StartRecordName: absoluteName,
    };
    // Listing starts at the name but carries on past it, so stop once we leave it
    let morePages = true;
    while (morePages) {
      const resp = await this.api.listResourceRecordSets(request);
      let leftName = false;
      for (const rrset of resp.ResourceRecordSets ?? []) {
        if (!rrset.Name || getAbsoluteHostName(unescapeName(rrset.Name)) !== absoluteName) {
          leftName = true;
          break;
        }
        if (!rrset.Type || !isSupportedRecordType(rrset.Type) || rrset.AliasTarget || rrset.SetIdentifier) {
          log.debug(`Ignoring Route 53 record set ${rrset.Name} ${rrset.Type}`);
          continue;
        }
        records.push(makeRecord({
          name: absoluteName,
          type: rrset.Type,
          ttl: rrset.TTL ?? 0,
          rrdatas: (rrset.ResourceRecords ?? []).flatMap(x => x.Value ? [x.Value] : []),
        }));
      }

      morePages = !leftName && !!resp.IsTruncated && resp.NextRecordName !== undefined
        && getAbsoluteHostName(unescapeName(resp.NextRecordName)) === absoluteName;
      request.StartRecordName = resp.NextRecordName;
      request.StartRecordType = resp.NextRecordType;
      request.StartRecordIdentifier = resp.NextRecordIdentifier;
    }
    return records;
  }

  async ApplyChange(zone: string, change: ZoneDiff): Promise<void> {
    const toRrset = (record: ResourceRecord): R53ResourceRecordSet => ({
      Name: record.name,
      Type: record.type,
      TTL: record.ttl,
      ResourceRecords: record.rrdatas.map(Value => ({ Value })),
    });
    // Deletions go first so a replaced record set doesn't collide with itself
    const changes: R53Change[] = [
      ...change.deletions.map<R53Change>(x => ({ Action: 'DELETE', ResourceRecordSet: toRrset(x) })),
      ...change.additions.map<R53Change>(x => ({ Action: 'CREATE', ResourceRecordSet: toRrset(x) })),
    ];

    try {
      const result = await this.api.changeResourceRecordSets({
        HostedZoneId: await this.hostedZoneIdFor(zone),
        ChangeBatch: {
          Comment: `DNS publish for ${zone}`,
          Changes: changes,
        },
      });
      log.info(`Route 53 change ${result.changeId} on ${zone} is ${result.status}`);
    } catch (err) {
      throw classifyChangeError(err);
    }
  }
}

const StaleStatePattern = /but it was not found|but it already exists|values provided do not match the current values/;

/** A single stale-state complaint means the zone moved under us */
export function classifyChangeError(err: unknown): unknown {
  if (!(err instanceof InvalidChangeBatch)) return err;
  const messages = err.messages ?? [err.message];
  if (messages.length !== 1) return err;
  const match = messages[0].match(StaleStatePattern);
  if (!match) return err;
  return new ZoneStateError(match[0].includes('not found')
    ? 'notFound'
    : match[0].includes('already exists') ? 'alreadyExists' : 'preconditionFailed');
}
