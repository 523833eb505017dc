import type {
  DesiredState, DnsZoneProvider, RegistryDataSource, ResourceRecord,
} from "../types.ts";
import {
  dsToRrdata, filterGlueHostNames, getAbsoluteHostName, getSuperordinateDomain,
  isInBailiwick, makeRecord, splitIntoV4andV6, stripTrailingDot,
} from "../dns-logic/records.ts";
import { DesiredStateBuilder } from "../dns-logic/desired-state.ts";
import { buildZoneDiff, flattenDesiredState, isEmptyDiff } from "../dns-logic/diff.ts";
import { isZoneStateError } from "../errors.ts";
import { transformConcurrently } from "../lib/concurrent.ts";
import type { RateLimiter } from "../lib/rate-limiter.ts";
import { callWithRetry, type RetryOptions } from "../lib/retrier.ts";
import { printZoneDiff } from "../lib/printing.ts";
import { log } from "../lib/logging.ts";
import { BaseDnsWriter } from "./base.ts";

export interface RecordTtls {
  /** Also used for AAAA */
  a: number;
  ns: number;
  ds: number;
}

export interface ReconcilingWriterOpts {
  tld: string;
  provider: DnsZoneProvider;
  registryData: RegistryDataSource;
  ttls: RecordTtls;
  /** Shared by every writer talking to the same provider account */
  rateLimiter: RateLimiter;
  numThreads: number;
  retry: RetryOptions;
  now?: () => Date;
}

/**
 * Stages records from the registry's data, then brings the provider's zone
 * in line with them by reading the live records and submitting one atomic change.
 * A stale read is answered by starting the read over.
 */
export class ReconcilingDnsWriter extends BaseDnsWriter {
  constructor(
    private readonly opts: ReconcilingWriterOpts,
  ) {
    super();
    // Every lookup in this batch sees the registry as of the same instant
    this.asOf = (opts.now ?? (() => new Date()))();
  }
  readonly asOf: Date;
  readonly #desired = new DesiredStateBuilder();

  get tld() {
    return this.opts.tld;
  }

  protected async PublishDomainUnchecked(domainName: string) {
    const absoluteName = getAbsoluteHostName(domainName);
    const domain = await this.opts.registryData.loadDomain(stripTrailingDot(absoluteName), this.asOf);
    if (!domain || !domain.publishable) {
      log.debug(`Domain ${absoluteName} is absent or not publishable, clearing it`);
      this.#desired.stage(absoluteName, []);
      return;
    }

    const records = new Array<ResourceRecord>();
    if (domain.nameservers.length > 0) {
      records.push(makeRecord({
        name: absoluteName,
        type: 'NS',
        ttl: this.opts.ttls.ns,
        rrdatas: domain.nameservers.map(getAbsoluteHostName),
      }));
    }
    if (domain.dsData.length > 0) {
      records.push(makeRecord({
        name: absoluteName,
        type: 'DS',
        ttl: this.opts.ttls.ds,
        rrdatas: domain.dsData.map(dsToRrdata),
      }));
    }
    this.#desired.stage(absoluteName, records);

    for (const nameserver of domain.nameservers) {
      if (!isInBailiwick(nameserver, absoluteName)) continue;
      await this.publishSubordinateHost(nameserver);
    }
  }

  /** Stages glue for a host which lives inside its superordinate domain */
  private async publishSubordinateHost(hostName: string) {
    const absoluteName = getAbsoluteHostName(hostName);
    const host = await this.opts.registryData.loadHost(stripTrailingDot(absoluteName), this.asOf);
    if (!host) {
      this.#desired.stage(absoluteName, []);
      return;
    }

    const { v4, v6 } = splitIntoV4andV6(host.addresses);
    const records = new Array<ResourceRecord>();
    if (v4.length > 0) records.push(makeRecord({
      name: absoluteName,
      type: 'A',
      ttl: this.opts.ttls.a,
      rrdatas: v4,
    }));
    if (v6.length > 0) records.push(makeRecord({
      name: absoluteName,
      type: 'AAAA',
      ttl: this.opts.ttls.a,
      rrdatas: v6,
    }));
    this.#desired.stage(absoluteName, records);
  }

  protected async PublishHostUnchecked(hostName: string) {
    const tld = this.opts.registryData.findTldForName(hostName);
    if (!tld) {
      log.error(`Host ${hostName} isn't under a managed TLD, not publishing it`);
      return;
    }
    const domainName = getSuperordinateDomain(hostName, tld);
    if (!domainName) {
      log.error(`Host ${hostName} has no superordinate domain under ${tld}, not publishing it`);
      return;
    }
    // The whole domain is republished so that its glue stays consistent
    await this.PublishDomainUnchecked(domainName);
  }

  protected async CommitUnchecked() {
    const desired = this.#desired.snapshot();
    log.info(`Committing ${desired.size} names to ${this.opts.provider.providerId} zone ${this.opts.tld}`);
    await callWithRetry(() => this.mutateZone(desired), isZoneStateError, this.opts.retry);
  }

  /** Reads live state for the desired names and their glue, then applies the difference */
  private async mutateZone(desired: DesiredState) {
    const { provider, tld } = this.opts;
    const existingByName = new Map<string, ReadonlyArray<ResourceRecord>>();

    const fetchNames = async (names: Iterable<string>) => {
      const fetched = await transformConcurrently(names, this.opts.numThreads, async name => {
        await this.opts.rateLimiter.acquire();
        return [name, await provider.ListRecords(tld, name)] as const;
      });
      for (const [name, records] of fetched) {
        existingByName.set(name, records);
      }
    };

    await fetchNames(desired.keys());

    // Glue which used to hang off a delegation has to be found for removal too
    const glueNames = new Set<string>();
    for (const [name, records] of existingByName) {
      for (const glueName of filterGlueHostNames(name, records)) {
        if (!existingByName.has(glueName)) glueNames.add(glueName);
      }
    }
    await fetchNames(glueNames);

    const existing = Array.from(existingByName.values()).flat();
    const diff = buildZoneDiff(flattenDesiredState(desired), existing);
    if (isEmptyDiff(diff)) {
      log.info(`Zone ${tld} already matches for ${desired.size} names, nothing to change`);
      return;
    }

    printZoneDiff(tld, diff);
    await this.opts.rateLimiter.acquire();
    await provider.ApplyChange(tld, diff);
    log.info(`Applied ${diff.additions.length} additions and ${diff.deletions.length} deletions to ${tld}`);
  }
}
