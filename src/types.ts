/** Record types which this publisher ever writes into a TLD zone */
export type RecordType = 'A' | 'AAAA' | 'NS' | 'DS';

export const AllSupportedRecords: Record<RecordType, true> = {
  'A': true,
  'AAAA': true,
  'NS': true,
  'DS': true,
};

/**
 * One resource record set as the provider sees it.
 * Instances are frozen; use `makeRecord` to construct one.
 */
export interface ResourceRecord {
  /** Absolute, lowercased name ending in a dot */
  readonly name: string;
  readonly type: RecordType;
  /** Seconds */
  readonly ttl: number;
  /** De-duplicated and sorted; treated as a set */
  readonly rrdatas: ReadonlyArray<string>;
}

/**
 * Names mapped to every record which should exist under them.
 * An empty list is meaningful: delete everything at that name.
 */
export type DesiredState = ReadonlyMap<string, ReadonlyArray<ResourceRecord>>;

export interface ZoneDiff {
  additions: Array<ResourceRecord>;
  deletions: Array<ResourceRecord>;
}

/** The unit of work delivered by the task queue */
export interface Batch {
  tld: string;
  writerName: string;
  domains: ReadonlyArray<string>;
  hosts: ReadonlyArray<string>;
}

export type CommitStatus = 'SUCCESS' | 'FAILURE';
export type PublishStatus = 'ACCEPTED' | 'REJECTED';

export interface CommitOutcome {
  status: CommitStatus;
  domainsPublished: number;
  domainsRejected: number;
  hostsPublished: number;
  hostsRejected: number;
  durationMs: number;
}

/**
 * Stages desired DNS data for one batch and then reconciles it
 * against a provider in a single commit.
 * Instances are single-use.
 */
export interface DnsWriter {
  PublishDomain(domainName: string): Promise<void>;
  PublishHost(hostName: string): Promise<void>;
  Commit(): Promise<void>;
}

/** Minimal surface of a DNS hosting backend */
export interface DnsZoneProvider {
  readonly providerId: string;
  /** Every record set at exactly this absolute name */
  ListRecords(zone: string, fqdn: string): Promise<Array<ResourceRecord>>;
  /**
   * Atomically applies the change, or nothing.
   * Throws ZoneStateError when the zone no longer matches what was read.
   */
  ApplyChange(zone: string, change: ZoneDiff): Promise<void>;
}

export interface DelegationSignerData {
  keyTag: number;
  algorithm: number;
  digestType: number;
  /** Hex-encoded */
  digest: string;
}

export interface DomainData {
  name: string;
  publishable: boolean;
  /** Fully qualified host names, without trailing dot */
  nameservers: Array<string>;
  dsData: Array<DelegationSignerData>;
}

export interface HostData {
  name: string;
  addresses: Array<string>;
}

/** Read-only view onto the registry's authoritative data */
export interface RegistryDataSource {
  /** Returns null when the domain doesn't exist at that instant */
  loadDomain(domainName: string, asOf: Date): Promise<DomainData | null>;
  loadHost(hostName: string, asOf: Date): Promise<HostData | null>;
  /** The managed TLD which the name falls under, if any */
  findTldForName(name: string): string | null;
}

/** Where deferred work goes when a batch can't be handled right now */
export interface DnsQueue {
  addDomainRefreshTask(domainName: string): Promise<void>;
  addHostRefreshTask(hostName: string): Promise<void>;
}

export interface LockHandler {
  /**
   * Runs the callable while holding every named lock for the resource.
   * Resolves false, without running anything, if a lock was unavailable.
   */
  executeWithLocks(
    callable: () => Promise<void>,
    resourceName: string,
    timeoutMs: number,
    ...lockNames: string[]
  ): Promise<boolean>;
}

export interface DnsMetrics {
  incrementPublishDomainRequests(tld: string, count: number, status: PublishStatus): void;
  incrementPublishHostRequests(tld: string, count: number, status: PublishStatus): void;
  recordCommit(tld: string, writer: string, status: CommitStatus, durationMs: number,
    domainsPublished: number, hostsPublished: number): void;
}
