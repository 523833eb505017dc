import { isIP } from "node:net";

import type {
  DelegationSignerData, RecordType, ResourceRecord,
} from "../types.ts";
import { AllSupportedRecords } from "../types.ts";

/** Presentation format ending in a dot, used for absolute names */
export function getAbsoluteHostName(hostName: string): string {
  const lower = hostName.toLowerCase();
  return lower.endsWith('.') ? lower : `${lower}.`;
}

export function stripTrailingDot(name: string): string {
  return name.replace(/\.$/, '');
}

export function isSupportedRecordType(type: string): type is RecordType {
  return type in AllSupportedRecords;
}

export function makeRecord(opts: {
  name: string;
  type: RecordType;
  ttl: number;
  rrdatas: Iterable<string>;
}): ResourceRecord {
  if (!Number.isInteger(opts.ttl) || opts.ttl < 0) throw new Error(
    `TTL must be a non-negative integer, got ${opts.ttl} for ${opts.name}`);
  return Object.freeze({
    name: getAbsoluteHostName(opts.name),
    type: opts.type,
    ttl: opts.ttl,
    rrdatas: Object.freeze(Array.from(new Set(opts.rrdatas)).sort()),
  });
}

/** Structural identity of a record set; equal keys mean equal records */
export function recordKey(record: ResourceRecord): string {
  return JSON.stringify([record.name, record.type, record.ttl, record.rrdatas]);
}

/** Whether `name` is strictly inside `parent` (both compared without trailing dots) */
export function isInBailiwick(name: string, parent: string): boolean {
  const child = stripTrailingDot(name.toLowerCase());
  const owner = stripTrailingDot(parent.toLowerCase());
  return child !== owner && child.endsWith(`.${owner}`);
}

const LabelPattern = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/;

/** Loose hostname syntax check, allowing IDNA (xn--) labels */
export function isValidDomainName(name: string): boolean {
  const bare = stripTrailingDot(name.toLowerCase());
  if (bare.length < 1 || bare.length > 253) return false;
  return bare.split('.').every(label => LabelPattern.test(label));
}

/**
 * The registered domain which owns a host, given the TLD it falls under.
 * Returns null if the host is the TLD itself or the TLD doesn't cover it.
 */
export function getSuperordinateDomain(hostName: string, tld: string): string | null {
  const hostParts = stripTrailingDot(hostName.toLowerCase()).split('.');
  const tldParts = stripTrailingDot(tld.toLowerCase()).split('.');
  if (hostParts.length <= tldParts.length) return null;
  if (!isInBailiwick(hostName, tld)) return null;
  return hostParts.slice(hostParts.length - tldParts.length - 1).join('.');
}

/** Compressed lowercase form, the way providers hand IPv6 rrdata back */
function canonicalIPv6(address: string): string {
  return new URL(`http://[${address}]/`).hostname.slice(1, -1);
}

export function splitIntoV4andV6(addresses: Iterable<string>) {
  const v4 = new Array<string>();
  const v6 = new Array<string>();
  for (const address of addresses) {
    const family = isIP(address);
    if (family == 4) {
      v4.push(address);
    } else if (family == 6 && !address.includes('%')) {
      v6.push(canonicalIPv6(address));
    } else {
      throw new Error(`Not an IP address: ${address}`);
    }
  }
  return { v4, v6 };
}

export function dsToRrdata(ds: DelegationSignerData): string {
  return `${ds.keyTag} ${ds.algorithm} ${ds.digestType} ${ds.digest.toUpperCase()}`;
}

/** NS targets of the given records which need glue under `ownerName` */
export function filterGlueHostNames(ownerName: string, records: Iterable<ResourceRecord>): string[] {
  const hosts = new Array<string>();
  for (const record of records) {
    if (record.type !== 'NS') continue;
    for (const target of record.rrdatas) {
      if (isInBailiwick(target, ownerName)) {
        hosts.push(getAbsoluteHostName(target));
      }
    }
  }
  return hosts;
}
