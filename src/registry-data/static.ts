import { z } from "../deps.ts";
import type { DomainData, HostData, RegistryDataSource } from "../types.ts";
import { isInBailiwick, stripTrailingDot } from "../dns-logic/records.ts";

const Lifetime = {
  created: z.string().datetime({ offset: true }).optional(),
  deleted: z.string().datetime({ offset: true }).optional(),
};

const DomainEntry = z.object({
  name: z.string(),
  statuses: z.array(z.string()).default([]),
  nameservers: z.array(z.string()).default([]),
  dsData: z.array(z.object({
    keyTag: z.number().int(),
    algorithm: z.number().int(),
    digestType: z.number().int(),
    digest: z.string(),
  })).default([]),
  ...Lifetime,
});
type DomainEntry = z.infer<typeof DomainEntry>;

const HostEntry = z.object({
  name: z.string(),
  addresses: z.array(z.string()).default([]),
  ...Lifetime,
});
type HostEntry = z.infer<typeof HostEntry>;

export const RegistryDataFile = z.object({
  tlds: z.array(z.string()).min(1),
  domains: z.array(DomainEntry).default([]),
  hosts: z.array(HostEntry).default([]),
});
export type RegistryDataFile = z.input<typeof RegistryDataFile>;

/** Statuses which keep a domain out of the zone */
const HoldStatuses = new Set(['clientHold', 'serverHold']);

function existsAt(entry: { created?: string, deleted?: string }, asOf: Date) {
  const time = asOf.getTime();
  if (entry.created && Date.parse(entry.created) > time) return false;
  if (entry.deleted && Date.parse(entry.deleted) <= time) return false;
  return true;
}

function canonical(name: string) {
  return stripTrailingDot(name.toLowerCase());
}

/**
 * Registry data held in a JSON document, such as an export from the registry database.
 * Entries may carry creation and deletion times so lookups honour the reference instant.
 */
export class StaticRegistryData implements RegistryDataSource {
  constructor(raw: unknown) {
    const result = RegistryDataFile.safeParse(raw);
    if (!result.success) throw new Error(
      `Registry data was invalid: ${result.error.issues.map(x => `${x.path.join('.')}: ${x.message}`).join('; ')}`);

    this.tlds = result.data.tlds.map(canonical);
    for (const domain of result.data.domains) {
      const key = canonical(domain.name);
      this.#domains.set(key, [...this.#domains.get(key) ?? [], domain]);
    }
    for (const host of result.data.hosts) {
      const key = canonical(host.name);
      this.#hosts.set(key, [...this.#hosts.get(key) ?? [], host]);
    }
  }
  readonly tlds: ReadonlyArray<string>;
  // A name can be deleted and registered again, so keep every incarnation
  #domains = new Map<string, Array<DomainEntry>>();
  #hosts = new Map<string, Array<HostEntry>>();

  async loadDomain(domainName: string, asOf: Date): Promise<DomainData | null> {
    const entry = this.#domains.get(canonical(domainName))?.find(x => existsAt(x, asOf));
    if (!entry) return null;
    return {
      name: canonical(entry.name),
      publishable: !entry.statuses.some(x => HoldStatuses.has(x)),
      nameservers: entry.nameservers.map(canonical),
      dsData: entry.dsData,
    };
  }

  async loadHost(hostName: string, asOf: Date): Promise<HostData | null> {
    const entry = this.#hosts.get(canonical(hostName))?.find(x => existsAt(x, asOf));
    if (!entry) return null;
    return {
      name: canonical(entry.name),
      addresses: entry.addresses,
    };
  }

  findTldForName(name: string): string | null {
    let best: string | null = null;
    for (const tld of this.tlds) {
      if (!isInBailiwick(name, tld)) continue;
      if (!best || tld.length > best.length) best = tld;
    }
    return best;
  }
}
