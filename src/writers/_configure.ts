import type { ControllerConfig, ProviderConfig } from "../config.ts";
import type { DnsWriter, DnsZoneProvider, RegistryDataSource } from "../types.ts";
import { configureProvider } from "../providers/_configure.ts";
import { RateLimiter } from "../lib/rate-limiter.ts";
import { log } from "../lib/logging.ts";
import { ReconcilingDnsWriter } from "./reconciling.ts";
import { VoidDnsWriter } from "./void.ts";

export type DnsWriterFactory = (tld: string) => DnsWriter;

/** Writer names mapped to factories; fixed once the process has started */
export class DnsWriterRegistry {
  #factories = new Map<string, DnsWriterFactory>();

  register(name: string, factory: DnsWriterFactory) {
    if (this.#factories.has(name)) throw new Error(
      `DNS writer ${name} is already registered`);
    this.#factories.set(name, factory);
  }

  /** A fresh single-use writer for the TLD, or null when the name is unknown */
  get(name: string, tld: string): DnsWriter | null {
    const factory = this.#factories.get(name);
    return factory ? factory(tld) : null;
  }

  names() {
    return Array.from(this.#factories.keys());
  }
}

export function configureWriterRegistry(config: ControllerConfig, deps: {
  registryData: RegistryDataSource;
  /** Overrides the provider built from each writer's config */
  providerFor?: (writer: ProviderConfig) => DnsZoneProvider;
  now?: () => Date;
}) {
  const registry = new DnsWriterRegistry();
  for (const writer of config.writer) {
    switch (writer.type) {
      case 'void':
        registry.register(writer.name, tld => new VoidDnsWriter(tld));
        break;
      case 'google':
      case 'route53':
      case 'memory': {
        const provider = deps.providerFor?.(writer) ?? configureProvider(writer);
        // One limiter per writer name, however many batches are in flight
        const rateLimiter = new RateLimiter(writer.max_qps);
        registry.register(writer.name, tld => new ReconcilingDnsWriter({
          tld,
          provider,
          registryData: deps.registryData,
          ttls: {
            a: config.ttl.a_seconds,
            ns: config.ttl.ns_seconds,
            ds: config.ttl.ds_seconds,
          },
          rateLimiter,
          numThreads: writer.num_threads,
          retry: {
            maxAttempts: config.retry.max_attempts,
            baseDelayMs: config.retry.base_delay_ms,
            maxDelayMs: config.retry.max_delay_ms,
          },
          now: deps.now,
        }));
        break;
      }
    }
  }
  log.info(`Configured DNS writers: ${registry.names().join(', ')}`);
  return registry;
}
