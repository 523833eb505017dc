import type { ProviderConfig } from "../config.ts";
import type { DnsZoneProvider } from "../types.ts";
import { GoogleCloudDnsProvider } from "./google/mod.ts";
import { InMemoryZoneProvider } from "./memory/mod.ts";
import { Route53Provider } from "./route53/mod.ts";

export function configureProvider(config: ProviderConfig): DnsZoneProvider {
  switch (config.type) {
    case 'google':
      return new GoogleCloudDnsProvider(config);
    case 'route53':
      return new Route53Provider(config);
    case 'memory':
      return new InMemoryZoneProvider();
  }
}
