import { log } from "../lib/logging.ts";
import { BaseDnsWriter } from "./base.ts";

/** For TLDs which have no DNS to publish. Everything staged is dropped. */
export class VoidDnsWriter extends BaseDnsWriter {
  constructor(public readonly tld: string) {
    super();
  }
  readonly ignoredNames = new Array<string>();

  protected async PublishDomainUnchecked(domainName: string) {
    this.ignoredNames.push(domainName);
  }

  protected async PublishHostUnchecked(hostName: string) {
    this.ignoredNames.push(hostName);
  }

  protected async CommitUnchecked() {
    if (this.ignoredNames.length == 0) return;
    log.warn(`Ignoring DNS zone updates for ${this.tld}: ${this.ignoredNames.join(', ')}`);
  }
}
