import type { DnsWriter } from "../types.ts";
import { WriterStateError } from "../errors.ts";

/**
 * Guards the single-use lifecycle shared by every writer:
 * stage any number of names, then commit once.
 */
export abstract class BaseDnsWriter implements DnsWriter {
  #committed = false;

  get committed() {
    return this.#committed;
  }

  protected checkNotCommitted(action: string) {
    if (this.#committed) throw new WriterStateError(
      `Cannot ${action} with a writer that was already committed`);
  }

  async PublishDomain(domainName: string): Promise<void> {
    this.checkNotCommitted('publish a domain');
    await this.PublishDomainUnchecked(domainName);
  }

  async PublishHost(hostName: string): Promise<void> {
    this.checkNotCommitted('publish a host');
    await this.PublishHostUnchecked(hostName);
  }

  async Commit(): Promise<void> {
    this.checkNotCommitted('commit');
    this.#committed = true;
    await this.CommitUnchecked();
  }

  protected abstract PublishDomainUnchecked(domainName: string): Promise<void>;
  protected abstract PublishHostUnchecked(hostName: string): Promise<void>;
  protected abstract CommitUnchecked(): Promise<void>;
}
