import type { DnsQueue } from "../types.ts";
import { JsonClient } from "../providers/json-client.ts";
import { log } from "../lib/logging.ts";

export type RefreshTaskType = 'domain' | 'host';

/** Hands refresh tasks to the task queue's HTTP ingestion endpoint */
export class HttpDnsQueue extends JsonClient implements DnsQueue {
  constructor(endpoint: string, fetchImpl?: typeof fetch) {
    super('queue', endpoint, fetchImpl);
  }

  protected addAuthHeaders() {}

  private async addTask(type: RefreshTaskType, name: string) {
    await this.doHttp({
      path: '',
      method: 'POST',
      jsonBody: { type, name },
    });
    log.info(`Enqueued ${type} refresh for ${name}`);
  }

  addDomainRefreshTask(domainName: string) {
    return this.addTask('domain', domainName);
  }

  addHostRefreshTask(hostName: string) {
    return this.addTask('host', hostName);
  }
}

/** Keeps refresh tasks in memory, for dry runs and tests */
export class InMemoryDnsQueue implements DnsQueue {
  readonly tasks = new Array<{ type: RefreshTaskType, name: string }>();

  async addDomainRefreshTask(domainName: string) {
    this.tasks.push({ type: 'domain', name: domainName });
  }

  async addHostRefreshTask(hostName: string) {
    this.tasks.push({ type: 'host', name: hostName });
  }
}
