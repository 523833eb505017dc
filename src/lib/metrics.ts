import { promClient } from "../deps.ts";
import type { CommitStatus, DnsMetrics, PublishStatus } from "../types.ts";

/** DNS publishing metrics, exported in the Prometheus text format */
export class PrometheusDnsMetrics implements DnsMetrics {
  constructor(
    public readonly registry = new promClient.Registry(),
  ) {
    const registers = [this.registry];
    this.publishDomainRequests = new promClient.Counter({
      name: 'dns_publish_domain_requests_total',
      help: 'Domains staged for publishing, by acceptance status',
      labelNames: ['tld', 'status'],
      registers,
    });
    this.publishHostRequests = new promClient.Counter({
      name: 'dns_publish_host_requests_total',
      help: 'Hosts staged for publishing, by acceptance status',
      labelNames: ['tld', 'status'],
      registers,
    });
    this.commitCount = new promClient.Counter({
      name: 'dns_commit_total',
      help: 'Writer commits, by outcome',
      labelNames: ['tld', 'writer', 'status'],
      registers,
    });
    this.commitDuration = new promClient.Histogram({
      name: 'dns_commit_duration_seconds',
      help: 'Time from the start of a batch to the end of its commit',
      labelNames: ['tld', 'writer', 'status'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers,
    });
    this.domainsCommitted = new promClient.Counter({
      name: 'dns_commit_domains_total',
      help: 'Domains included in commits',
      labelNames: ['tld', 'writer', 'status'],
      registers,
    });
    this.hostsCommitted = new promClient.Counter({
      name: 'dns_commit_hosts_total',
      help: 'Hosts included in commits',
      labelNames: ['tld', 'writer', 'status'],
      registers,
    });
  }
  private readonly publishDomainRequests: promClient.Counter<'tld' | 'status'>;
  private readonly publishHostRequests: promClient.Counter<'tld' | 'status'>;
  private readonly commitCount: promClient.Counter<'tld' | 'writer' | 'status'>;
  private readonly commitDuration: promClient.Histogram<'tld' | 'writer' | 'status'>;
  private readonly domainsCommitted: promClient.Counter<'tld' | 'writer' | 'status'>;
  private readonly hostsCommitted: promClient.Counter<'tld' | 'writer' | 'status'>;

  incrementPublishDomainRequests(tld: string, count: number, status: PublishStatus) {
    this.publishDomainRequests.inc({ tld, status }, count);
  }

  incrementPublishHostRequests(tld: string, count: number, status: PublishStatus) {
    this.publishHostRequests.inc({ tld, status }, count);
  }

  recordCommit(tld: string, writer: string, status: CommitStatus, durationMs: number,
      domainsPublished: number, hostsPublished: number) {
    const labels = { tld, writer, status };
    this.commitCount.inc(labels);
    this.commitDuration.observe(labels, durationMs / 1000);
    this.domainsCommitted.inc(labels, domainsPublished);
    this.hostsCommitted.inc(labels, hostsPublished);
  }

  async render() {
    return {
      contentType: this.registry.contentType,
      body: await this.registry.metrics(),
    };
  }
}
