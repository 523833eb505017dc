import type {
  Batch, CommitOutcome, DnsMetrics, DnsQueue, DnsWriter, LockHandler,
} from "./types.ts";
import type { DnsWriterRegistry } from "./writers/_configure.ts";
import { LockFailureError } from "./errors.ts";
import { isInBailiwick, isValidDomainName } from "./dns-logic/records.ts";
import { log } from "./lib/logging.ts";

export const DnsUpdatesLockName = 'DNS updates';

export interface PublishDeps {
  lockHandler: LockHandler;
  writers: DnsWriterRegistry;
  queue: DnsQueue;
  metrics: DnsMetrics;
  lockTimeoutMs: number;
  now?: () => number;
}

/**
 * Publishes one batch of names to the TLD's zone through the named writer,
 * holding the TLD's DNS lock throughout.
 * Resolves null when the writer is unknown and the batch went back on the queue.
 */
export async function publishDnsUpdates(batch: Batch, deps: PublishDeps): Promise<CommitOutcome | null> {
  // A batch carries sets of names; repeats would be staged and counted twice
  batch = {
    ...batch,
    domains: [...new Set(batch.domains)],
    hosts: [...new Set(batch.hosts)],
  };

  let outcome: CommitOutcome | null = null;
  const locked = await deps.lockHandler.executeWithLocks(async () => {
    outcome = await processBatch(batch, deps);
  }, batch.tld, deps.lockTimeoutMs, DnsUpdatesLockName);

  // Dropping the batch here would lose the updates, so the transport has to redeliver it
  if (!locked) throw new LockFailureError();
  return outcome;
}

async function processBatch(batch: Batch, deps: PublishDeps): Promise<CommitOutcome | null> {
  const now = deps.now ?? (() => Date.now());
  const startedAt = now();
  const { tld, writerName } = batch;

  const writer = deps.writers.get(writerName, tld);
  if (!writer) {
    log.warn(`Couldn't get writer ${writerName} for TLD ${tld}, pushing the batch back to the queue for retry`);
    await requeueBatch(batch, deps.queue);
    return null;
  }

  const outcome: CommitOutcome = {
    status: 'FAILURE',
    domainsPublished: 0,
    domainsRejected: 0,
    hostsPublished: 0,
    hostsRejected: 0,
    durationMs: 0,
  };
  try {
    await stageBatch(batch, writer, outcome);
    await writer.Commit();
    outcome.status = 'SUCCESS';
    return outcome;

  } finally {
    outcome.durationMs = now() - startedAt;
    reportOutcome(batch, outcome, deps.metrics);
  }
}

/** Names outside the TLD are counted and skipped, never requeued */
async function stageBatch(batch: Batch, writer: DnsWriter, outcome: CommitOutcome) {
  const { tld } = batch;
  for (const domain of batch.domains) {
    if (!isValidDomainName(domain) || !isInBailiwick(domain, tld)) {
      log.error(`${tld}: skipping domain ${domain} not under tld`);
      outcome.domainsRejected++;
      continue;
    }
    await writer.PublishDomain(domain);
    log.info(`${tld}: published domain ${domain}`);
    outcome.domainsPublished++;
  }

  for (const host of batch.hosts) {
    if (!isValidDomainName(host) || !isInBailiwick(host, tld)) {
      log.error(`${tld}: skipping host ${host} not under tld`);
      outcome.hostsRejected++;
      continue;
    }
    await writer.PublishHost(host);
    log.info(`${tld}: published host ${host}`);
    outcome.hostsPublished++;
  }
}

function reportOutcome(batch: Batch, outcome: CommitOutcome, metrics: DnsMetrics) {
  const { tld, writerName } = batch;
  const { status } = outcome;
  metrics.incrementPublishDomainRequests(tld, outcome.domainsPublished, 'ACCEPTED');
  metrics.incrementPublishDomainRequests(tld, outcome.domainsRejected, 'REJECTED');
  metrics.incrementPublishHostRequests(tld, outcome.hostsPublished, 'ACCEPTED');
  metrics.incrementPublishHostRequests(tld, outcome.hostsRejected, 'REJECTED');
  metrics.recordCommit(tld, writerName, status, outcome.durationMs,
    outcome.domainsPublished, outcome.hostsPublished);

  log.info([
    `Commit statistics for ${tld}:`,
    `writer=${writerName}`,
    `status=${status}`,
    `duration=${outcome.durationMs}ms`,
    `domainsPublished=${outcome.domainsPublished}`,
    `domainsRejected=${outcome.domainsRejected}`,
    `hostsPublished=${outcome.hostsPublished}`,
    `hostsRejected=${outcome.hostsRejected}`,
  ].join(' '));
}

async function requeueBatch(batch: Batch, queue: DnsQueue) {
  for (const domain of batch.domains) {
    await queue.addDomainRefreshTask(domain);
  }
  for (const host of batch.hosts) {
    await queue.addHostRefreshTask(host);
  }
}
