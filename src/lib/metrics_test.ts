import { expect, test } from "vitest";

import { PrometheusDnsMetrics } from "./metrics.ts";

test("publish counters are labelled by TLD and status", async () => {
  const metrics = new PrometheusDnsMetrics();
  metrics.incrementPublishDomainRequests('example', 2, 'ACCEPTED');
  metrics.incrementPublishDomainRequests('example', 1, 'REJECTED');
  metrics.incrementPublishHostRequests('example', 3, 'ACCEPTED');

  const { body } = await metrics.render();
  expect(body).toContain('dns_publish_domain_requests_total{tld="example",status="ACCEPTED"} 2');
  expect(body).toContain('dns_publish_domain_requests_total{tld="example",status="REJECTED"} 1');
  expect(body).toContain('dns_publish_host_requests_total{tld="example",status="ACCEPTED"} 3');
});

test("commits record count, duration and sizes", async () => {
  const metrics = new PrometheusDnsMetrics();
  metrics.recordCommit('example', 'CloudDnsWriter', 'SUCCESS', 1500, 4, 1);

  const { body, contentType } = await metrics.render();
  expect(contentType).toContain('text/plain');
  expect(body).toContain('dns_commit_total{tld="example",writer="CloudDnsWriter",status="SUCCESS"} 1');
  expect(body).toContain('dns_commit_duration_seconds_sum{tld="example",writer="CloudDnsWriter",status="SUCCESS"} 1.5');
  expect(body).toContain('dns_commit_domains_total{tld="example",writer="CloudDnsWriter",status="SUCCESS"} 4');
  expect(body).toContain('dns_commit_hosts_total{tld="example",writer="CloudDnsWriter",status="SUCCESS"} 1');
});

test("separate registries don't share values", async () => {
  const first = new PrometheusDnsMetrics();
  const second = new PrometheusDnsMetrics();
  first.recordCommit('example', 'w', 'FAILURE', 10, 0, 0);

  const { body } = await second.render();
  expect(body).not.toContain('dns_commit_total{');
});
