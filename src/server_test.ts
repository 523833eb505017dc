import { expect, test } from "vitest";
import request from "supertest";

import { parseControllerConfig } from "./config.ts";
import { DnsUpdatesLockName } from "./logic.ts";
import { InMemoryLockHandler } from "./lib/lock.ts";
import { PrometheusDnsMetrics } from "./lib/metrics.ts";
import { InMemoryZoneProvider } from "./providers/memory/mod.ts";
import { InMemoryDnsQueue } from "./queue/dns-queue.ts";
import { StaticRegistryData } from "./registry-data/static.ts";
import { configureWriterRegistry } from "./writers/_configure.ts";
import { createApp, PublishTaskPath } from "./server.ts";

function setup() {
  const provider = new InMemoryZoneProvider();
  const lockHandler = new InMemoryLockHandler();
  const queue = new InMemoryDnsQueue();
  const metrics = new PrometheusDnsMetrics();
  const writers = configureWriterRegistry(parseControllerConfig({
    writer: [{ name: 'DryRunWriter', type: 'memory' }],
  }), {
    registryData: new StaticRegistryData({
      tlds: ['example'],
      domains: [{ name: 'a.example', nameservers: ['ns.elsewhere.test'] }],
    }),
    providerFor: () => provider,
  });
  const app = createApp({ lockHandler, writers, queue, metrics, lockTimeoutMs: 10_000 });
  return { app, provider, lockHandler, queue };
}

test("a publish task answers OK once committed", async () => {
  const { app, provider } = setup();

  const resp = await request(app)
    .post(PublishTaskPath)
    .send({ tld: 'example', dnsWriter: 'DryRunWriter', domains: ['a.example'] });

  expect(resp.status).toBe(200);
  expect(resp.text).toBe('OK');
  expect(provider.allRecords('example')).toHaveLength(1);
});

test("a requeued batch also answers OK", async () => {
  const { app, queue } = setup();

  const resp = await request(app)
    .post(PublishTaskPath)
    .send({ tld: 'example', dnsWriter: 'Nope', hosts: ['ns1.a.example'] });

  expect(resp.status).toBe(200);
  expect(queue.tasks).toEqual([{ type: 'host', name: 'ns1.a.example' }]);
});

test("malformed tasks are refused", async () => {
  const { app } = setup();

  const resp = await request(app)
    .post(PublishTaskPath)
    .send({ dnsWriter: 'DryRunWriter', domains: 'a.example' });

  expect(resp.status).toBe(400);
  expect(resp.text).toBe('Invalid publish task: tld: Required; domains: Expected array, received string');
});

test("a held lock answers 503 so the task is redelivered", async () => {
  const { app, lockHandler } = setup();

  let status = 0;
  await lockHandler.executeWithLocks(async () => {
    const resp = await request(app)
      .post(PublishTaskPath)
      .send({ tld: 'example', dnsWriter: 'DryRunWriter', domains: ['a.example'] });
    status = resp.status;
  }, 'example', 10_000, DnsUpdatesLockName);

  expect(status).toBe(503);
});

test("provider failures answer 500", async () => {
  const { app, provider } = setup();
  provider.ApplyChange = async () => {
    throw new Error('quota exceeded');
  };

  const resp = await request(app)
    .post(PublishTaskPath)
    .send({ tld: 'example', dnsWriter: 'DryRunWriter', domains: ['a.example'] });

  expect(resp.status).toBe(500);
});

test("metrics are served in the Prometheus format", async () => {
  const { app } = setup();
  await request(app)
    .post(PublishTaskPath)
    .send({ tld: 'example', dnsWriter: 'DryRunWriter', domains: ['a.example'] });

  const resp = await request(app).get('/metrics');
  expect(resp.status).toBe(200);
  expect(resp.text).toContain('dns_commit_total{tld="example",writer="DryRunWriter",status="SUCCESS"} 1');
});

test("health check", async () => {
  const { app } = setup();
  const resp = await request(app).get('/healthz');
  expect(resp.status).toBe(200);
  expect(resp.text).toBe('ok');
});
