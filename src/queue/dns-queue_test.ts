import { expect, test } from "vitest";

import { HttpError } from "../errors.ts";
import { HttpDnsQueue, InMemoryDnsQueue } from "./dns-queue.ts";

function fakeFetch(status: number) {
  const requests = new Array<{ url: string, method?: string, body: unknown }>();
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: input instanceof URL ? input.toString() : String(input),
      method: init?.method,
      body: typeof init?.body == 'string' ? JSON.parse(init.body) : null,
    });
    return new Response(null, { status });
  };
  return { requests, fetchImpl };
}

test("http queue posts one task per name", async () => {
  const { requests, fetchImpl } = fakeFetch(204);
  const queue = new HttpDnsQueue('http://queue.test/tasks/dns-refresh', fetchImpl);

  await queue.addDomainRefreshTask('a.example');
  await queue.addHostRefreshTask('ns1.a.example');

  expect(requests).toEqual([{
    url: 'http://queue.test/tasks/dns-refresh',
    method: 'POST',
    body: { type: 'domain', name: 'a.example' },
  }, {
    url: 'http://queue.test/tasks/dns-refresh',
    method: 'POST',
    body: { type: 'host', name: 'ns1.a.example' },
  }]);
});

test("http queue surfaces refusals", async () => {
  const { fetchImpl } = fakeFetch(503);
  const queue = new HttpDnsQueue('http://queue.test/tasks/dns-refresh', fetchImpl);
  await expect(queue.addDomainRefreshTask('a.example')).rejects.toBeInstanceOf(HttpError);
});

test("memory queue keeps tasks in order", async () => {
  const queue = new InMemoryDnsQueue();
  await queue.addHostRefreshTask('ns1.a.example');
  await queue.addDomainRefreshTask('a.example');
  expect(queue.tasks).toEqual([
    { type: 'host', name: 'ns1.a.example' },
    { type: 'domain', name: 'a.example' },
  ]);
});
