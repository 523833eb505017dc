import { expect, test } from "vitest";

import { StaticRegistryData } from "./static.ts";

const data = new StaticRegistryData({
  tlds: ['example', 'co.example'],
  domains: [{
    name: 'A.Example',
    statuses: ['ok'],
    nameservers: ['NS1.A.EXAMPLE', 'ns.elsewhere.test.'],
    dsData: [{ keyTag: 1, algorithm: 8, digestType: 2, digest: 'ab' }],
  }, {
    name: 'held.example',
    statuses: ['clientHold'],
    nameservers: ['ns.elsewhere.test'],
  }, {
    name: 'later.example',
    created: '2024-06-01T00:00:00Z',
  }, {
    name: 'gone.example',
    deleted: '2024-03-01T00:00:00Z',
  }],
  hosts: [{
    name: 'ns1.a.example',
    addresses: ['192.0.2.1'],
  }, {
    name: 'old.a.example',
    addresses: ['192.0.2.9'],
    deleted: '2024-03-01T00:00:00Z',
  }],
});

const asOf = new Date('2024-04-01T00:00:00Z');

test("domains load with canonical names", async () => {
  expect(await data.loadDomain('a.example.', asOf)).toEqual({
    name: 'a.example',
    publishable: true,
    nameservers: ['ns1.a.example', 'ns.elsewhere.test'],
    dsData: [{ keyTag: 1, algorithm: 8, digestType: 2, digest: 'ab' }],
  });
});

test("holds make a domain unpublishable", async () => {
  const domain = await data.loadDomain('held.example', asOf);
  expect(domain?.publishable).toBe(false);
});

test("lookups honour creation and deletion times", async () => {
  expect(await data.loadDomain('later.example', asOf)).toBe(null);
  expect(await data.loadDomain('later.example', new Date('2024-07-01T00:00:00Z'))).not.toBe(null);
  expect(await data.loadDomain('gone.example', asOf)).toBe(null);
  expect(await data.loadDomain('gone.example', new Date('2024-02-01T00:00:00Z'))).not.toBe(null);
  expect(await data.loadHost('old.a.example', asOf)).toBe(null);
  expect(await data.loadDomain('missing.example', asOf)).toBe(null);
});

test("hosts load with their addresses", async () => {
  expect(await data.loadHost('NS1.a.example', asOf)).toEqual({
    name: 'ns1.a.example',
    addresses: ['192.0.2.1'],
  });
});

test("the longest matching TLD wins", () => {
  expect(data.findTldForName('ns1.a.co.example')).toBe('co.example');
  expect(data.findTldForName('ns1.a.example.')).toBe('example');
  expect(data.findTldForName('example')).toBe(null);
  expect(data.findTldForName('ns.elsewhere.test')).toBe(null);
});

test("malformed data is refused", () => {
  expect(() => new StaticRegistryData({ tlds: [] }))
    .toThrow('Registry data was invalid: tlds: Array must contain at least 1 element(s)');
});
