import { expect, test } from "vitest";

import {
  dsToRrdata, filterGlueHostNames, getAbsoluteHostName, getSuperordinateDomain,
  isInBailiwick, isValidDomainName, makeRecord, recordKey, splitIntoV4andV6,
} from "./records.ts";

test("absolute names are lowercased with one trailing dot", () => {
  expect(getAbsoluteHostName('NS1.Example')).toBe('ns1.example.');
  expect(getAbsoluteHostName('ns1.example.')).toBe('ns1.example.');
});

test("records are canonical and frozen", () => {
  const record = makeRecord({
    name: 'A.Example',
    type: 'NS',
    ttl: 180,
    rrdatas: ['ns2.a.example.', 'ns1.a.example.', 'ns2.a.example.'],
  });
  expect(record).toEqual({
    name: 'a.example.',
    type: 'NS',
    ttl: 180,
    rrdatas: ['ns1.a.example.', 'ns2.a.example.'],
  });
  expect(Object.isFrozen(record)).toBe(true);
  expect(Object.isFrozen(record.rrdatas)).toBe(true);
});

test("record keys ignore rrdata order", () => {
  const first = makeRecord({ name: 'x.example', type: 'A', ttl: 60, rrdatas: ['192.0.2.2', '192.0.2.1'] });
  const second = makeRecord({ name: 'x.example.', type: 'A', ttl: 60, rrdatas: ['192.0.2.1', '192.0.2.2'] });
  const third = makeRecord({ name: 'x.example.', type: 'A', ttl: 61, rrdatas: ['192.0.2.1', '192.0.2.2'] });
  expect(recordKey(first)).toBe(recordKey(second));
  expect(recordKey(first)).not.toBe(recordKey(third));
});

test("negative or fractional TTLs are refused", () => {
  expect(() => makeRecord({ name: 'x.example', type: 'A', ttl: -1, rrdatas: [] })).toThrow(/TTL/);
  expect(() => makeRecord({ name: 'x.example', type: 'A', ttl: 1.5, rrdatas: [] })).toThrow(/TTL/);
});

test("bailiwick is strict", () => {
  expect(isInBailiwick('ns1.a.example', 'a.example.')).toBe(true);
  expect(isInBailiwick('a.example.', 'a.example')).toBe(false);
  expect(isInBailiwick('nota.example', 'a.example')).toBe(false);
  expect(isInBailiwick('a.example', 'example')).toBe(true);
});

test("domain name syntax", () => {
  expect(isValidDomainName('xn--bcher-kva.example')).toBe(true);
  expect(isValidDomainName('a.example.')).toBe(true);
  expect(isValidDomainName('-bad.example')).toBe(false);
  expect(isValidDomainName('bad..example')).toBe(false);
  expect(isValidDomainName('under_score.example')).toBe(false);
  expect(isValidDomainName('')).toBe(false);
});

test("superordinate domain of a host", () => {
  expect(getSuperordinateDomain('ns1.deep.a.example', 'example')).toBe('a.example');
  expect(getSuperordinateDomain('ns1.a.co.example.', 'co.example')).toBe('a.co.example');
  expect(getSuperordinateDomain('example', 'example')).toBe(null);
  expect(getSuperordinateDomain('ns1.a.other', 'example')).toBe(null);
});

test("addresses split by family", () => {
  expect(splitIntoV4andV6(['192.0.2.1', '2001:DB8::1', '198.51.100.7'])).toEqual({
    v4: ['192.0.2.1', '198.51.100.7'],
    v6: ['2001:db8::1'],
  });
  expect(() => splitIntoV4andV6(['ns1.example'])).toThrow('Not an IP address: ns1.example');
});

test("IPv6 addresses are written in compressed form", () => {
  expect(splitIntoV4andV6(['2001:0db8::0002', '2001:DB8:0:0:0:0:0:3']).v6)
    .toEqual(['2001:db8::2', '2001:db8::3']);
});

test("out of range IPv4 addresses are refused", () => {
  expect(() => splitIntoV4andV6(['999.1.1.1'])).toThrow('Not an IP address: 999.1.1.1');
  expect(() => splitIntoV4andV6(['192.0.2.256'])).toThrow('Not an IP address: 192.0.2.256');
  expect(() => splitIntoV4andV6(['fe80::1%eth0'])).toThrow('Not an IP address: fe80::1%eth0');
});

test("DS rrdata uses an uppercase digest", () => {
  expect(dsToRrdata({ keyTag: 12345, algorithm: 8, digestType: 2, digest: 'abcdef01' }))
    .toBe('12345 8 2 ABCDEF01');
});

test("glue hosts are only the in-bailiwick NS targets", () => {
  const records = [
    makeRecord({ name: 'a.example', type: 'NS', ttl: 180,
      rrdatas: ['ns1.a.example.', 'ns.elsewhere.test.', 'NS2.A.EXAMPLE'] }),
    makeRecord({ name: 'a.example', type: 'DS', ttl: 180, rrdatas: ['1 8 2 AB'] }),
  ];
  // rrdatas are sorted, so the uppercase name comes first
  expect(filterGlueHostNames('a.example.', records)).toEqual(['ns2.a.example.', 'ns1.a.example.']);
});
