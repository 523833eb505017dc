import type { ResourceRecord, ZoneDiff } from "../types.ts";
import { log } from "./logging.ts";

function printRecord(prefix: string, record: ResourceRecord) {
  const bits = [
    record.name,
    record.type,
    `ttl=${record.ttl}`,
    `data=${record.rrdatas.join(',') || '(none)'}`,
  ];
  return `    ${prefix} ${bits.join(' ')}`;
}

export function printZoneDiff(zone: string, diff: ZoneDiff) {
  const lines = [
    `Planned change in ${zone}: ${diff.additions.length} additions, ${diff.deletions.length} deletions`,
  ];
  for (const rec of diff.deletions) {
    lines.push(printRecord('delete', rec));
  }
  for (const rec of diff.additions) {
    lines.push(printRecord('create', rec));
  }

  // Leaving names empty is worth stressing a bit.
  const emptiedNames = new Set(diff.deletions.map(x => x.name));
  for (const rec of diff.additions) emptiedNames.delete(rec.name);
  log[emptiedNames.size > 0 ? 'warn' : 'debug'](lines.join('\n'));
}
