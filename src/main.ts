import { readFile } from "node:fs/promises";

import { parseControllerConfigToml } from "./config.ts";
import { configureWriterRegistry } from "./writers/_configure.ts";
import { StaticRegistryData } from "./registry-data/static.ts";
import { HttpDnsQueue, InMemoryDnsQueue } from "./queue/dns-queue.ts";
import { InMemoryLockHandler } from "./lib/lock.ts";
import { PrometheusDnsMetrics } from "./lib/metrics.ts";
import { log, setupLogs } from "./lib/logging.ts";
import { createApp } from "./server.ts";

const args = process.argv.slice(2);
const configFlag = args.indexOf('--config');
const configPath = configFlag >= 0 ? args[configFlag + 1] ?? 'config.toml' : 'config.toml';

setupLogs({
  logLevel: args.includes('--debug') ? 'debug' : 'info',
  logFormat: args.includes('--log-as-json') ? 'json' : 'console',
});

const config = parseControllerConfigToml(await readFile(configPath, 'utf-8'));
log.debug(`Parsed configuration: ${JSON.stringify(config)}`);

const lister = new Intl.ListFormat();
log.info(`Configuration summary:
      ${config.writer.length} writers: ${lister.format(config.writer.map(x => `${x.name} (${x.type})`))}
      queue: ${config.queue.type}
      registry data: ${config.registry_data.path}`);

const registryData = new StaticRegistryData(JSON.parse(await readFile(config.registry_data.path, 'utf-8')));
const queue = config.queue.type == 'http'
  ? new HttpDnsQueue(config.queue.endpoint)
  : new InMemoryDnsQueue();

const app = createApp({
  lockHandler: new InMemoryLockHandler(),
  writers: configureWriterRegistry(config, { registryData }),
  queue,
  metrics: new PrometheusDnsMetrics(),
  lockTimeoutMs: config.lock_timeout_seconds * 1000,
});

app.listen(config.listen_port, () => {
  log.info(`Listening for publish tasks on port ${config.listen_port}`);
});
