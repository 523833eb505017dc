import { TOML, z } from "./deps.ts";

const WriterBase = {
  name: z.string().min(1),
  /**
   * Provider calls per second, shared by every batch using this writer.
   * A commit takes about (names fetched + 1) / max_qps seconds, which has to fit in lock_timeout_seconds.
   */
  max_qps: z.number().positive().default(20),
  /** Parallel record fetches within one commit; below 2 means sequential */
  num_threads: z.number().int().min(1).default(10),
};

export const GoogleProviderConfig = z.object({
  ...WriterBase,
  type: z.literal('google'),
  project_id: z.string().min(1),
  /** TLD to managed zone name, where it isn't just the TLD with dashes */
  zone_names: z.record(z.string()).optional(),
});
export type GoogleProviderConfig = z.infer<typeof GoogleProviderConfig>;

export const Route53ProviderConfig = z.object({
  ...WriterBase,
  type: z.literal('route53'),
  region: z.string().optional(),
  /** TLD to hosted zone ID; looked up by name when absent */
  hosted_zone_ids: z.record(z.string()).optional(),
});
export type Route53ProviderConfig = z.infer<typeof Route53ProviderConfig>;

export const MemoryProviderConfig = z.object({
  ...WriterBase,
  type: z.literal('memory'),
});
export type MemoryProviderConfig = z.infer<typeof MemoryProviderConfig>;

export const VoidWriterConfig = z.object({
  name: z.string().min(1),
  type: z.literal('void'),
});
export type VoidWriterConfig = z.infer<typeof VoidWriterConfig>;

export const WriterConfig = z.discriminatedUnion('type', [
  GoogleProviderConfig,
  Route53ProviderConfig,
  MemoryProviderConfig,
  VoidWriterConfig,
]);
export type WriterConfig = z.infer<typeof WriterConfig>;
export type ProviderConfig = Exclude<WriterConfig, VoidWriterConfig>;

export const QueueConfig = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('http'),
    endpoint: z.string().url(),
  }),
  z.object({
    type: z.literal('memory'),
  }),
]);
export type QueueConfig = z.infer<typeof QueueConfig>;

export const ControllerConfig = z.object({
  listen_port: z.number().int().min(0).max(65535).default(8080),
  /** Lease on the TLD lock; keep it well above the longest commit (permits needed / max_qps) */
  lock_timeout_seconds: z.number().positive().default(300),
  retry: z.object({
    max_attempts: z.number().int().min(1).default(5),
    base_delay_ms: z.number().min(0).default(100),
    max_delay_ms: z.number().min(0).default(5000),
  }).default({}),
  ttl: z.object({
    a_seconds: z.number().int().min(0).default(180),
    ns_seconds: z.number().int().min(0).default(180),
    ds_seconds: z.number().int().min(0).default(180),
  }).default({}),
  queue: QueueConfig.default({ type: 'memory' }),
  registry_data: z.object({
    type: z.literal('static').default('static'),
    path: z.string().default('registry-data.json'),
  }).default({}),
  writer: z.array(WriterConfig).min(1),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  for (const writer of config.writer) {
    if (seen.has(writer.name)) ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['writer'],
      message: `Duplicate writer name ${writer.name}`,
    });
    seen.add(writer.name);
  }
});
export type ControllerConfig = z.infer<typeof ControllerConfig>;

export function parseControllerConfig(raw: unknown): ControllerConfig {
  const result = ControllerConfig.safeParse(raw);
  if (!result.success) throw new Error(
    `config.toml was invalid: ${result.error.issues.map(x => `${x.path.join('.')}: ${x.message}`).join('; ')}`);
  return result.data;
}

export function parseControllerConfigToml(text: string): ControllerConfig {
  return parseControllerConfig(TOML.parse(text));
}
