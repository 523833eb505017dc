import { express, z, type NextFunction, type Request, type Response } from "./deps.ts";
import { LockFailureError } from "./errors.ts";
import { publishDnsUpdates, type PublishDeps } from "./logic.ts";
import type { PrometheusDnsMetrics } from "./lib/metrics.ts";
import { log } from "./lib/logging.ts";

export const PublishTaskPath = '/_dr/task/publishDnsUpdates';

const PublishTaskBody = z.object({
  tld: z.string().min(1),
  dnsWriter: z.string().min(1),
  domains: z.array(z.string()).default([]),
  hosts: z.array(z.string()).default([]),
});

export function createApp(deps: PublishDeps & {
  metrics: PrometheusDnsMetrics;
}) {
  const app = express();
  app.use(express.json());

  app.post(PublishTaskPath, (req: Request, res: Response, next: NextFunction) => {
    const parsed = PublishTaskBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).type('text/plain').send(`Invalid publish task: ${parsed.error.issues
        .map(x => `${x.path.join('.') || 'body'}: ${x.message}`).join('; ')}`);
      return;
    }
    const { tld, dnsWriter, domains, hosts } = parsed.data;
    publishDnsUpdates({ tld, writerName: dnsWriter, domains, hosts }, deps)
      .then(() => {
        res.status(200).type('text/plain').send('OK');
      })
      .catch(next);
  });

  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    deps.metrics.render()
      .then(({ contentType, body }) => {
        res.status(200).type(contentType).send(body);
      })
      .catch(next);
  });

  app.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).type('text/plain').send('ok');
  });

  // Any non-2xx answer makes the task queue redeliver the batch later
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof LockFailureError) {
      res.status(503).type('text/plain').send(err.message);
      return;
    }
    log.error(`Publish task failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).type('text/plain').send('Internal Server Error');
  });

  return app;
}
