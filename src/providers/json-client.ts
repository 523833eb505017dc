import type { z } from "../deps.ts";
import { HttpError } from "../errors.ts";
import { httpLog } from "../lib/logging.ts";

export type HttpOpts = RequestInit & {
  path: string;
  query?: URLSearchParams;
  jsonBody?: unknown;
};

export abstract class JsonClient {
  constructor(
    public readonly name: string,
    public readonly baseUrl: string | URL,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  protected abstract addAuthHeaders(headers: Headers): void | Promise<void>;

  /** Resolves to the decoded JSON body, or null when there is no body */
  protected async doHttp(opts: HttpOpts): Promise<unknown> {
    const { path: rawPath, query, jsonBody, ...init } = opts;
    let path = rawPath;
    if (query?.toString()) {
      path += (path.includes('?') ? '&' : '?') + query.toString();
    }

    const headers = new Headers(init.headers);
    await this.addAuthHeaders(headers);
    headers.set('accept', `application/json`);

    const body = jsonBody !== undefined ? JSON.stringify(jsonBody) : undefined;
    if (body) headers.set('content-type', 'application/json');

    const method = init.method ?? 'GET';
    const resp = await this.fetchImpl(new URL(path, this.baseUrl), {
      body,
      ...init,
      method,
      headers,
    });

    httpLog.debug(`${method} ${this.name} ${path} ${resp.status}`);

    if (resp.status == 204) {
      await resp.body?.cancel();
      return null;
    } else if (resp.status >= 400) {
      const text = await resp.text();
      throw new HttpError(this.name, resp.status, resp.statusText, text);
    }
    const text = await resp.text();
    return text ? JSON.parse(text) : null;
  }

  /** Like doHttp, but the body must be present and match the schema */
  protected async doJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: HttpOpts): Promise<T> {
    const data = await this.doHttp(opts);
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new Error(
      `${this.name} returned an unexpected body for ${opts.path}: ${parsed.error.message}`);
    return parsed.data;
  }
}
