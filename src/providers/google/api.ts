import { GoogleAuth, z } from "../../deps.ts";
import { JsonClient } from "../json-client.ts";

export interface AccessTokenSource {
  getAccessToken(): Promise<string | null | undefined>;
}

/** What the Cloud DNS provider needs from the API, so tests can swap it out */
export interface CloudDnsApiSurface {
  listAllRecords(projectId: string, zoneName: string, fqdn?: string): AsyncGenerator<Schema$ResourceRecordSet>;
  submitChange(projectId: string, zoneName: string, change: Schema$Change): Promise<Schema$Change>;
}

export class GoogleCloudDnsApi extends JsonClient implements CloudDnsApiSurface {

  constructor(opts: {
    auth?: AccessTokenSource,
    rootUrl?: string,
    fetchImpl?: typeof fetch,
  } = {}) {
    super('google', opts.rootUrl ?? `https://dns.googleapis.com/dns/v1/`, opts.fetchImpl);
    this.#auth = opts.auth ?? new GoogleAuth({
      scopes: ['https://www.googleapis.com/auth/ndev.clouddns.readwrite'],
    });
  }
  #auth: AccessTokenSource;

  protected async addAuthHeaders(headers: Headers) {
    const token = await this.#auth.getAccessToken();
    if (!token) throw new Error(`No Google access token available; set GOOGLE_APPLICATION_CREDENTIALS`);
    headers.set('authorization', `Bearer ${token}`);
  }

  listRecords(projectId: string, zoneName: string, fqdn?: string, pageToken?: string | null) {
    if (!projectId) throw new Error(`Project is required`);
    if (!zoneName) throw new Error(`Zone is required`);
    const query = new URLSearchParams;
    if (fqdn) query.set('name', fqdn);
    if (pageToken) query.set('pageToken', pageToken);
    return this.doJson(ResourceRecordSetsListResponse, {
      path: `projects/${projectId}/managedZones/${zoneName}/rrsets`,
      query,
    });
  }
  async *listAllRecords(projectId: string, zoneName: string, fqdn?: string) {
    let page: Schema$ResourceRecordSetsListResponse | undefined;
    do {
      page = await this.listRecords(projectId, zoneName, fqdn, page?.nextPageToken);
      if (page.rrsets) yield* page.rrsets;
    } while (page.nextPageToken);
  }

  submitChange(projectId: string, zoneName: string, change: Schema$Change) {
    if (!projectId) throw new Error(`Project is required`);
    if (!zoneName) throw new Error(`Zone is required`);
    return this.doJson(Change, {
      path: `projects/${projectId}/managedZones/${zoneName}/changes`,
      method: 'POST',
      jsonBody: { kind: "dns#change", ...change },
    });
  }
}

// schemas via https://github.com/googleapis/google-api-nodejs-client/blob/master/src/apis/dns/v1.ts

export const ResourceRecordSet = z.object({
  kind: z.literal("dns#resourceRecordSet").optional(),
  name: z.string(),
  type: z.string(),
  ttl: z.number().nullish(),
  rrdatas: z.array(z.string()).nullish(),
});
export type Schema$ResourceRecordSet = z.infer<typeof ResourceRecordSet>;

export const ResourceRecordSetsListResponse = z.object({
  kind: z.string().optional(),
  nextPageToken: z.string().nullish(),
  rrsets: z.array(ResourceRecordSet).optional(),
});
export type Schema$ResourceRecordSetsListResponse = z.infer<typeof ResourceRecordSetsListResponse>;

export const Change = z.object({
  kind: z.literal("dns#change").optional(),
  additions: z.array(ResourceRecordSet).optional(),
  deletions: z.array(ResourceRecordSet).optional(),
  id: z.string().nullish(),
  startTime: z.string().nullish(),
  status: z.string().nullish(),
});
export type Schema$Change = z.infer<typeof Change>;

/** Body of a Cloud DNS error response */
export const ErrorResponse = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({
      reason: z.string().optional(),
      message: z.string().optional(),
    })).default([]),
  }),
});
