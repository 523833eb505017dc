import {
  Route53Client,
  ChangeResourceRecordSetsCommand,
  ListHostedZonesByNameCommand,
  ListResourceRecordSetsCommand,
  type ChangeResourceRecordSetsCommandInput,
  type ListResourceRecordSetsCommandInput,
  type ListResourceRecordSetsCommandOutput,
} from "../../deps.ts";

/** The slice of Route 53 which the provider calls */
export interface Route53ApiSurface {
  findHostedZoneId(dnsName: string): Promise<string | null>;
  listResourceRecordSets(input: ListResourceRecordSetsCommandInput): Promise<ListResourceRecordSetsCommandOutput>;
  changeResourceRecordSets(input: ChangeResourceRecordSetsCommandInput): Promise<{ changeId?: string, status?: string }>;
}

export class Route53Api implements Route53ApiSurface {
  constructor(region: string) {
    this.client = new Route53Client({ region });
  }
  private readonly client: Route53Client;

  async findHostedZoneId(dnsName: string) {
    const resp = await this.client.send(new ListHostedZonesByNameCommand({
      DNSName: dnsName,
      MaxItems: 1,
    }));
    const zone = resp.HostedZones?.[0];
    if (!zone?.Id || zone.Name?.toLowerCase() !== dnsName.toLowerCase()) return null;
    return zone.Id.replace('/hostedzone/', '');
  }

  listResourceRecordSets(input: ListResourceRecordSetsCommandInput) {
    return this.client.send(new ListResourceRecordSetsCommand(input));
  }

  async changeResourceRecordSets(input: ChangeResourceRecordSetsCommandInput) {
    const { ChangeInfo } = await this.client.send(new ChangeResourceRecordSetsCommand(input));
    return {
      changeId: ChangeInfo?.Id?.replace('/change/', ''),
      status: ChangeInfo?.Status,
    };
  }
}
