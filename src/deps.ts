export * as TOML from "smol-toml";
export { default as winston } from "winston";
export { z } from "zod";

export { default as express } from "express";
export type { Request, Response, NextFunction } from "express";

export * as promClient from "prom-client";

export { GoogleAuth } from "google-auth-library";

export {
  Route53Client,
  ListResourceRecordSetsCommand,
  ListHostedZonesByNameCommand,
  ChangeResourceRecordSetsCommand,
  InvalidChangeBatch,
} from "@aws-sdk/client-route-53";
export type {
  Change as R53Change,
  ResourceRecordSet as R53ResourceRecordSet,
  ListResourceRecordSetsCommandInput,
  ListResourceRecordSetsCommandOutput,
  ChangeResourceRecordSetsCommandInput,
} from "@aws-sdk/client-route-53";
