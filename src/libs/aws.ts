// src/libs/aws.ts
// Shared client settings for the AWS SDK. With AWS_ENDPOINT_URL set every
// client talks to that endpoint (LocalStack in dev).
import { S3Client } from "@aws-sdk/client-s3";
import { env, type Env } from "./env.js";

export type AwsClientConfig = {
  region: string;
  endpoint?: string;
  credentials?: { accessKeyId: string; secretAccessKey: string };
};

export function awsClientConfig(source: Env = env): AwsClientConfig {
  const config: AwsClientConfig = { region: source.AWS_REGION };
  if (source.AWS_ENDPOINT_URL) {
    config.endpoint = source.AWS_ENDPOINT_URL;
  }
  if (source.AWS_ACCESS_KEY_ID && source.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: source.AWS_ACCESS_KEY_ID,
      secretAccessKey: source.AWS_SECRET_ACCESS_KEY,
    };
  }
  return config;
}

/** LocalStack serves buckets path-style only. */
export function s3ClientFromEnv(source: Env = env): S3Client {
  const config = awsClientConfig(source);
  return new S3Client({ ...config, forcePathStyle: Boolean(config.endpoint) });
}

/** `name` of an SDK service exception, e.g. "ResourceNotFoundException". */
export function awsErrorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

export function awsHttpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}
