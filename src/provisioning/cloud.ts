// src/provisioning/cloud.ts
// ============================================================================
// Cloud resource provisioning (buckets + secrets)
// ----------------------------------------------------------------------------
// - the plan is derived from the profile settings
// - provisionCloud() only creates what is missing; "already exists" from the
//   provider (race with another run, or a resource we cannot see) counts as
//   existing, never as a failure
// ============================================================================

import {
  CreateBucketCommand,
  HeadBucketCommand,
  PutBucketCorsCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import {
  CreateSecretCommand,
  DescribeSecretCommand,
  ResourceNotFoundException,
  SecretsManagerClient,
} from "@aws-sdk/client-secrets-manager";
import { awsClientConfig, awsErrorName, awsHttpStatus, s3ClientFromEnv } from "../libs/aws.js";
import { env, type Env } from "../libs/env.js";
import type { Settings } from "../libs/settings.js";

export type BucketSpec = {
  name: string;
  /** Browser origins allowed to PUT/GET directly (presigned uploads). */
  corsOrigins?: string[];
};

export type SecretSpec = {
  name: string;
  value: Record<string, unknown>;
};

export type CloudPlan = {
  buckets: BucketSpec[];
  secrets: SecretSpec[];
};

export type ProvisionReport = {
  created: string[];
  existing: string[];
};

export class ResourceAlreadyExistsError extends Error {
  constructor(readonly resource: string) {
    super(`${resource} already exists.`);
    this.name = "ResourceAlreadyExistsError";
  }
}

export interface CloudResources {
  bucketExists(name: string): Promise<boolean>;
  /** Throws ResourceAlreadyExistsError when the bucket is already there. */
  createBucket(spec: BucketSpec): Promise<void>;
  secretExists(name: string): Promise<boolean>;
  /** Throws ResourceAlreadyExistsError when the secret is already there. */
  createSecret(spec: SecretSpec): Promise<void>;
}

export function cloudPlan(
  cfg: Settings,
  values: { jwtSecret: string; databaseUrl: string },
): CloudPlan {
  const prefix = `${cfg.secrets.prefix}/${cfg.profile}`;
  return {
    buckets: [
      { name: cfg.storage.uploadsBucket, corsOrigins: cfg.cors.origins },
      { name: cfg.storage.exportsBucket },
    ],
    secrets: [
      { name: `${prefix}/jwt`, value: { secret: values.jwtSecret } },
      { name: `${prefix}/database`, value: { url: values.databaseUrl } },
      { name: `${prefix}/external-apis`, value: {} },
    ],
  };
}

async function ensure(
  label: string,
  exists: () => Promise<boolean>,
  create: () => Promise<void>,
  report: ProvisionReport,
): Promise<void> {
  if (await exists()) {
    report.existing.push(label);
    return;
  }
  try {
    await create();
    report.created.push(label);
  } catch (err) {
    if (!(err instanceof ResourceAlreadyExistsError)) throw err;
    report.existing.push(label);
  }
}

export async function provisionCloud(
  resources: CloudResources,
  plan: CloudPlan,
): Promise<ProvisionReport> {
  const report: ProvisionReport = { created: [], existing: [] };

  for (const bucket of plan.buckets) {
    await ensure(
      `bucket:${bucket.name}`,
      () => resources.bucketExists(bucket.name),
      () => resources.createBucket(bucket),
      report,
    );
  }

  for (const secret of plan.secrets) {
    await ensure(
      `secret:${secret.name}`,
      () => resources.secretExists(secret.name),
      () => resources.createSecret(secret),
      report,
    );
  }

  return report;
}

// ----------------------------------------------------------------------------
// AWS / LocalStack
// ----------------------------------------------------------------------------

const BUCKET_EXISTS_ERRORS = new Set(["BucketAlreadyOwnedByYou", "BucketAlreadyExists"]);

export class AwsCloudResources implements CloudResources {
  constructor(
    private readonly s3: S3Client,
    private readonly secrets: SecretsManagerClient,
  ) {}

  static fromEnv(source: Env = env): AwsCloudResources {
    return new AwsCloudResources(
      s3ClientFromEnv(source),
      new SecretsManagerClient(awsClientConfig(source)),
    );
  }

  async bucketExists(name: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: name }));
      return true;
    } catch (err) {
      if (awsHttpStatus(err) === 404 || awsErrorName(err) === "NotFound") return false;
      throw err;
    }
  }

  async createBucket(spec: BucketSpec): Promise<void> {
    try {
      await this.s3.send(new CreateBucketCommand({ Bucket: spec.name }));
    } catch (err) {
      const name = awsErrorName(err);
      if (name && BUCKET_EXISTS_ERRORS.has(name)) {
        throw new ResourceAlreadyExistsError(`bucket:${spec.name}`);
      }
      throw err;
    }

    if (spec.corsOrigins && spec.corsOrigins.length > 0) {
      await this.s3.send(
        new PutBucketCorsCommand({
          Bucket: spec.name,
          CORSConfiguration: {
            CORSRules: [
              {
                AllowedOrigins: spec.corsOrigins,
                AllowedMethods: ["GET", "PUT", "POST", "DELETE"],
                AllowedHeaders: ["*"],
                MaxAgeSeconds: 3000,
              },
            ],
          },
        }),
      );
    }
  }

  async secretExists(name: string): Promise<boolean> {
    try {
      await this.secrets.send(new DescribeSecretCommand({ SecretId: name }));
      return true;
    } catch (err) {
      if (err instanceof ResourceNotFoundException) return false;
      throw err;
    }
  }

  async createSecret(spec: SecretSpec): Promise<void> {
    try {
      await this.secrets.send(
        new CreateSecretCommand({ Name: spec.name, SecretString: JSON.stringify(spec.value) }),
      );
    } catch (err) {
      if (awsErrorName(err) === "ResourceExistsException") {
        throw new ResourceAlreadyExistsError(`secret:${spec.name}`);
      }
      throw err;
    }
  }
}
