// src/scripts/provision-cloud.ts
// Creates the buckets and secrets of the active profile in Secrets Manager /
// S3 (LocalStack when AWS_ENDPOINT_URL is set). Safe to run repeatedly.

import { randomBytes } from "node:crypto";
import { env } from "../libs/env.js";
import { createChildLogger } from "../libs/logger.js";
import { settings } from "../libs/settings.js";
import { AwsCloudResources, cloudPlan, provisionCloud } from "../provisioning/cloud.js";

const log = createChildLogger({ script: "provision-cloud" });

async function main() {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL is required to seed the database secret.");
  }

  const plan = cloudPlan(settings, {
    // Only used when the secret does not exist yet.
    jwtSecret: env.JWT_SECRET ?? randomBytes(32).toString("base64url"),
    databaseUrl: env.DATABASE_URL,
  });

  const report = await provisionCloud(AwsCloudResources.fromEnv(), plan);

  log.info(
    { profile: settings.profile, created: report.created, existing: report.existing },
    "cloud resources provisioned",
  );
}

main().catch((err) => {
  log.error({ err }, "provisioning failed");
  process.exit(1);
});
