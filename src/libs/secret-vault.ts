// src/libs/secret-vault.ts
// ============================================================================
// SecretVault
// ----------------------------------------------------------------------------
// - AwsSecretVault: Secrets Manager (LocalStack or AWS)
// - EnvSecretVault: process environment, writes kept in memory
// - createSecretVault(): picks one from SECRETS_BACKEND
// Secret names look like "<prefix>/<profile>/<purpose>", e.g. keystone/dev/jwt.
// ============================================================================

import {
  CreateSecretCommand,
  DeleteSecretCommand,
  GetSecretValueCommand,
  PutSecretValueCommand,
  ResourceNotFoundException,
  SecretsManagerClient,
} from "@aws-sdk/client-secrets-manager";
import { awsClientConfig } from "./aws.js";
import { env, type Env } from "./env.js";

export type SecretValue = string | Record<string, unknown>;

export interface SecretVault {
  getSecret(name: string): Promise<string | null>;
  getSecretJson(name: string): Promise<Record<string, unknown> | null>;
  putSecret(name: string, value: SecretValue): Promise<void>;
  deleteSecret(name: string, opts?: { force?: boolean }): Promise<void>;
}

export class SecretFormatError extends Error {
  constructor(readonly secretName: string) {
    super(`Secret "${secretName}" is not a JSON object.`);
    this.name = "SecretFormatError";
  }
}

function serialize(value: SecretValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function parseJsonObject(name: string, raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SecretFormatError(name);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new SecretFormatError(name);
  }
  return { ...parsed };
}

abstract class BaseSecretVault implements SecretVault {
  abstract getSecret(name: string): Promise<string | null>;
  abstract putSecret(name: string, value: SecretValue): Promise<void>;
  abstract deleteSecret(name: string, opts?: { force?: boolean }): Promise<void>;

  async getSecretJson(name: string): Promise<Record<string, unknown> | null> {
    const raw = await this.getSecret(name);
    return raw === null ? null : parseJsonObject(name, raw);
  }
}

// ---------------------------------------------------------------------------
// Secrets Manager
// ---------------------------------------------------------------------------

export class AwsSecretVault extends BaseSecretVault {
  constructor(private readonly client: SecretsManagerClient) {
    super();
  }

  static fromEnv(source: Env = env): AwsSecretVault {
    return new AwsSecretVault(new SecretsManagerClient(awsClientConfig(source)));
  }

  async getSecret(name: string): Promise<string | null> {
    try {
      const out = await this.client.send(new GetSecretValueCommand({ SecretId: name }));
      if (out.SecretString !== undefined) return out.SecretString;
      if (out.SecretBinary) return Buffer.from(out.SecretBinary).toString("utf8");
      return null;
    } catch (err) {
      if (err instanceof ResourceNotFoundException) return null;
      throw err;
    }
  }

  async putSecret(name: string, value: SecretValue): Promise<void> {
    const SecretString = serialize(value);
    try {
      await this.client.send(new PutSecretValueCommand({ SecretId: name, SecretString }));
    } catch (err) {
      if (!(err instanceof ResourceNotFoundException)) throw err;
      await this.client.send(new CreateSecretCommand({ Name: name, SecretString }));
    }
  }

  async deleteSecret(name: string, opts: { force?: boolean } = {}): Promise<void> {
    try {
      await this.client.send(
        new DeleteSecretCommand({
          SecretId: name,
          ForceDeleteWithoutRecovery: opts.force ?? false,
        }),
      );
    } catch (err) {
      if (err instanceof ResourceNotFoundException) return;
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** keystone/dev/jwt -> KEYSTONE_DEV_JWT */
export function secretEnvName(name: string): string {
  return name.replace(/[/-]/g, "_").toUpperCase();
}

export class EnvSecretVault extends BaseSecretVault {
  private readonly written = new Map<string, string | null>();

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {
    super();
  }

  async getSecret(name: string): Promise<string | null> {
    const key = secretEnvName(name);
    const local = this.written.get(key);
    if (local !== undefined) return local;
    const value = this.source[key];
    return value === undefined || value === "" ? null : value;
  }

  async putSecret(name: string, value: SecretValue): Promise<void> {
    this.written.set(secretEnvName(name), serialize(value));
  }

  async deleteSecret(name: string): Promise<void> {
    this.written.set(secretEnvName(name), null);
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createSecretVault(source: Env = env): SecretVault {
  const backend =
    source.SECRETS_BACKEND === "auto"
      ? source.AWS_ENDPOINT_URL || source.NODE_ENV === "production"
        ? "aws"
        : "env"
      : source.SECRETS_BACKEND;

  return backend === "aws" ? AwsSecretVault.fromEnv(source) : new EnvSecretVault();
}
