import { GetSecretValueCommand, type SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { Logger } from "./logger";

const SecretStringSchema = z.object({
  GEMINI_KEY: z.string(),
  JWT_SECRET: z.string().min(1),
});

export interface SecretBundle {
  inferenceApiKey: string;
  signingSecret: string;
}

export type SecretLoader = () => Promise<SecretBundle>;

export function parseSecretString(secretString: string): SecretBundle {
  let json: unknown;
  try {
    json = JSON.parse(secretString);
  } catch {
    throw new ConfigurationError("Secret value is not valid JSON.");
  }

  const result = SecretStringSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError("Secret bundle is missing GEMINI_KEY or JWT_SECRET.", {
      issues: result.error.issues.map((issue) => issue.path.join(".")),
    });
  }

  return {
    inferenceApiKey: result.data.GEMINI_KEY,
    signingSecret: result.data.JWT_SECRET,
  };
}

/**
 * Loads the bundle from Secrets Manager by name.
 */
export function secretsManagerLoader(client: SecretsManagerClient, secretName: string): SecretLoader {
  return async () => {
    const { SecretString } = await client.send(new GetSecretValueCommand({ SecretId: secretName }));
    if (!SecretString) {
      throw new ConfigurationError(`Secret ${secretName} has no string value.`);
    }
    return parseSecretString(SecretString);
  };
}

/**
 * Holds the secret bundle for the life of the process. The first successful
 * load is kept forever: rotating a secret requires restarting the process.
 * A failed load is not remembered, so the next caller tries again.
 */
export class SecretCache {
  private pending: Promise<SecretBundle> | null = null;

  constructor(
    private readonly load: SecretLoader,
    private readonly logger: Logger,
  ) {}

  get(): Promise<SecretBundle> {
    if (!this.pending) {
      this.pending = this.load().then(
        (bundle) => {
          this.logger.info("Secrets retrieved and cached");
          return bundle;
        },
        (error: unknown) => {
          this.pending = null;
          this.logger.error("Failed to retrieve secrets", { error });
          throw error;
        },
      );
    }
    return this.pending;
  }
}
