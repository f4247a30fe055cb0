import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { KinesisClient } from "@aws-sdk/client-kinesis";
import { S3Client } from "@aws-sdk/client-s3";
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { SQSClient } from "@aws-sdk/client-sqs";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { AppConfig } from "./config";

export interface ClientOptions {
  region: string;
  endpoint?: string;
  credentials?: { accessKeyId: string; secretAccessKey: string };
}

/**
 * LocalStack accepts any static credentials; in the cloud the default
 * provider chain (Lambda role, instance profile) is used instead.
 */
export function clientOptions(config: AppConfig): ClientOptions {
  if (!config.isLocal) {
    return { region: config.region };
  }
  return {
    region: config.region,
    endpoint: config.localstackEndpoint,
    credentials: { accessKeyId: "test", secretAccessKey: "test" },
  };
}

export function createDocumentClient(config: AppConfig): DynamoDBDocumentClient {
  const dbClient = new DynamoDBClient(clientOptions(config));
  return DynamoDBDocumentClient.from(dbClient, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export function createSqsClient(config: AppConfig): SQSClient {
  return new SQSClient(clientOptions(config));
}

export function createS3Client(config: AppConfig): S3Client {
  // LocalStack serves buckets by path, not by virtual host.
  return new S3Client({ ...clientOptions(config), forcePathStyle: config.isLocal });
}

export function createSecretsClient(config: AppConfig): SecretsManagerClient {
  return new SecretsManagerClient(clientOptions(config));
}

export function createKinesisClient(config: AppConfig): KinesisClient {
  return new KinesisClient(clientOptions(config));
}
