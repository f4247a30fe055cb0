import { PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";
import type { Logger } from "./logger";

export interface BlobStore {
  /** Stores a UTF-8 text object and resolves with its URL. */
  putText(key: string, body: string, metadata: Record<string, string>): Promise<string>;
}

export interface S3BlobStoreOptions {
  bucketName: string;
  /** Set when running against LocalStack; URLs then point at it. */
  localEndpoint?: string;
}

/**
 * `artifacts/{userId}/{yyyy}/{mm}/{dd}/{recordId}.txt`, dated in UTC.
 */
export function artifactKey(userId: string, recordId: string, generatedAt: Date): string {
  const year = generatedAt.getUTCFullYear();
  const month = String(generatedAt.getUTCMonth() + 1).padStart(2, "0");
  const day = String(generatedAt.getUTCDate()).padStart(2, "0");
  return `artifacts/${userId}/${year}/${month}/${day}/${recordId}.txt`;
}

export function objectUrl(options: S3BlobStoreOptions, key: string): string {
  if (options.localEndpoint) {
    return `${options.localEndpoint.replace(/\/+$/, "")}/${options.bucketName}/${key}`;
  }
  return `https://${options.bucketName}.s3.amazonaws.com/${key}`;
}

export class S3BlobStore implements BlobStore {
  constructor(
    private readonly s3: S3Client,
    private readonly options: S3BlobStoreOptions,
    private readonly logger: Logger,
  ) {}

  async putText(key: string, body: string, metadata: Record<string, string>): Promise<string> {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.options.bucketName,
        Key: key,
        Body: Buffer.from(body, "utf-8"),
        ContentType: "text/plain; charset=utf-8",
        Metadata: metadata,
      }),
    );
    const url = objectUrl(this.options, key);
    this.logger.info("Uploaded artifact", { url });
    return url;
  }
}
