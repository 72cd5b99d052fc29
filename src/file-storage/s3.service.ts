import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  S3Client,
  S3ClientConfig,
  PutObjectCommand,
  CreateBucketCommand,
  HeadBucketCommand,
} from "@aws-sdk/client-s3";
import { randomUUID } from "crypto";
import { StorageUnavailableError, isAWSNotFoundError } from "./errors";

@Injectable()
export class S3Service implements OnModuleInit {
  private readonly logger = new Logger(S3Service.name);
  private readonly s3Client: S3Client;
  private readonly bucketName: string;

  constructor(configService: ConfigService) {
    const endpoint = configService.get<string>("AWS_ENDPOINT");
    const region = configService.get<string>("AWS_REGION", "us-east-1");
    this.bucketName = configService.get<string>(
      "S3_BUCKET_NAME",
      "id3-pictures-local",
    );

    const clientConfig: S3ClientConfig = {
      region,
      forcePathStyle: true, // Required for LocalStack
    };

    if (endpoint) {
      clientConfig.endpoint = endpoint;
      this.logger.log(`Using LocalStack endpoint: ${endpoint}`);
    }

    this.s3Client = new S3Client(clientConfig);
  }

  async onModuleInit() {
    await this.ensureBucketExists();
  }

  /**
   * Ensures the S3 bucket exists, creates it if it doesn't
   * @throws StorageUnavailableError if the bucket can neither be found nor created
   */
  private async ensureBucketExists(): Promise<void> {
    try {
      await this.s3Client.send(
        new HeadBucketCommand({ Bucket: this.bucketName }),
      );
      this.logger.log(`S3 bucket '${this.bucketName}' already exists`);
      return;
    } catch (error: unknown) {
      if (!isAWSNotFoundError(error)) {
        this.logger.error(`Error checking S3 bucket '${this.bucketName}':`, error);
        throw new StorageUnavailableError(
          `Cannot reach S3 bucket '${this.bucketName}'`,
        );
      }
    }

    try {
      await this.s3Client.send(
        new CreateBucketCommand({ Bucket: this.bucketName }),
      );
      this.logger.log(`Created S3 bucket '${this.bucketName}'`);
    } catch (createError: unknown) {
      this.logger.error(
        `Failed to create S3 bucket '${this.bucketName}':`,
        createError,
      );
      throw new StorageUnavailableError(
        `Cannot create S3 bucket '${this.bucketName}'`,
      );
    }
  }

  /**
   * Upload a buffer to S3
   * @param key S3 object key
   * @param body Object content
   * @param contentType Optional content type
   */
  async putObject(key: string, body: Buffer, contentType?: string): Promise<void> {
    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucketName,
          Key: key,
          Body: body,
          ContentType: contentType,
          ContentLength: body.length,
        }),
      );
      this.logger.debug(`Uploaded object '${key}' (${body.length} bytes) to S3`);
    } catch (error) {
      this.logger.error(`Failed to upload object '${key}' to S3:`, error);
      throw error;
    }
  }

  /**
   * Generate a unique S3 key
   * @param prefix Key prefix
   * @param extension Optional file extension, without the dot
   * @returns Key in format: prefix/timestamp-uuid[.extension]
   */
  generateKey(prefix: string, extension?: string): string {
    const name = `${Date.now()}-${randomUUID()}`;
    return extension ? `${prefix}/${name}.${extension}` : `${prefix}/${name}`;
  }
}
