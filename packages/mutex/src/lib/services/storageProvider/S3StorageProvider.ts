// SPDX-License-Identifier: Apache-2.0

import { GetObjectCommand, PutObjectCommand, type S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';

import { ConflictError } from '../../errors/ConflictError';
import { StorageProviderError } from '../../errors/StorageProviderError';
import type { ObjectLocation, StorageProvider, UpdateObjectFn } from '../../types';

const PRECONDITION_ERROR_CODES = new Set(['PreconditionFailed', 'ConditionalRequestConflict']);

function stripQuotes(etag: string): string {
  return etag.replace(/"/g, '');
}

function statusCodeOf(error: unknown): number | undefined {
  return error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
}

function isMissingObject(error: unknown): boolean {
  return error instanceof S3ServiceException && (error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404);
}

function isPreconditionFailure(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  const status = error.$metadata.httpStatusCode;
  return PRECONDITION_ERROR_CODES.has(error.name) || status === 412 || status === 409;
}

/**
 * Object store backed by S3 or an S3-compatible service, using conditional PutObject.
 *
 * @remarks
 * - Existing objects are replaced with `If-Match` on the ETag read
 * - Absent objects are created with `If-None-Match: *`
 * - The ETag is sent without surrounding quotes; Ceph RGW rejects the quoted form
 *   and AWS accepts both
 */
export class S3StorageProvider implements StorageProvider {
  public readonly name = 's3';

  private readonly logger: Logger;

  /**
   * @param s3Client - Client for the target endpoint.
   * @param logger - Logger instance for logging.
   */
  constructor(
    private readonly s3Client: S3Client,
    logger: Logger,
  ) {
    this.logger = logger.child({ name: 's3-storage-provider' });
  }

  async atomicUpdate(location: ObjectLocation, transform: UpdateObjectFn): Promise<string> {
    const { bucket, key } = location;

    let currentVersionTag: string | undefined;
    let currentData = Buffer.alloc(0);
    try {
      const response = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      currentVersionTag = response.ETag ? stripQuotes(response.ETag) : undefined;
      if (response.Body) {
        currentData = Buffer.from(await response.Body.transformToByteArray());
      }
    } catch (error) {
      if (!isMissingObject(error)) {
        this.logger.error(error, `Failed to read s3://${bucket}/${key}`);
        throw new StorageProviderError(this.name, 'read', error, statusCodeOf(error));
      }
    }

    const newData = transform(currentVersionTag, currentData);

    try {
      const response = await this.s3Client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: newData,
          ContentType: 'application/json',
          ...(currentVersionTag !== undefined ? { IfMatch: currentVersionTag } : { IfNoneMatch: '*' }),
        }),
      );

      if (!response.ETag) {
        throw new Error('response carries no ETag');
      }
      return stripQuotes(response.ETag);
    } catch (error) {
      if (isPreconditionFailure(error)) {
        if (this.logger.isLevelEnabled('trace')) {
          this.logger.trace(`Conflict on s3://${bucket}/${key}: ETag ${currentVersionTag ?? '<absent>'} was replaced`);
        }
        throw new ConflictError();
      }

      this.logger.error(error, `Failed to write s3://${bucket}/${key}`);
      throw new StorageProviderError(this.name, 'write', error, statusCodeOf(error));
    }
  }
}
