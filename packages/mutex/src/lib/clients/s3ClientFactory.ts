// SPDX-License-Identifier: Apache-2.0

import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { ConfigService } from '@objmutex/config-service';

export class S3ClientFactory {
  /**
   * Builds an S3 client from the `S3_*` configuration.
   *
   * Static credentials are used when both the access key id and secret are configured;
   * otherwise the SDK's default credential chain applies.
   */
  public static create(): S3Client {
    const config: S3ClientConfig = {
      region: ConfigService.get('S3_REGION'),
      forcePathStyle: ConfigService.get('S3_FORCE_PATH_STYLE'),
    };

    const endpoint = ConfigService.get('S3_ENDPOINT_URL');
    if (endpoint) {
      config.endpoint = endpoint;
    }

    const accessKeyId = ConfigService.get('S3_ACCESS_KEY_ID');
    const secretAccessKey = ConfigService.get('S3_SECRET_ACCESS_KEY');
    if (accessKeyId && secretAccessKey) {
      config.credentials = { accessKeyId, secretAccessKey };
    }

    return new S3Client(config);
  }
}
