import { GetObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

import { DomainError, errorMessage } from '../errors.js';
import { makeS3Client } from '../s3.js';
import { assertPrefix, fileNameFromObjectKey, PRODUCT_FILE_PREFIX } from '../storageKeys.js';

export type TemporaryAccess = {
  url: string;
  expiresInSec: number;
};

export interface BlobStore {
  getTemporaryAccessUrl(fileBlobRef: string): Promise<TemporaryAccess>;
}

export class S3BlobStore implements BlobStore {
  // The S3 client is built per call: missing S3 env must not prevent the API from starting.
  constructor(private readonly makeClient: typeof makeS3Client = makeS3Client) {}

  async getTemporaryAccessUrl(fileBlobRef: string): Promise<TemporaryAccess> {
    try {
      assertPrefix(fileBlobRef, PRODUCT_FILE_PREFIX);
    } catch (e) {
      throw new DomainError('BlobStoreUnavailable', 'Invalid product file reference', { fileBlobRef }, { cause: e });
    }

    let s3: ReturnType<typeof makeS3Client>;
    try {
      s3 = this.makeClient();
    } catch (e) {
      throw new DomainError('BlobStoreUnavailable', errorMessage(e), {}, { cause: e });
    }
    const { client, cfg } = s3;

    const command = new GetObjectCommand({
      Bucket: cfg.bucket,
      Key: fileBlobRef,
      ResponseContentDisposition: `attachment; filename="${fileNameFromObjectKey(fileBlobRef)}"`,
    });

    try {
      const url = await getSignedUrl(client, command, { expiresIn: cfg.presignExpiresSec });
      return { url, expiresInSec: cfg.presignExpiresSec };
    } catch (e) {
      throw new DomainError('BlobStoreUnavailable', `Presigning failed: ${errorMessage(e)}`, { fileBlobRef }, { cause: e });
    }
  }
}
