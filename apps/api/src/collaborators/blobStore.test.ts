import { S3Client } from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';

import { getS3Config, makeS3Client } from '../s3.js';
import { S3BlobStore } from './blobStore.js';

const env = {
  S3_ENDPOINT: 'http://minio.test:9000',
  S3_BUCKET: 'test-bucket',
  S3_ACCESS_KEY_ID: 'test-access-key',
  S3_SECRET_ACCESS_KEY: 'test-secret',
};

describe('getS3Config', () => {
  it('applies defaults', () => {
    expect(getS3Config(env)).toEqual({
      endpoint: 'http://minio.test:9000',
      bucket: 'test-bucket',
      region: 'us-east-1',
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      forcePathStyle: true,
      presignExpiresSec: 900,
    });
    expect(getS3Config({ ...env, S3_FORCE_PATH_STYLE: 'FALSE', S3_PRESIGN_EXPIRES_SEC: '60' })).toMatchObject({
      forcePathStyle: false,
      presignExpiresSec: 60,
    });
  });

  it('names every missing variable', () => {
    expect(() => getS3Config({})).toThrow(
      'Missing or invalid S3 env vars: S3_ENDPOINT, S3_BUCKET, S3_ACCESS_KEY_ID, S3_SECRET_ACCESS_KEY',
    );
  });
});

describe('S3BlobStore', () => {
  it('presigns a GET for the product file', async () => {
    const blobs = new S3BlobStore(() => makeS3Client(env));

    const access = await blobs.getTemporaryAccessUrl('products/ebook-1/field-guide.pdf');

    expect(access.expiresInSec).toBe(900);
    const url = new URL(access.url);
    expect(url.origin).toBe('http://minio.test:9000');
    expect(url.pathname).toBe('/test-bucket/products/ebook-1/field-guide.pdf');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('900');
    expect(url.searchParams.get('response-content-disposition')).toBe('attachment; filename="field-guide.pdf"');
  });

  it('refuses references outside the product prefix', async () => {
    const blobs = new S3BlobStore(() => makeS3Client(env));

    await expect(blobs.getTemporaryAccessUrl('private/keys.txt')).rejects.toMatchObject({
      kind: 'BlobStoreUnavailable',
      message: 'Invalid product file reference',
    });
  });

  it('reports missing S3 configuration as BlobStoreUnavailable', async () => {
    const blobs = new S3BlobStore(() => makeS3Client({}));

    await expect(blobs.getTemporaryAccessUrl('products/ebook-1/field-guide.pdf')).rejects.toMatchObject({
      kind: 'BlobStoreUnavailable',
      category: 'transient',
    });
  });

  it('reports presigning failures as BlobStoreUnavailable', async () => {
    const blobs = new S3BlobStore(() => ({
      cfg: getS3Config(env),
      client: new S3Client({
        region: 'us-east-1',
        endpoint: 'http://minio.test:9000',
        credentials: async () => {
          throw new Error('credentials unavailable');
        },
      }),
    }));

    await expect(blobs.getTemporaryAccessUrl('products/ebook-1/field-guide.pdf')).rejects.toMatchObject({
      kind: 'BlobStoreUnavailable',
      message: expect.stringMatching(/^Presigning failed: .*credentials unavailable/),
      details: { fileBlobRef: 'products/ebook-1/field-guide.pdf' },
    });
  });
});
