import { S3Client } from '@aws-sdk/client-s3';
import { z } from 'zod';

const s3EnvSchema = z.object({
  S3_ENDPOINT: z.string().trim().url(),
  S3_BUCKET: z.string().trim().min(1),
  S3_ACCESS_KEY_ID: z.string().trim().min(1),
  S3_SECRET_ACCESS_KEY: z.string().trim().min(1),
  S3_REGION: z.string().trim().min(1).default('us-east-1'),
  S3_FORCE_PATH_STYLE: z.string().trim().default('true'),
  // Default to 15 minutes.
  S3_PRESIGN_EXPIRES_SEC: z.coerce.number().int().positive().default(900),
});

export type S3Config = {
  endpoint: string;
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
  presignExpiresSec: number;
};

export function getS3Config(env: NodeJS.ProcessEnv = process.env): S3Config {
  const parsed = s3EnvSchema.safeParse(env);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid S3 env vars: ${missing}`);
  }
  const v = parsed.data;

  return {
    endpoint: v.S3_ENDPOINT,
    bucket: v.S3_BUCKET,
    region: v.S3_REGION,
    accessKeyId: v.S3_ACCESS_KEY_ID,
    secretAccessKey: v.S3_SECRET_ACCESS_KEY,
    // MinIO typically needs path-style addressing.
    forcePathStyle: v.S3_FORCE_PATH_STYLE.toLowerCase() !== 'false',
    presignExpiresSec: v.S3_PRESIGN_EXPIRES_SEC,
  };
}

export function makeS3Client(env: NodeJS.ProcessEnv = process.env): { cfg: S3Config; client: S3Client } {
  const cfg = getS3Config(env);
  return {
    cfg,
    client: new S3Client({
      region: cfg.region,
      endpoint: cfg.endpoint,
      forcePathStyle: cfg.forcePathStyle,
      credentials: {
        accessKeyId: cfg.accessKeyId,
        secretAccessKey: cfg.secretAccessKey,
      },
    }),
  };
}
