import crypto from 'node:crypto';
import { z } from 'zod';

const TOKEN_VERSION = 'v1';

const tokenClaimsSchema = z.object({
  tid: z.string().min(1),
  eid: z.string().min(1),
  uid: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  su: z.boolean(),
});

export type DownloadTokenClaims = z.infer<typeof tokenClaimsSchema>;

export type VerifyResult =
  | { kind: 'ok'; claims: DownloadTokenClaims }
  | { kind: 'malformed' }
  | { kind: 'bad_signature' }
  | { kind: 'expired'; claims: DownloadTokenClaims };

function hmacHex(secret: string, msg: string): string {
  return crypto.createHmac('sha256', secret).update(msg).digest('hex');
}

function safeHexEquals(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

export function signDownloadToken(claims: DownloadTokenClaims, secret: string): string {
  const payload = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url');
  return `${TOKEN_VERSION}.${payload}.${hmacHex(secret, payload)}`;
}

/**
 * Checks shape, signature, then expiry. Claims are only returned once the
 * signature is known good.
 */
export function verifyDownloadToken(token: string, secret: string, now: Date): VerifyResult {
  const parts = token.split('.');
  if (parts.length !== 3 || parts[0] !== TOKEN_VERSION) return { kind: 'malformed' };

  const [, payload, signature] = parts;
  if (!/^[0-9a-f]{64}$/.test(signature)) return { kind: 'malformed' };
  if (!safeHexEquals(signature, hmacHex(secret, payload))) return { kind: 'bad_signature' };

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch {
    return { kind: 'malformed' };
  }

  const parsed = tokenClaimsSchema.safeParse(decoded);
  if (!parsed.success) return { kind: 'malformed' };

  const claims = parsed.data;
  if (Math.floor(now.getTime() / 1000) >= claims.exp) return { kind: 'expired', claims };
  return { kind: 'ok', claims };
}
