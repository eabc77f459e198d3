import crypto from 'node:crypto';
import { describe, expect, it } from 'vitest';

import { type DownloadTokenClaims, signDownloadToken, verifyDownloadToken } from './downloadToken.js';

const SECRET = 'test-secret-for-download-tokens';
const ISSUED = new Date('2026-01-01T00:00:00.000Z');
const IAT = Math.floor(ISSUED.getTime() / 1000);

const claims: DownloadTokenClaims = {
  tid: 'token-1',
  eid: 'entitlement-1',
  uid: 'user-1',
  iat: IAT,
  exp: IAT + 300,
  su: false,
};

function signRaw(payload: string): string {
  return `v1.${payload}.${crypto.createHmac('sha256', SECRET).update(payload).digest('hex')}`;
}

describe('download tokens', () => {
  it('round-trips claims before expiry', () => {
    const token = signDownloadToken(claims, SECRET);

    expect(token.startsWith('v1.')).toBe(true);
    expect(verifyDownloadToken(token, SECRET, ISSUED)).toEqual({ kind: 'ok', claims });
  });

  it('rejects a token signed with another secret', () => {
    const token = signDownloadToken(claims, 'another-test-secret');

    expect(verifyDownloadToken(token, SECRET, ISSUED)).toEqual({ kind: 'bad_signature' });
  });

  it('rejects a payload swapped under an existing signature', () => {
    const [, , signature] = signDownloadToken(claims, SECRET).split('.');
    const forged = Buffer.from(JSON.stringify({ ...claims, eid: 'entitlement-2' })).toString('base64url');

    expect(verifyDownloadToken(`v1.${forged}.${signature}`, SECRET, ISSUED)).toEqual({ kind: 'bad_signature' });
  });

  it('reports expiry from the expiry second onwards, with claims', () => {
    const token = signDownloadToken(claims, SECRET);
    const atExpiry = new Date((IAT + 300) * 1000);

    expect(verifyDownloadToken(token, SECRET, new Date(atExpiry.getTime() - 1000)).kind).toBe('ok');
    expect(verifyDownloadToken(token, SECRET, atExpiry)).toEqual({ kind: 'expired', claims });
  });

  it.each([
    ['empty string', ''],
    ['wrong part count', 'v1.abc'],
    ['unknown version', 'v2.abc.' + 'a'.repeat(64)],
    ['non-hex signature', 'v1.abc.not-a-signature'],
  ])('treats %s as malformed', (_label, token) => {
    expect(verifyDownloadToken(token, SECRET, ISSUED)).toEqual({ kind: 'malformed' });
  });

  it('treats a correctly signed non-JSON or incomplete payload as malformed', () => {
    const notJson = Buffer.from('not-json').toString('base64url');
    const incomplete = Buffer.from(JSON.stringify({ tid: 'token-1' })).toString('base64url');

    expect(verifyDownloadToken(signRaw(notJson), SECRET, ISSUED)).toEqual({ kind: 'malformed' });
    expect(verifyDownloadToken(signRaw(incomplete), SECRET, ISSUED)).toEqual({ kind: 'malformed' });
  });
});
