import { describe, expect, it, vi } from 'vitest';

import type { NewDownloadEvent } from '../domain/types.js';
import { MemoryDownloadAuditStore } from '../store/memory.js';
import { DownloadAuditLog, hashClientRef, normalizeUserAgent } from './downloadAuditLog.js';

function event(overrides: Partial<NewDownloadEvent> = {}): NewDownloadEvent {
  return {
    entitlementId: 'entitlement-1',
    occurredAt: new Date('2026-01-01T00:00:00.000Z'),
    outcome: 'granted',
    clientRef: null,
    userAgent: null,
    tokenId: 'token-1',
    reason: null,
    ...overrides,
  };
}

describe('DownloadAuditLog', () => {
  it('lists events for an entitlement in chronological order', async () => {
    const log = new DownloadAuditLog(new MemoryDownloadAuditStore());
    await log.append(event({ occurredAt: new Date('2026-01-03T00:00:00.000Z'), outcome: 'denied_exhausted' }));
    await log.append(event({ occurredAt: new Date('2026-01-01T00:00:00.000Z') }));
    await log.append(event({ entitlementId: 'entitlement-2' }));

    const events = await log.listForEntitlement('entitlement-1');

    expect(events.map((e) => e.outcome)).toEqual(['granted', 'denied_exhausted']);
    expect(new Set(events.map((e) => e.id)).size).toBe(2);
  });

  it('counts denials since a point in time', async () => {
    const log = new DownloadAuditLog(new MemoryDownloadAuditStore());
    await log.append(event({ outcome: 'denied_expired', occurredAt: new Date('2026-01-01T00:00:00.000Z') }));
    await log.append(event({ outcome: 'denied_token_invalid', occurredAt: new Date('2026-01-02T00:00:00.000Z') }));
    await log.append(event({ outcome: 'denied_exhausted', occurredAt: new Date('2026-01-03T00:00:00.000Z') }));
    await log.append(event({ outcome: 'granted', occurredAt: new Date('2026-01-03T00:00:00.000Z') }));

    await expect(log.countDenialsSince('entitlement-1', new Date('2026-01-02T00:00:00.000Z'))).resolves.toBe(2);
  });

  it('claims a single-use token once', async () => {
    const log = new DownloadAuditLog(new MemoryDownloadAuditStore());
    const at = new Date('2026-01-01T00:00:00.000Z');

    await expect(log.claimSingleUseToken('token-1', 'entitlement-1', at)).resolves.toBe(true);
    await expect(log.claimSingleUseToken('token-1', 'entitlement-1', at)).resolves.toBe(false);
    await expect(log.claimSingleUseToken('token-2', 'entitlement-1', at)).resolves.toBe(true);
  });

  it('surfaces storage failures as AuditLogUnavailable', async () => {
    const store = new MemoryDownloadAuditStore();
    vi.spyOn(store, 'append').mockRejectedValue(new Error('connection reset'));
    const log = new DownloadAuditLog(store);

    await expect(log.append(event())).rejects.toMatchObject({
      kind: 'AuditLogUnavailable',
      message: 'download audit log append failed: connection reset',
    });
  });
});

describe('client fingerprinting', () => {
  it('hashes client addresses and drops blanks', () => {
    expect(hashClientRef('198.51.100.1')).toMatch(/^[0-9a-f]{64}$/);
    expect(hashClientRef(' 198.51.100.1 ')).toBe(hashClientRef('198.51.100.1'));
    expect(hashClientRef('')).toBeNull();
    expect(hashClientRef(undefined)).toBeNull();
  });

  it('caps user agents at 512 characters', () => {
    expect(normalizeUserAgent('x'.repeat(600))).toHaveLength(512);
    expect(normalizeUserAgent('  ')).toBeNull();
    expect(normalizeUserAgent('curl/8.0')).toBe('curl/8.0');
  });
});
