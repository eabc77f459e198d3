import crypto from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { AppServices } from '../services.js';
import { sendDomainError } from './domainErrors.js';
import { fail, ok } from './httpResponses.js';

// Fields stay as sent until the signature is checked; the gateway signed them verbatim.
const paymentWebhookBodySchema = z.object({
  orderId: z.string().uuid(),
  paymentRef: z
    .string()
    .max(256)
    .refine((v) => v.trim().length > 0, 'paymentRef must not be blank'),
  outcome: z.enum(['succeeded', 'failed']),
  sequence: z.number().int().nonnegative().optional(),
});

export type PaymentWebhookBody = z.infer<typeof paymentWebhookBodySchema>;

function hmacHex(key: string, msg: string): string {
  return crypto.createHmac('sha256', key).update(msg).digest('hex');
}

function safeHexEquals(a: string, b: string): boolean {
  const aHex = a.trim().toLowerCase();
  const bHex = b.trim().toLowerCase();
  if (aHex.length !== bHex.length) return false;
  return crypto.timingSafeEqual(Buffer.from(aHex, 'utf8'), Buffer.from(bHex, 'utf8'));
}

function normalizeSignature(value: unknown): { digest: string; validHex: boolean } {
  const raw = String(value ?? '').trim();
  const digest = raw.toLowerCase().startsWith('sha256=') ? raw.slice('sha256='.length).trim() : raw;
  return { digest, validHex: /^[0-9a-fA-F]{64}$/.test(digest) };
}

// Absent sequence signs as the empty string.
export function paymentSignatureMessage(body: PaymentWebhookBody): string {
  return `${body.orderId}:${body.paymentRef}:${body.outcome}:${body.sequence ?? ''}`;
}

export function signPaymentWebhook(secret: string, body: PaymentWebhookBody): string {
  return `sha256=${hmacHex(secret, paymentSignatureMessage(body))}`;
}

// Payment gateway confirmations. At-least-once and possibly out of order;
// the fulfillment processor makes every delivery after the first a no-op.
export async function registerPaymentWebhookRoutes(
  app: FastifyInstance,
  deps: Pick<AppServices, 'fulfillment'> & { secret: string | null },
) {
  app.post('/webhooks/payments', async (req, reply) => {
    if (!deps.secret) {
      req.log.error({ route: 'payment-webhook' }, 'payment webhook misconfigured: PAYMENT_WEBHOOK_SECRET missing');
      return reply.status(503).send(fail('Payment webhook not configured'));
    }

    const parsed = paymentWebhookBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send(fail('Invalid request body', { issues: parsed.error.issues }));
    }
    const body = parsed.data;

    const signature = normalizeSignature(req.headers['x-payment-signature']);
    const expected = hmacHex(deps.secret, paymentSignatureMessage(body));
    if (!signature.validHex || !safeHexEquals(signature.digest, expected)) {
      req.log.warn({ orderId: body.orderId, paymentRef: body.paymentRef }, 'payment webhook signature mismatch');
      return reply.status(401).send(fail('Invalid signature'));
    }

    try {
      const result = await deps.fulfillment.handlePaymentConfirmation({ ...body, paymentRef: body.paymentRef.trim() });
      return reply.status(200).send(ok({ ...result }));
    } catch (e) {
      return sendDomainError(reply, e);
    }
  });
}
