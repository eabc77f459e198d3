import { z } from 'zod';

const uuidSchema = z.string().uuid();

export const orderIdParamsSchema = z.object({ orderId: uuidSchema });

export const entitlementIdParamsSchema = z.object({ entitlementId: uuidSchema });

// Query-string booleans: `?flag=1` / `?flag=true`.
export const queryFlagSchema = z
  .enum(['1', 'true', '0', 'false'])
  .optional()
  .transform((v) => v === '1' || v === 'true');
