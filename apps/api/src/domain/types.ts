import { z } from 'zod';

export const orderStatusSchema = z.enum(['pending_payment', 'paid', 'failed', 'refunded']);
export type OrderStatus = z.infer<typeof orderStatusSchema>;

export const entitlementStatusSchema = z.enum(['active', 'exhausted', 'revoked']);
export type EntitlementStatus = z.infer<typeof entitlementStatusSchema>;

export const downloadOutcomeSchema = z.enum([
  'granted',
  'denied_expired',
  'denied_exhausted',
  'denied_revoked',
  'denied_token_invalid',
]);
export type DownloadOutcome = z.infer<typeof downloadOutcomeSchema>;

export const userRoleSchema = z.enum(['buyer', 'creator']);
export type UserRole = z.infer<typeof userRoleSchema>;

// Prices are integer minor units (cents) so totals never drift.
export const lineItemSchema = z.object({
  lineItemId: z.string().min(1),
  productId: z.string().min(1),
  productName: z.string(),
  unitPrice: z.number().int().positive(),
  currency: z.string().length(3),
});
export type LineItem = z.infer<typeof lineItemSchema>;

export const lineItemsSchema = z.array(lineItemSchema);

export type Order = {
  id: string;
  orderNumber: string;
  userId: string;
  lineItems: readonly LineItem[];
  currency: string;
  total: number;
  status: OrderStatus;
  paymentRef: string | null;
  paymentSequence: number | null;
  createdAt: Date;
  updatedAt: Date;
  paidAt: Date | null;
  failedAt: Date | null;
  refundedAt: Date | null;
};

export type Entitlement = {
  id: string;
  userId: string;
  productId: string;
  orderId: string;
  lineItemId: string;
  fileBlobRef: string;
  licenseKey: string | null;
  downloadLimit: number | null;
  downloadsConsumed: number;
  expiresAt: Date | null;
  status: EntitlementStatus;
  lastAccessedAt: Date | null;
  createdAt: Date;
  revokedAt: Date | null;
};

export type NewEntitlement = Pick<
  Entitlement,
  'userId' | 'productId' | 'orderId' | 'lineItemId' | 'fileBlobRef' | 'downloadLimit' | 'expiresAt'
> & { licenseKey?: string | null };

export type DownloadEvent = {
  id: string;
  entitlementId: string | null;
  occurredAt: Date;
  outcome: DownloadOutcome;
  clientRef: string | null;
  userAgent: string | null;
  tokenId: string | null;
  reason: string | null;
};

export type NewDownloadEvent = Omit<DownloadEvent, 'id'>;

export const creatorCategorySchema = z.enum([
  'art_design',
  'business',
  'education',
  'fitness_health',
  'food_cooking',
  'gaming',
  'lifestyle',
  'music',
  'photography',
  'technology',
  'travel',
  'writing',
  'other',
]);
export type CreatorCategory = z.infer<typeof creatorCategorySchema>;

export const storeMetadataSchema = z.object({
  storeName: z.string().trim().min(2).max(100),
  storeDescription: z.string().trim().max(1000).default(''),
  category: creatorCategorySchema.default('other'),
});
export type StoreMetadata = z.infer<typeof storeMetadataSchema>;

export type CreatorCapabilityRecord = {
  id: string;
  userId: string;
  storeName: string;
  storeSlug: string;
  storeDescription: string;
  category: CreatorCategory;
  status: 'active';
  createdAt: Date;
};

export type User = {
  id: string;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
};

export type Session = {
  id: string;
  userId: string;
  expiresAt: Date;
};
