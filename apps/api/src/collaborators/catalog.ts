import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { DomainError, errorMessage } from '../errors.js';

export const downloadExpiryPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('never') }),
  z.object({ kind: z.literal('days_after_fulfillment'), days: z.number().int().positive() }),
  z.object({ kind: z.literal('fixed'), expiresAt: z.coerce.date() }),
]);

export type DownloadExpiryPolicy = z.infer<typeof downloadExpiryPolicySchema>;

export const catalogProductSchema = z.object({
  productId: z.string().min(1),
  name: z.string().default(''),
  price: z.number(),
  currency: z.string().length(3).transform((v) => v.toUpperCase()),
  available: z.boolean().default(true),
  downloadLimit: z.number().int().positive().nullable().default(null),
  downloadExpiryPolicy: downloadExpiryPolicySchema.default({ kind: 'never' }),
  fileBlobRef: z.string().min(1),
  // Products with a license type get a license key per purchase.
  licenseType: z.string().trim().min(1).nullable().default(null),
});

export type CatalogProduct = z.infer<typeof catalogProductSchema>;

export interface CatalogClient {
  /** null when the catalog does not know the product. */
  resolveProduct(productId: string): Promise<CatalogProduct | null>;
}

function catalogUnavailable(productId: string, message: string, cause?: unknown): DomainError {
  return new DomainError('CatalogUnavailable', message, { productId }, { cause });
}

export class HttpCatalogClient implements CatalogClient {
  private readonly baseUrl: string;

  constructor(
    private readonly opts: {
      baseUrl: string;
      timeoutMs: number;
      fetchImpl?: typeof fetch;
    },
  ) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
  }

  async resolveProduct(productId: string): Promise<CatalogProduct | null> {
    const fetchImpl = this.opts.fetchImpl ?? fetch;

    let res: Response;
    try {
      res = await fetchImpl(`${this.baseUrl}/products/${encodeURIComponent(productId)}`, {
        headers: { accept: 'application/json' },
        // Fail fast; the caller surfaces the failure and upstream redelivers.
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (e) {
      throw catalogUnavailable(productId, `catalog request failed: ${errorMessage(e)}`, e);
    }

    if (res.status === 404) return null;

    const text = await res.text();
    if (!res.ok) {
      throw catalogUnavailable(productId, `catalog responded ${res.status}: ${text.slice(0, 200)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw catalogUnavailable(productId, `catalog returned invalid JSON: ${text.slice(0, 200)}`, e);
    }

    const parsed = catalogProductSchema.safeParse(json);
    if (!parsed.success) {
      throw catalogUnavailable(productId, 'catalog returned a malformed product', parsed.error);
    }
    return parsed.data;
  }
}

export class StaticCatalog implements CatalogClient {
  private readonly products: Map<string, CatalogProduct>;

  constructor(products: Iterable<CatalogProduct>) {
    this.products = new Map([...products].map((p) => [p.productId, p]));
  }

  static async fromFile(path: string): Promise<StaticCatalog> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    return new StaticCatalog(z.array(catalogProductSchema).parse(raw));
  }

  /** Replaces (or adds) a product; policy changes take effect at the next fulfillment. */
  upsert(product: CatalogProduct): void {
    this.products.set(product.productId, product);
  }

  async resolveProduct(productId: string): Promise<CatalogProduct | null> {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }
}
