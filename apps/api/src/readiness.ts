import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { getS3Config } from './s3.js';

export type CatalogMode = 'http' | 'fixture' | 'empty';

export type ReadinessReport = {
  ready: boolean;
  storeDriver: AppConfig['store']['driver'];
  catalogMode: CatalogMode;
  checks: {
    paymentWebhookSecret: boolean;
    opsApiToken: boolean;
    blobStore: boolean;
  };
  reasons: string[];
};

export function catalogModeFor(config: AppConfig): CatalogMode {
  if (config.catalog.baseUrl) return 'http';
  if (config.catalog.fixturePath) return 'fixture';
  return 'empty';
}

function blobStoreProblem(env: NodeJS.ProcessEnv): string | null {
  try {
    getS3Config(env);
    return null;
  } catch (e) {
    return errorMessage(e);
  }
}

export function buildReadinessReport(config: AppConfig, env: NodeJS.ProcessEnv = process.env): ReadinessReport {
  const reasons: string[] = [];
  if (!config.paymentWebhookSecret) reasons.push('PAYMENT_WEBHOOK_SECRET missing (payment webhook disabled)');
  if (!config.opsApiToken) reasons.push('OPS_API_TOKEN missing (ops routes disabled)');

  const blobProblem = blobStoreProblem(env);
  if (blobProblem) reasons.push(blobProblem);

  const catalogMode = catalogModeFor(config);
  if (catalogMode === 'empty') reasons.push('CATALOG_BASE_URL and CATALOG_FIXTURE_PATH missing (catalog is empty)');

  return {
    ready: reasons.length === 0,
    storeDriver: config.store.driver,
    catalogMode,
    checks: {
      paymentWebhookSecret: Boolean(config.paymentWebhookSecret),
      opsApiToken: Boolean(config.opsApiToken),
      blobStore: blobProblem === null,
    },
    reasons,
  };
}
