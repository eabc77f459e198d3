import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { buildReadinessReport } from './readiness.js';

const config = loadConfig();
const app = await buildApp({ config });

const readiness = buildReadinessReport(config);
if (readiness.ready) {
  app.log.info({ storeDriver: readiness.storeDriver, catalogMode: readiness.catalogMode }, 'startup checks: ready');
} else {
  app.log.warn(
    { storeDriver: readiness.storeDriver, catalogMode: readiness.catalogMode, warnings: readiness.reasons },
    'startup checks: incomplete configuration',
  );
}

await app.listen({ port: config.port, host: config.host });
