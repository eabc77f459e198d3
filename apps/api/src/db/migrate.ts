import 'dotenv/config';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import { createDb, type Queryable } from '../db.js';
import { createLogger } from '../logger.js';

/**
 * `sql/schema.sql` beside the sources when run through tsx. The build does not
 * copy it into dist/, so a compiled run falls back to the package directory,
 * which is the working directory of `npm run --workspace` scripts.
 */
export function resolveSchemaPath(
  moduleUrl: string,
  cwd: string = process.cwd(),
  exists: (p: string) => boolean = existsSync,
): string {
  const besideSources = fileURLToPath(new URL('../../sql/schema.sql', moduleUrl));
  if (exists(besideSources)) return besideSources;

  const inPackage = path.resolve(cwd, 'sql', 'schema.sql');
  return exists(inPackage) ? inPackage : besideSources;
}

export const SCHEMA_PATH = resolveSchemaPath(import.meta.url);

type Args = { dryRun: boolean; schemaPath: string };

export function parseArgs(argv: string[]): Args {
  const args: Args = { dryRun: false, schemaPath: SCHEMA_PATH };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--dry-run') args.dryRun = true;
    else if (a === '--schema') {
      const v = argv[i + 1];
      if (!v) throw new Error('Missing value for --schema');
      args.schemaPath = v;
      i++;
    } else {
      throw new Error(`Unknown argument: ${a}`);
    }
  }

  return args;
}

/** Applies the schema file as one statement batch. The schema is idempotent. */
export async function applySchema(db: Queryable, schemaPath: string): Promise<{ bytes: number }> {
  const sql = await readFile(schemaPath, 'utf8');
  await db.query(sql);
  return { bytes: Buffer.byteLength(sql, 'utf8') };
}

async function main() {
  const log = createLogger(process.env.LOG_LEVEL ?? 'info');
  const args = parseArgs(process.argv.slice(2));

  if (args.dryRun) {
    process.stdout.write(await readFile(args.schemaPath, 'utf8'));
    return;
  }

  const databaseUrl = (process.env.DATABASE_URL ?? '').trim();
  if (!databaseUrl) throw new Error('DATABASE_URL is required');

  const db = createDb(databaseUrl);
  try {
    const result = await applySchema(db, args.schemaPath);
    log.info({ schemaPath: args.schemaPath, ...result }, 'schema applied');
  } finally {
    await db.close();
  }
}

const isDirectRun = process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main().catch((e) => {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exit(1);
  });
}
