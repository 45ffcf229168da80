import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from '../src/config.js';
import { createPgDatabase, createPool, ensureSchema } from '../src/db.js';
import { errorMessage } from '../src/errors.js';
import { parseManifest } from '../src/services/download.js';
import { consoleLogger, importBatch, importRemoteBatch, type ImportContext } from '../src/services/importer.js';
import { createParserRegistry } from '../src/services/parser-registry.js';
import type { BatchOutcome } from '../src/types/import.js';

const { values: flags, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    clear: { type: 'boolean', default: false },
    'ensure-schema': { type: 'boolean', default: false },
    manifest: { type: 'string' },
    list: { type: 'boolean', default: false },
    'sequential-order': { type: 'string' },
  },
});

const registry = createParserRegistry();

async function main(): Promise<number> {
  if (flags.list) {
    registry.supportedFiles().forEach((name) => console.log(name));
    return 0;
  }

  const config = loadConfig();
  const pool = createPool(config.database);
  try {
    if (flags['ensure-schema']) {
      await ensureSchema(pool, registry.tables());
      consoleLogger('info', `schema ready (${registry.tables().length} tables)`);
    }

    const context: ImportContext = {
      database: createPgDatabase(pool, { statementTimeoutMs: config.import.statementTimeoutMs }),
      registry,
    };
    const tableOrder = flags['sequential-order']
      ?.split(',')
      .map((table) => table.trim())
      .filter(Boolean);
    const options = { clearFirst: flags.clear, tableOrder };

    let outcome: BatchOutcome;
    if (flags.manifest) {
      const manifest = parseManifest(JSON.parse(await readFile(flags.manifest, 'utf8')));
      outcome = await importRemoteBatch(context, manifest, {
        ...options,
        download: { timeoutMs: config.import.downloadTimeoutMs, maxBytes: config.import.maxFileSize },
      });
    } else {
      const files = await Promise.all(
        positionals.map(async (file) => ({ filename: path.basename(file), bytes: await readFile(file) }))
      );
      outcome = await importBatch(context, files, options);
    }

    console.log(JSON.stringify(outcome, null, 2));
    return outcome.status === 'succeeded' ? 0 : 1;
  } finally {
    await pool.end();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    consoleLogger('error', errorMessage(error));
    process.exitCode = 1;
  });
