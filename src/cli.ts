#!/usr/bin/env node
// src/cli.ts
import { SchemaDatabase } from './database.js';
import { loadConfig } from './config.js';
import { createLogger } from './log.js';
import type { StoreResult } from './types.js';

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const [command = 'help', ...rest] = argv;
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = rest[i + 1];
      if (next && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

function printUsage(): void {
  console.log(`
  schema-depot — schema cache keyed by location and declared id

  Usage:
    schema-depot scan <dir>          Load every schema file under a directory
    schema-depot fetch <uri>         Load a schema from a file:, http: or https: URI
    schema-depot get <dir> <key>     Load a directory, then look up a schema by path or id

  Options:
    --json                           Output machine-readable JSON
  `.trim());
}

function createDatabase(): SchemaDatabase {
  const config = loadConfig();
  return new SchemaDatabase({
    fetchTimeout: config.fetchTimeout,
    idFields: config.idFields,
    logger: createLogger({ debug: config.debug }),
  });
}

function printFailures(result: StoreResult): void {
  if (result.ok) return;
  for (const f of result.failures) {
    console.log(`  ✗ ${f.sourceKey}  ${f.reason}: ${f.message}`);
  }
}

async function handleScan(positional: string[], flags: Record<string, string | boolean>): Promise<void> {
  const dir = positional[0];
  if (!dir) {
    console.error('Error: Directory required. Usage: schema-depot scan <dir>');
    process.exit(1);
  }

  const db = createDatabase();
  const result = await db.addPath(dir);
  const rows = db.loadAll();

  if (flags.json === true) {
    console.log(JSON.stringify({
      schemas: rows.map(r => ({ sourceKey: r.sourceKey, id: r.idKey ?? null })),
      failures: result.ok ? [] : result.failures,
    }, null, 2));
  } else {
    console.log();
    for (const r of rows) {
      console.log(`  ✓ ${r.sourceKey}${r.idKey && r.idKey !== r.sourceKey ? `  (${r.idKey})` : ''}`);
    }
    printFailures(result);
    console.log(`\n  ${rows.length} loaded, ${result.ok ? 0 : result.failures.length} failed\n`);
  }

  if (!result.ok) process.exit(1);
}

async function handleFetch(positional: string[], flags: Record<string, string | boolean>): Promise<void> {
  const uri = positional[0];
  if (!uri) {
    console.error('Error: URI required. Usage: schema-depot fetch <uri>');
    process.exit(1);
  }

  const db = createDatabase();
  const document = await db.loadUri(uri);
  console.log(JSON.stringify(document, null, flags.json === true ? undefined : 2));
}

async function handleGet(positional: string[], flags: Record<string, string | boolean>): Promise<void> {
  const [dir, key] = positional;
  if (!dir || !key) {
    console.error('Error: Directory and key required. Usage: schema-depot get <dir> <key>');
    process.exit(1);
  }

  const db = createDatabase();
  const result = await db.addPath(dir);
  if (flags.json !== true) printFailures(result);

  const document = db.load(key);
  console.log(JSON.stringify(document, null, flags.json === true ? undefined : 2));
}

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv.slice(2));

  switch (command) {
    case 'scan':
      await handleScan(positional, flags);
      break;
    case 'fetch':
      await handleFetch(positional, flags);
      break;
    case 'get':
      await handleGet(positional, flags);
      break;
    default:
      printUsage();
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
