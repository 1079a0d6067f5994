#!/usr/bin/env node
// src/mcp.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { getDefaultDatabase, type SchemaDatabase } from './database.js';
import { errorMessage } from './errors.js';
import { isJsonObject } from './loader/document.js';
import type { JsonValue, StoreResult } from './types.js';

const PACKAGE_VERSION = '0.1.0';

export interface McpServerOptions {
  database?: SchemaDatabase;
}

function textResult(data: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: typeof data === 'string' ? data : JSON.stringify(data) }],
    ...(isError ? { isError: true } : {}),
  };
}

function storeResult(result: StoreResult) {
  return result.ok
    ? textResult({ ok: true })
    : textResult({ ok: false, failures: result.failures }, true);
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export function createMcpServer(options: McpServerOptions = {}): McpServer {
  const db = options.database ?? getDefaultDatabase();

  const server = new McpServer({
    name: 'schema-depot',
    version: PACKAGE_VERSION,
  });

  // --- schema_add_path ---
  server.registerTool(
    'schema_add_path',
    {
      description:
        'Load every schema file under a directory. Only files that are new or changed since ' +
        'the last scan are re-read. Returns { ok } or the list of files that failed.',
      inputSchema: {
        path: z.string().describe('Directory to scan (absolute, or relative to the server\'s working directory)'),
      },
    },
    async ({ path }) => {
      try {
        return storeResult(await db.addPath(path));
      } catch (err) {
        return textResult(`Scan failed: ${errorMessage(err)}`, true);
      }
    },
  );

  // --- schema_add_uri ---
  server.registerTool(
    'schema_add_uri',
    {
      description: 'Fetch a schema from a file:, http: or https: URI and cache it, replacing any cached copy.',
      inputSchema: {
        uri: z.string().describe('Schema location, e.g. "https://example.com/person.json"'),
      },
    },
    async ({ uri }) => {
      try {
        return storeResult(await db.addUri(uri));
      } catch (err) {
        return textResult(`Fetch failed: ${errorMessage(err)}`, true);
      }
    },
  );

  // --- schema_add ---
  server.registerTool(
    'schema_add',
    {
      description: 'Cache a schema document under a caller-chosen key. The document must be a JSON object.',
      inputSchema: {
        key: z.string().describe('Key to store the schema under'),
        document: jsonValueSchema.describe('Schema document'),
      },
    },
    async ({ key, document }) => storeResult(db.add(key, document, isJsonObject)),
  );

  // --- schema_load ---
  server.registerTool(
    'schema_load',
    {
      description:
        'Return a cached schema by source key or declared id. ' +
        'With fetch=true, a missing file:/http:/https: schema is fetched once.',
      inputSchema: {
        key: z.string().describe('Source key (URI or path) or declared schema id'),
        fetch: z.boolean().optional().describe('Fetch the schema if it is not cached'),
      },
      annotations: {
        readOnlyHint: true,
      },
    },
    async ({ key, fetch: fetchMissing }) => {
      try {
        const document = fetchMissing ? await db.loadUri(key) : db.load(key);
        return textResult(document);
      } catch (err) {
        return textResult(errorMessage(err), true);
      }
    },
  );

  // --- schema_list ---
  server.registerTool(
    'schema_list',
    {
      description: 'List cached schemas: source key, declared id and modification time.',
      inputSchema: {},
      annotations: {
        readOnlyHint: true,
      },
    },
    async () => textResult(db.loadAll().map(row => ({
      sourceKey: row.sourceKey,
      id: row.idKey ?? null,
      mtime: row.mtime,
    }))),
  );

  // --- schema_delete ---
  server.registerTool(
    'schema_delete',
    {
      description: 'Evict a schema by source key or declared id. Succeeds when nothing matches.',
      inputSchema: {
        key: z.string().describe('Source key (URI or path) or declared schema id'),
      },
    },
    async ({ key }) => {
      db.delete(key);
      return textResult({ ok: true });
    },
  );

  return server;
}

// --- stdio entry point ---
// Only start when run directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/mcp.ts') ||
  _argv1.endsWith('/mcp.js') ||
  _argv1.endsWith('/schema-depot-mcp');

if (isMainModule) {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  server.connect(transport).catch((err: unknown) => {
    console.error('MCP server failed to start:', err);
    process.exit(1);
  });
}
