import express, { Application } from 'express';
import morgan from 'morgan';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadChunks, LoadResult } from './loader.js';
import { EngineConfig, loadConfig } from './config.js';
import { resolveDocument } from './engine.js';
import { ResolutionResult } from './types.js';
import { createApiRoutes } from './routes/api.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  /** Port to listen on (default: 3000) */
  port: number;
  /** Directory of chapter files */
  contentDir: string;
  /** Optional JSON engine configuration */
  configPath?: string;
}

/**
 * A content directory after resolution
 */
export interface ServedContent {
  load: LoadResult;
  result: ResolutionResult;
  config: EngineConfig;
}

/**
 * Create and configure the Express application
 */
export function createApp(data: ServedContent, options: { logRequests?: boolean } = {}): Application {
  const app = express();

  // Middleware
  if (options.logRequests ?? true) {
    app.use(morgan('dev'));
  }
  app.use(express.json({ limit: '10mb' }));

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.result.chunks.length,
      pages: data.result.pages.length,
      targets: Object.keys(data.result.targetMapping).length,
      run: data.result.report.status
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

function parseArgs(args: string[]): ServerConfig {
  const valueOf = (name: string): string | undefined =>
    args.find(a => a.startsWith(`--${name}=`))?.slice(name.length + 3);

  const portArg = valueOf('port');
  return {
    port: portArg ? parseInt(portArg, 10) : 3000,
    contentDir: path.resolve(valueOf('content') ?? 'content'),
    configPath: valueOf('config')
  };
}

/**
 * Load, resolve and serve a content directory
 */
async function bootstrap(): Promise<void> {
  const serverConfig = parseArgs(process.argv.slice(2));
  const config = await loadConfig(serverConfig.configPath);

  console.log(`Loading content from: ${serverConfig.contentDir}`);
  const load = loadChunks({ contentDir: serverConfig.contentDir, stylesheet: config.stylesheet });
  if (load.errors.length > 0) {
    console.warn('Warnings:', load.errors);
  }

  const result = resolveDocument(load.chunks, config);
  const { stats } = result.report;
  console.log(`Resolved ${load.chunks.length} documents: ${stats.referencesResolved}/${stats.referencesFound} references, ${stats.indexEntries} index entries`);
  if (result.report.status === 'completed-with-broken-refs') {
    console.warn(`Broken references: ${stats.referencesBroken}, broken note calls: ${stats.noteCallsBroken}, unresolved index cross-references: ${stats.crossReferencesUnresolved}`);
  }

  const app = createApp({ load, result, config });

  const server = app.listen(serverConfig.port, () => {
    console.log(`Cross-reference preview listening on http://localhost:${serverConfig.port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

const isEntryPoint = process.argv[1] !== undefined
  && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  bootstrap().catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
