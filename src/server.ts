import cors from 'cors';
import express, { Application } from 'express';
import morgan from 'morgan';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Advisories } from './advisories.js';
import { JsonLdCodec } from './codec.js';
import { loadConfig } from './config.js';
import { loadSite } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { SiteBuild, buildSite } from './site-builder.js';
import { SiteFile, encodeSite } from './site-writer.js';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.json': 'application/ld+json',
  '.ttl': 'text/turtle'
};

/**
 * A site built in memory for previewing
 */
export interface PreviewSite {
  build: SiteBuild;
  files: SiteFile[];
  baseUrl: string;
}

/**
 * Map a request path to one of the encoded files: "/book/people/ada/" is
 * served from "people/ada/index.html".
 */
export function resolveSitePath(files: ReadonlyMap<string, SiteFile>, requestPath: string, baseUrl: string): SiteFile | undefined {
  if (baseUrl && requestPath !== baseUrl && !requestPath.startsWith(`${baseUrl}/`)) {
    return undefined;
  }
  let relative = requestPath.slice(baseUrl.length).replace(/^\/+/, '');
  if (relative === '' || relative.endsWith('/')) {
    relative += 'index.html';
  }
  return files.get(relative);
}

/**
 * Create and configure the Express application
 */
export function createApp(site: PreviewSite): Application {
  const app = express();
  const files = new Map(site.files.map((file): [string, SiteFile] => [file.path, file]));

  // Middleware
  app.use(cors());
  app.use(morgan('dev'));

  // API routes
  app.use('/api', createApiRoutes(site.build));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      entities: site.build.entities.length,
      documents: site.build.documents.length,
      advisories: site.build.advisories.length
    });
  });

  // Rendered pages
  app.use((req, res) => {
    const file = resolveSitePath(files, req.path, site.baseUrl);
    if (!file) {
      res.status(404).json({ error: 'Not found' });
      return;
    }
    res.type(CONTENT_TYPES[path.extname(file.path)] ?? 'text/plain').send(file.content);
  });

  return app;
}

/**
 * Load, build and serve the site
 */
async function bootstrap() {
  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));

  const config = await loadConfig();
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : config.port;

  const codec = new JsonLdCodec();
  const advisories = new Advisories();
  const { context, documents, errors } = await loadSite(config, codec, advisories);

  if (errors.length > 0) {
    console.warn('Warnings:', errors);
  }

  const build = buildSite(documents, context);
  console.log(`Built ${build.documents.length} documents, ${build.entities.length} entities`);
  const files = await encodeSite(build, context, { codec, collections: config.collections });

  const app = createApp({ build, files, baseUrl: config.baseUrl });

  const server = app.listen(port, () => {
    console.log(`Lodbook preview listening on http://localhost:${port}${config.baseUrl}/`);
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
    }, 10000);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exit(1);
  });
}
