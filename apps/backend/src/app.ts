import Fastify from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyCookie from '@fastify/cookie';
import fastifyMultipart from '@fastify/multipart';
import { config } from './config/index.js';
import type { Database } from './db/index.js';
import { errorHandler } from './middleware/error-handler.js';
import { AuthService } from './services/auth.service.js';
import { BundleService } from './services/bundle.service.js';
import { FileService } from './services/file.service.js';
import { SettingsService } from './services/settings.service.js';
import { StorageService } from './services/storage.service.js';
import { authRoutes } from './routes/auth.js';
import { bundleRoutes } from './routes/bundles.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { fileRoutes } from './routes/files.js';
import { settingsRoutes } from './routes/settings.js';
import { shareRoutes } from './routes/share.js';

export interface AppServices {
  auth: AuthService;
  files: FileService;
  bundles: BundleService;
  settings: SettingsService;
}

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

export interface BuildAppOptions {
  db: Database;
  storagePath?: string;
  logoPath?: string;
  sessionSecret?: string;
  allowedExtensions?: readonly string[];
  maxUploadBytes?: number;
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions): Promise<ReturnType<typeof Fastify>> {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : { level: config.nodeEnv === 'production' ? 'info' : 'debug' },
  });

  // Decorate request with user (null until requireAuth/optionalAuth sets it)
  app.decorateRequest('user', null);

  // Register plugins
  await app.register(fastifyCors, {
    origin: ['http://localhost:5173', 'http://127.0.0.1:5173'],
    credentials: true,
  });

  await app.register(fastifyCookie, {
    secret: options.sessionSecret ?? config.sessionSecret,
  });

  await app.register(fastifyMultipart, {
    limits: {
      fileSize: options.maxUploadBytes ?? config.maxUploadBytes,
      files: 1,
    },
  });

  // Instantiate services and make them available on the app instance
  const blobs = new StorageService(options.storagePath ?? config.storagePath);
  const logos = new StorageService(options.logoPath ?? config.logoPath);
  app.decorate('services', {
    auth: new AuthService(options.db),
    files: new FileService(options.db, blobs, {
      allowedExtensions: options.allowedExtensions ?? config.allowedExtensions,
    }),
    bundles: new BundleService(options.db, blobs),
    settings: new SettingsService(options.db, logos),
  });

  // Global error handler
  app.setErrorHandler(errorHandler);

  // Health check
  app.get('/health', async (_request, reply) => {
    return reply.status(200).send({ data: { status: 'ok' }, meta: null, errors: null });
  });

  // Route registrations
  await app.register(authRoutes, { prefix: '/auth' });
  await app.register(dashboardRoutes, { prefix: '/dashboard' });
  await app.register(fileRoutes, { prefix: '/files' });
  await app.register(bundleRoutes, { prefix: '/bundles' });
  await app.register(shareRoutes, { prefix: '/share' });
  await app.register(settingsRoutes, { prefix: '/settings' });

  return app;
}
