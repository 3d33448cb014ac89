import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { loadConfig, type AppConfig } from "./config";
import { MemStorage } from "./mem-storage";
import type { IStorage } from "./storage";
import { IdentityResolver } from "./identity-resolver";
import { HistoryTracker, RouteBuilder } from "./history-tracker";
import { SessionStore } from "./session-store";
import { TrackingEngine } from "./tracking-engine";
import { JinaEmbeddingProvider } from "./embedding-service";
import { PassthroughCropper, RemoteSubjectCropper } from "./subject-crop-service";
import { NominatimGeocoder, type GeocodeLookup } from "./geocoding";
import { CacheService } from "./cache-service";
import { toAppError } from "./error-handling";

// Request bodies carry base64 photos; keep them out of the request log
const BINARY_FIELDS = new Set(['imageBase64', 'thumbnail', 'routeImage']);

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

function redactBinary(key: string, value: unknown): unknown {
  return BINARY_FIELDS.has(key) && typeof value === 'string' ? `<${value.length} chars>` : value;
}

interface StorageHandle {
  storage: IStorage;
  close: () => Promise<void>;
}

async function createStorage(config: AppConfig): Promise<StorageHandle> {
  if (!config.databaseUrl) {
    console.warn('[Storage] DATABASE_URL not set, using in-memory storage (data is lost on restart)');
    return { storage: new MemStorage(), close: async () => {} };
  }

  const { createDatabase, ensureVectorExtension } = await import("./db");
  const { DatabaseStorage } = await import("./storage");
  const database = createDatabase(config.databaseUrl);
  try {
    await ensureVectorExtension(database.db);
  } catch (error) {
    await database.close();
    throw error;
  }
  console.log('[Storage] Connected to PostgreSQL');
  return { storage: new DatabaseStorage(database.db), close: database.close };
}

async function main() {
  const config = loadConfig();
  const { storage, close: closeStorage } = await createStorage(config);

  if (!config.embedding.apiKey) {
    console.warn('[Embeddings] JINA_API_KEY not set, photo and text steps will fail until it is configured');
  }

  const geocodeCache = new CacheService<GeocodeLookup>('Geocoding');
  geocodeCache.start();

  const sessions = new SessionStore(config.sessions);
  sessions.start();

  const resolver = new IdentityResolver(storage, config.matching);
  const history = new HistoryTracker(storage);
  const engine = new TrackingEngine(
    {
      storage,
      resolver,
      history,
      routes: new RouteBuilder(history),
      sessions,
      embeddings: new JinaEmbeddingProvider(config.embedding),
      cropper: config.subjectCropUrl ? new RemoteSubjectCropper(config.subjectCropUrl) : new PassthroughCropper(),
      geocoder: new NominatimGeocoder({ ...config.geocoder, cache: geocodeCache }),
    },
    { defaultLanguage: config.defaultLanguage }
  );

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: '20mb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse, redactBinary)}`;
        }

        log(logLine);
      }
    });

    next();
  });

  registerRoutes(httpServer, app, engine);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser rejections (malformed JSON, oversized body) carry their own 4xx status
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
      res.status(err.status).json({ message: err instanceof Error ? err.message : 'Bad request' });
      return;
    }

    const appError = toAppError(err);
    console.error('[express] Unhandled error:', appError.originalError?.message ?? appError.message);
    res.status(appError.getStatusCode()).json({ message: appError.message });
  });

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });

  const shutdown = () => {
    log('shutting down');
    sessions.stop();
    geocodeCache.stop();
    httpServer.close(() => {
      closeStorage()
        .then(() => log('storage closed'))
        .catch((err: unknown) => {
          console.error('[Storage] Closing the connection pool failed:', toAppError(err).originalError?.message);
          process.exitCode = 1;
        });
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
