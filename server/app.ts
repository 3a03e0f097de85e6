import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import type { Storage } from './db.js';
import { errorHandler } from './errors.js';
import { log } from './log.js';
import { registerRoutes } from './routes.js';

export type AppOptions = Pick<AppConfig, 'corsOrigins' | 'bodyLimit' | 'modelUploadLimitBytes' | 'logRequests'>;

function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on('finish', () => {
    const duration = Date.now() - start;
    let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
    if (capturedJsonResponse !== undefined) {
      logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
    }

    if (logLine.length > 80) {
      logLine = logLine.slice(0, 79) + '…';
    }

    log(logLine);
  });

  next();
}

export function createApp(storage: Storage, options: AppOptions): Express {
  const app = express();

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or server-to-server calls)
      if (!origin) return callback(null, true);

      if (options.corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        console.warn(`Origin ${origin} not allowed by CORS`);
        callback(null, false);
      }
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    exposedHeaders: ['Content-Disposition', 'Content-Type'],
    maxAge: 86400, // 24 hours
  }));

  app.use(express.json({ limit: options.bodyLimit }));

  if (options.logRequests) {
    app.use(requestLogger);
  }

  registerRoutes(app, storage, { modelUploadLimitBytes: options.modelUploadLimitBytes });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use(errorHandler);

  return app;
}
