import { CORS_ORIGINS, MODE } from 'App/config/config';
import { NotFoundError } from 'App/errors/CustomError';
import cors, { CorsOptions } from 'cors';
import express, { Express } from 'express';
import helmet from 'helmet';
import http from 'http';
import morgan from 'morgan';
import { Server as SocketIOServer } from 'socket.io';
import errorHandler from './middlewares/errorHandler';
import handleCorsError, { CORS_REJECTED_MESSAGE } from './middlewares/handleCorsError';
import { initWebSockets } from './providers/WebSocketsProvider';
import { generalLimiter, settingsLimiter } from './rateLimiters/generalRateLimiter';
import { createGlobalRoutes } from './routes/globalRoutes';
import { createMonitorRoutes } from './routes/monitorRoutes';
import type { MonitorService } from './services/MonitorService';
// ------------------------------------------------------------------------------

const maxBodySize = '16kb';

export interface AppServer {
  app: Express;
  server: http.Server;
  io: SocketIOServer;
}

export interface ServerOptions {
  /** Origins allowed to call the API cross-site; empty allows any. */
  corsOrigins?: string[];
}

export const createServer = (
  monitor: MonitorService,
  { corsOrigins = CORS_ORIGINS }: ServerOptions = {},
): AppServer => {
  const app = express();
  const production = MODE === 'production';

  app.use(express.json({ limit: maxBodySize }));
  app.use(express.urlencoded({ extended: false, limit: maxBodySize }));

  if (production) {
    app.enable('trust proxy');

    app.disable('x-powered-by');

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            // the dashboard ships its stream client inline
            scriptSrc: ["'self'", "'unsafe-inline'"],
          },
        },
      }),
    );
    app.use(
      helmet.frameguard({
        action: 'deny',
      }),
    );
    app.use(
      helmet.hsts({
        maxAge: 31536000,
        includeSubDomains: false,
      }),
    );
    app.use(helmet.noSniff());
    app.use(
      helmet.referrerPolicy({
        policy: ['origin', 'unsafe-url'],
      }),
    );
    // adding morgan to log HTTP requests
    app.use(morgan('common'));
    app.use(generalLimiter);
  }

  const corsOptions: CorsOptions = {
    methods: ['GET', 'POST'],
    origin:
      corsOrigins.length === 0
        ? true
        : (origin, callback) => {
            // same-origin and non-browser requests carry no Origin header
            if (!origin || corsOrigins.includes(origin)) callback(null, true);
            else callback(new Error(CORS_REJECTED_MESSAGE));
          },
  };

  app.use(cors(corsOptions));
  app.use(handleCorsError);

  app.get('/health', (req, res) => {
    res.json({
      status: monitor.isShuttingDown ? 'shutting_down' : 'ok',
      subscribers: monitor.registry.size,
    });
  });

  app.use('/', [
    createGlobalRoutes(monitor, { settingsGuards: production ? [settingsLimiter] : [] }),
    createMonitorRoutes(monitor),
  ]);

  app.use((req, res, next) => {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  const server = http.createServer(app);

  // Socket.IO shares the HTTP server and the broadcast registry with SSE
  const io: SocketIOServer = initWebSockets(server, monitor, corsOrigins);

  return { app, server, io };
};
