/**
 * Hive Governance RPC server
 * Express host that forwards `POST /rpc/:method` to the dispatcher
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createHiveGovernance, type HiveGovernance } from '../hive/index.js';
import { RpcDispatcher, type RpcParams } from '../hive/rpc.js';
import { securityHeaders, rateLimiter } from './middleware/security.js';

export interface ServerOptions {
  /** Requests per minute per client */
  rateLimit?: number;
  /** Allowed CORS origin; no CORS headers when unset */
  corsOrigin?: string;
  /** Log each request */
  logRequests?: boolean;
}

function isParams(body: unknown): body is RpcParams {
  return body !== null && typeof body === 'object' && !Array.isArray(body);
}

export function createApp(hive: HiveGovernance, options: ServerOptions = {}): express.Express {
  const dispatcher = new RpcDispatcher(hive);
  const app = express();

  // ============= Middleware =============

  app.disable('x-powered-by');
  app.use(securityHeaders({ enableHSTS: process.env.NODE_ENV === 'production' }));

  if (options.corsOrigin) {
    app.use(cors({ origin: options.corsOrigin }));
  }

  app.use(express.json({ limit: '64kb' }));

  if (options.logRequests) {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // ============= Health =============

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const status = await hive.status();
      res.json({
        healthy: true,
        provisioned: status.identity !== null,
        tier: status.tier,
        outbox: status.sync,
      });
    } catch (error) {
      res.status(500).json({ healthy: false, error: String(error) });
    }
  });

  // ============= RPC =============

  app.post('/rpc/:method', rateLimiter(60000, options.rateLimit ?? 120), async (req: Request, res: Response) => {
    const params: RpcParams = isParams(req.body) ? req.body : {};
    const response = await dispatcher.dispatch(req.params.method, params);

    if (response.ok) {
      res.json(response);
    } else {
      res.status(response.statusCode).json({ ok: false, error: response.error });
    }
  });

  // Malformed JSON and other body errors
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.status(400).json({
      ok: false,
      error: { kind: 'ValidationError', message: err.message },
    });
  });

  return app;
}

async function start(): Promise<void> {
  const hive = createHiveGovernance();
  const host = process.env.HIVE_RPC_HOST ?? '127.0.0.1';
  const port = parseInt(process.env.PORT ?? '3000', 10);

  const app = createApp(hive, {
    rateLimit: parseInt(process.env.RATE_LIMIT_REQUESTS || '120', 10),
    corsOrigin: process.env.CORS_ORIGIN,
    logRequests: process.env.DISABLE_LOGGING !== 'true',
  });

  const nodePublicKey = await hive.getNodePublicKey();
  const server = app.listen(port, host, () => {
    console.log(`Hive governance RPC listening on ${host}:${port}`);
    console.log(`Node: ${nodePublicKey}`);
  });

  const shutdown = () => {
    server.close(() => {
      hive.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  start().catch(error => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
