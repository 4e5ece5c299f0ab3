import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve, type ServerType } from '@hono/node-server';
import { type Logger, type TallyConfig, createLogger } from '@tally/shared';
import { initializeStore, type TallyStore } from '@tally/store';
import { usersRoutes } from './routes/users.js';
import { expensesRoutes } from './routes/expenses.js';
import { categoriesRoutes } from './routes/categories.js';
import { reportsRoutes } from './routes/reports.js';
import { healthRoutes } from './routes/health.js';
import { Authenticator, type PasswordHasher } from './auth/authenticator.js';
import { authMiddleware } from './auth/middleware.js';
import { ExpenseService } from './expenses/expense-service.js';
import { createErrorHandler } from './http/errors.js';

export interface AppDependencies {
  store: TallyStore;
  config: Pick<TallyConfig, 'auth'>;
  logger?: Logger;
  hasher?: PasswordHasher;
  /** Server clock for expense timestamps. */
  now?: () => string;
}

export function createApp(deps: AppDependencies) {
  const { store } = deps;
  const logger = deps.logger ?? createLogger('info');
  const app = new Hono();

  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const ms = Date.now() - start;
    logger.info(`${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
  });

  app.onError(createErrorHandler(logger));
  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  const authenticator = new Authenticator(store.users, deps.config.auth, deps.hasher);
  const requireAuth = authMiddleware(authenticator);
  const expenses = new ExpenseService(store, deps.now);

  app.route('/users', usersRoutes(authenticator, requireAuth));
  app.route('/expenses', expensesRoutes(expenses, requireAuth));
  app.route('/categories', categoriesRoutes(store.categories, requireAuth));
  app.route('/reports', reportsRoutes(expenses, requireAuth));
  app.route('/health', healthRoutes());

  return app;
}

export interface RunningServer {
  server: ServerType;
  store: TallyStore;
  close(): Promise<void>;
}

export function startServer(config: TallyConfig, logger: Logger = createLogger(config.logging.level)): RunningServer {
  const { port, host } = config.server;
  const store = initializeStore(config.database.path);
  const app = createApp({ store, config, logger });

  logger.info('Starting Tally server...');
  const server = serve({ fetch: app.fetch, port, hostname: host }, () => {
    logger.info(`Tally server listening on http://${host}:${port}`);
    logger.info('');
    logger.info('Endpoints:');
    logger.info('  POST   /users/register      - Register');
    logger.info('  POST   /users/login         - Login (form-encoded)');
    logger.info('  GET    /users/me            - Current user');
    logger.info('  POST   /expenses            - Create an expense');
    logger.info('  GET    /expenses            - List expenses (start_date, end_date, category, category_id, skip, limit)');
    logger.info('  GET    /expenses/:id        - Get an expense');
    logger.info('  PUT    /expenses/:id        - Replace an expense');
    logger.info('  DELETE /expenses/:id        - Delete an expense');
    logger.info('  GET    /categories          - List categories');
    logger.info('  POST   /categories          - Create a category');
    logger.info('  GET    /reports/expenses    - Totals per category');
    logger.info('  GET    /health              - Health check');
  });

  return {
    server,
    store,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => {
        store.close();
        if (err) reject(err);
        else resolve();
      });
    }),
  };
}
