import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import type { Container } from '@/config/container';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { requestTimeout } from '@/stability/errorHandlers';
import { createFlightRoutes } from '@/routes/flights';
import { createDestinationRoutes } from '@/routes/destinations';

export function createApp(config: AppConfig, container: Container): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: 60,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(requestTimeout());
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.use('/api/flights', createFlightRoutes(container.travel));
  app.use('/api/destinations', createDestinationRoutes(container.travel));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
