import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { createRelayerRouter } from './routes/relayer.routes';
import { errorHandler } from './errorHandlers';
import type { RelayerModule } from '../services/relayer/RelayerModule';

export function createApp(relayer: RelayerModule): Express {
  const app = express();
  app.set('trust proxy', ['loopback', 'linklocal', 'uniquelocal']);

  // CORS settings
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    maxAge: 86400
  }));

  app.use(compression());
  app.use(express.json());

  app.use('/api/v1/relayer', createRelayerRouter(relayer));

  app.get('/', (req, res) => {
    res.json({ message: 'Interchain Relay Engine API' });
  });

  app.use(errorHandler);

  return app;
}
