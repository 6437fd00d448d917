import cors from 'cors';
import express, {
  type ErrorRequestHandler,
  type Express,
  type RequestHandler,
} from 'express';
import helmet from 'helmet';
import morgan from 'morgan';

import { errorMessage } from '@lib/errors';
import { httpLogger } from '@lib/logger';
import type { Monitor } from './monitor';

const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ error: 'Not Found', path: req.path });
};

const internalError: ErrorRequestHandler = (e, _req, res, _next) => {
  httpLogger.error({ err: errorMessage(e) }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal Server Error' });
};

export function createApp(monitor: Monitor): Express {
  const app = express();
  app.use(
    morgan('tiny', {
      stream: { write: (line: string) => httpLogger.info(line.trim()) },
    }),
  );
  app.use(helmet());
  app.use(express.json());
  app.use(cors({ origin: monitor.config.corsOrigins }));

  app.route('/health').get((_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.route('/sensors').get((_req, res) => {
    res.status(200).json(monitor.config.sensors);
  });

  app.route('/status').get((_req, res) => {
    res.status(200).json(monitor.status());
  });

  app.route('/metrics').get((_req, res, next) => {
    monitor.metrics
      .metrics()
      .then((body) => {
        res.status(200).type(monitor.metrics.contentType).send(body);
      })
      .catch(next);
  });

  app.use(notFound);
  app.use(internalError);
  return app;
}
