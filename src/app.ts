import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { env } from './config/env';
import { limiter } from './middleware/rateLimiter';
import { notFoundHandler } from './middleware/notFound';
import { errorHandler } from './middleware/errorHandler';
import { metricsMiddleware } from './utils/metrics';
import indexRouter from './routes/index.route';
const app = express();

app.use(helmet());
app.use(cors({ origin: env.CORS_ORIGIN === '*' ? '*' : env.CORS_ORIGIN.split(',').map((o) => o.trim()) }));
app.use(compression());

app.use(express.json());
app.use(limiter);
app.use(metricsMiddleware);

app.get('/', (_req, res) => {
  res.json({ status: 200, message: 'Marketplace API' });
});
app.use('/', indexRouter);
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
