import express, { Express } from 'express';
import cors from 'cors';
import { env } from './config/env';
import { DataStore } from './store/types';
import { ReviewService } from './services/reviewService';
import authRoutes from './routes/auth';
import productRoutes from './routes/products';
import reviewRoutes from './routes/reviews';
import { errorHandler, notFound } from './middleware/errorHandler';

export interface AppOptions {
  jwtSecret?: string;
  reviewService?: ReviewService;
  defaultLimit?: number;
  maxLimit?: number;
}

export function createApp(store: DataStore, options: AppOptions = {}): Express {
  const app = express();
  const reviews = options.reviewService ?? new ReviewService(store);
  const { jwtSecret } = options;

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use('/api/auth', authRoutes({ users: store.users, jwtSecret }));
  app.use('/api/reviews', reviewRoutes({ reviews, users: store.users, jwtSecret }));
  app.use(
    '/api/products',
    productRoutes({
      reviews,
      users: store.users,
      jwtSecret,
      defaultLimit: options.defaultLimit ?? env.reviews.defaultLimit,
      maxLimit: options.maxLimit ?? env.reviews.maxLimit,
    })
  );

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'OK', message: 'Server is running' });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
