import express, { Request, Response } from 'express';
import { param, validationResult } from 'express-validator';
import { ReviewService } from '../services/reviewService';
import { UserRepository } from '../store/types';
import { protect, requireActor, AuthRequest } from '../middleware/auth';
import { sendError } from '../middleware/errorHandler';
import { toReviewResponse } from '../utils/serializeReview';

export interface ReviewRoutesDeps {
  reviews: ReviewService;
  users: UserRepository;
  jwtSecret?: string;
}

export default function reviewRoutes({ reviews, users, jwtSecret }: ReviewRoutesDeps) {
  const router = express.Router();

  // @route   GET /api/reviews
  // @desc    All active reviews
  // @access  Public
  router.get('/', async (req: Request, res: Response) => {
    try {
      const active = await reviews.listActiveReviews();
      res.json(active.map(toReviewResponse));
    } catch (error) {
      sendError(res, error);
    }
  });

  // @route   DELETE /api/reviews/:id
  // @desc    Soft-delete a review and recompute its product's rating
  // @access  Private (Admin)
  router.delete(
    '/:id',
    protect(users, jwtSecret),
    [param('id').isInt({ min: 1 }).withMessage('Review id must be a positive integer')],
    async (req: AuthRequest, res: Response) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ errors: errors.array() });
        }

        const { review, rating } = await reviews.retractReview(requireActor(req), Number(req.params.id));
        res.json({ review: toReviewResponse(review), product: rating });
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  return router;
}
