import express, { Request, Response } from 'express';
import { body, param, query, validationResult } from 'express-validator';
import { ReviewService } from '../services/reviewService';
import { UserRepository } from '../store/types';
import { protect, requireActor, AuthRequest } from '../middleware/auth';
import { sendError } from '../middleware/errorHandler';
import { toReviewResponse } from '../utils/serializeReview';
import { MAX_COMMENT_LENGTH } from '../services/reviewStore';

export interface ProductRoutesDeps {
  reviews: ReviewService;
  users: UserRepository;
  jwtSecret?: string;
  defaultLimit: number;
  maxLimit: number;
}

export default function productRoutes({ reviews, users, jwtSecret, defaultLimit, maxLimit }: ProductRoutesDeps) {
  const router = express.Router();
  const slug = () => param('slug').trim().notEmpty().withMessage('Product slug is required');

  // @route   GET /api/products/:slug
  // @desc    Product with its current rating
  // @access  Public
  router.get('/:slug', [slug()], async (req: Request, res: Response) => {
    try {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        return res.status(400).json({ errors: errors.array() });
      }

      const product = await reviews.getProduct(req.params.slug);
      res.json(product);
    } catch (error) {
      sendError(res, error);
    }
  });

  // @route   GET /api/products/:slug/reviews?limit=10
  // @desc    Active reviews for a product, newest first
  // @access  Public
  router.get(
    '/:slug/reviews',
    [
      slug(),
      query('limit')
        .optional()
        .isInt({ min: 1, max: maxLimit })
        .withMessage(`limit must be an integer between 1 and ${maxLimit}`)
        .toInt(),
    ],
    async (req: Request, res: Response) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ errors: errors.array() });
        }

        const limit = req.query.limit === undefined ? defaultLimit : Number(req.query.limit);
        const list = await reviews.listProductReviews(req.params.slug, limit);
        res.json(list.map(toReviewResponse));
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  // @route   POST /api/products/:slug/reviews
  // @desc    Submit a review; the product's rating is recomputed before responding
  // @access  Private (Customer)
  router.post(
    '/:slug/reviews',
    protect(users, jwtSecret),
    [
      slug(),
      body('grade').isInt().withMessage('grade must be an integer').toInt(),
      body('comment')
        .optional({ values: 'null' })
        .isString()
        .withMessage('comment must be a string')
        .trim()
        .isLength({ max: MAX_COMMENT_LENGTH })
        .withMessage(`comment must be at most ${MAX_COMMENT_LENGTH} characters`),
    ],
    async (req: AuthRequest, res: Response) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ errors: errors.array() });
        }

        const comment = typeof req.body.comment === 'string' ? req.body.comment : undefined;
        const { review, rating } = await reviews.submitReview(
          requireActor(req),
          req.params.slug,
          Number(req.body.grade),
          comment
        );
        res.status(201).json({ review: toReviewResponse(review), product: rating });
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  return router;
}
