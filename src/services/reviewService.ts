import {
  ActiveReview,
  DataStore,
  Product,
  Repositories,
  RetractedReview,
  ReviewId,
  ReviewWithAuthor,
} from '../store/types';
import { AppError, AuthorizationError, NotFoundError, TransactionError } from '../utils/errors';
import { componentLogger } from '../observability/logger';
import { Actor } from './actor';
import { RatingAggregator, RatingSnapshot } from './ratingAggregator';
import { ReviewStore } from './reviewStore';

const log = componentLogger('review-service');

export interface ReviewMutation<R> {
  review: R;
  rating: RatingSnapshot;
}

export interface ReviewServiceOptions {
  store?: ReviewStore;
  aggregator?: RatingAggregator;
}

/**
 * Write-then-aggregate protocol: every review mutation and the recompute of
 * its product's rating run in one transaction. A caller that gets a result
 * back can read a rating that already reflects it.
 */
export class ReviewService {
  private readonly store: ReviewStore;
  private readonly aggregator: RatingAggregator;

  constructor(private readonly data: DataStore, options: ReviewServiceOptions = {}) {
    this.store = options.store ?? new ReviewStore();
    this.aggregator = options.aggregator ?? new RatingAggregator();
  }

  async submitReview(
    actor: Actor,
    productSlug: string,
    grade: number,
    comment?: string
  ): Promise<ReviewMutation<ActiveReview>> {
    if (!actor.isCustomer) {
      throw new AuthorizationError('Only customers can review products');
    }

    const result = await this.inTransaction('submit review', async (tx) => {
      const product = await tx.products.findBySlug(productSlug);
      const review = await this.store.submit(tx, product, actor.id, grade, comment);
      const rating = await this.aggregator.recompute(tx, review.product);
      return { review, rating };
    });

    log.info(
      { reviewId: result.review.id, productId: result.rating.productId, grade: result.review.grade, rating: result.rating.rating },
      'Review submitted'
    );
    return result;
  }

  async retractReview(actor: Actor, reviewId: ReviewId): Promise<ReviewMutation<RetractedReview>> {
    if (!actor.isAdmin) {
      throw new AuthorizationError('Only admins can delete reviews');
    }

    const result = await this.inTransaction('delete review', async (tx) => {
      const review = await this.store.softDelete(tx, reviewId, actor.id);
      const rating = await this.aggregator.recompute(tx, review.product);
      return { review, rating };
    });

    log.info(
      { reviewId, productId: result.rating.productId, rating: result.rating.rating, by: actor.id },
      'Review retracted'
    );
    return result;
  }

  listActiveReviews(): Promise<ActiveReview[]> {
    return this.store.listActive(this.data);
  }

  async listProductReviews(productSlug: string, limit: number): Promise<ReviewWithAuthor[]> {
    const product = await this.getProduct(productSlug);
    return this.store.listForProduct(this.data, product.id, limit);
  }

  async getProduct(productSlug: string): Promise<Product> {
    const product = await this.data.products.findBySlug(productSlug);
    if (!product) {
      throw new NotFoundError('Product not found');
    }
    return product;
  }

  private async inTransaction<T>(operation: string, work: (tx: Repositories) => Promise<T>): Promise<T> {
    try {
      return await this.data.transaction(work);
    } catch (error) {
      if (error instanceof AppError) throw error;
      log.error({ err: error, operation }, 'Transaction rolled back');
      throw new TransactionError(`Could not ${operation}, no changes were saved`, error);
    }
  }
}
