import {
  ActiveReview,
  Product,
  Repositories,
  RetractedReview,
  ReviewId,
  ReviewWithAuthor,
} from '../store/types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { toCalendarDate } from '../utils/calendar';

export const MIN_GRADE = 1;
export const MAX_GRADE = 5;
export const MAX_COMMENT_LENGTH = 2000;

export function assertValidGrade(grade: number): void {
  if (!Number.isInteger(grade) || grade < MIN_GRADE || grade > MAX_GRADE) {
    throw new ValidationError(`Grade must be an integer between ${MIN_GRADE} and ${MAX_GRADE}`);
  }
}

function normalizeComment(comment: string | undefined): string | undefined {
  const trimmed = comment?.trim();
  if (!trimmed) return undefined;
  if (trimmed.length > MAX_COMMENT_LENGTH) {
    throw new ValidationError(`Comment must be at most ${MAX_COMMENT_LENGTH} characters`);
  }
  return trimmed;
}

/**
 * Review lifecycle: create, list, retract. Reviews are never edited or
 * physically removed. Every call runs against the repositories it is given,
 * which inside a write are those of the enclosing transaction.
 */
export class ReviewStore {
  constructor(private readonly today: () => string = toCalendarDate) {}

  async submit(
    repos: Repositories,
    product: Product | null,
    authorId: string,
    grade: number,
    comment?: string
  ): Promise<ActiveReview> {
    assertValidGrade(grade);
    if (!product || !product.isActive) {
      throw new NotFoundError('Product not found');
    }
    // No (author, product) uniqueness: follow-up reviews are new records
    return repos.reviews.insert({
      author: authorId,
      product: product.id,
      grade,
      comment: normalizeComment(comment),
      submittedOn: this.today(),
    });
  }

  listActive(repos: Repositories): Promise<ActiveReview[]> {
    return repos.reviews.listActive();
  }

  async listForProduct(repos: Repositories, productId: string, limit: number): Promise<ReviewWithAuthor[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('Limit must be a positive integer');
    }
    return repos.reviews.listActiveForProduct(productId, limit);
  }

  async softDelete(repos: Repositories, reviewId: ReviewId, retractedBy: string): Promise<RetractedReview> {
    const retracted = await repos.reviews.retract(reviewId, retractedBy, new Date());
    if (!retracted) {
      throw new NotFoundError('Review not found');
    }
    return retracted;
  }
}
