import { GradeTally, Repositories } from '../store/types';

export interface RatingSnapshot {
  productId: string;
  rating: number;
  reviewCount: number;
}

/**
 * Mean grade rounded to one decimal, half away from zero, computed on
 * integer tenths (53 over 20 reviews gives 2.7). An empty tally rates 0.
 */
export function roundRating({ total, count }: GradeTally): number {
  if (count === 0) return 0;
  return Math.round((total * 10) / count) / 10;
}

export class RatingAggregator {
  /**
   * Recomputes a product's rating from its active reviews and stores it.
   * Must run on the repositories of the transaction that changed the
   * active-review set.
   */
  async recompute(tx: Repositories, productId: string): Promise<RatingSnapshot> {
    await tx.products.lockForRating(productId);
    const tally = await tx.reviews.tallyActiveGrades(productId);
    const rating = roundRating(tally);
    await tx.products.setRating(productId, rating, tally.count);
    return { productId, rating, reviewCount: tally.count };
  }
}
