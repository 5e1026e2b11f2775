import { PublicAuthor, Review, ReviewWithAuthor } from '../store/types';

export interface ReviewResponse {
  id: number;
  author: string | PublicAuthor;
  product: string;
  grade: number;
  comment: string | null;
  submittedOn: string;
  active: boolean;
  retractedAt?: string;
}

export const toReviewResponse = (review: Review | ReviewWithAuthor): ReviewResponse => {
  const response: ReviewResponse = {
    id: review.id,
    author: review.author,
    product: review.product,
    grade: review.grade,
    comment: review.comment ?? null,
    submittedOn: review.submittedOn,
    active: review.status === 'active',
  };
  if (review.status === 'retracted') {
    response.retractedAt = review.retractedAt.toISOString();
  }
  return response;
};
