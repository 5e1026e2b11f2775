// Public projections of user data. Email, role and password hash never
// leave the service attached to someone else's review.

import { PublicAuthor, UserRecord } from '../store/types';

export interface AccountResponse {
  _id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRecord['role'];
}

/** Fallback when a review's author record no longer resolves */
export const FORMER_CUSTOMER: PublicAuthor = { id: 'unknown', displayName: 'Former customer' };

/**
 * Public identity shown next to a review: id and display name only
 */
export const toPublicAuthor = (
  user: Pick<UserRecord, 'id' | 'firstName' | 'lastName'> | null
): PublicAuthor => {
  if (!user) return FORMER_CUSTOMER;
  return {
    id: user.id,
    displayName: `${user.firstName} ${user.lastName}`.trim(),
  };
};

/**
 * The signed-in user's own account, without the password hash
 */
export const toAccountResponse = (user: UserRecord): AccountResponse => ({
  _id: user.id,
  email: user.email,
  firstName: user.firstName,
  lastName: user.lastName,
  role: user.role,
});
