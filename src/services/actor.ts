import { UserRecord } from '../store/types';

/** Authenticated identity with the capability flags the review core checks */
export interface Actor {
  id: string;
  displayName: string;
  isCustomer: boolean;
  isAdmin: boolean;
}

export const toActor = (user: UserRecord): Actor => ({
  id: user.id,
  displayName: `${user.firstName} ${user.lastName}`.trim(),
  isCustomer: user.role === 'customer',
  isAdmin: user.role === 'admin',
});
