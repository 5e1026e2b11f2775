// Domain records and the repository seams the services talk to. Both the
// Mongoose store and the in-process memory store implement these.

export type ReviewId = number;

export type UserRole = 'customer' | 'admin';

interface ReviewBase {
  id: ReviewId;
  author: string;
  product: string;
  grade: number;
  comment?: string;
  /** Calendar date of submission, YYYY-MM-DD */
  submittedOn: string;
  createdAt: Date;
}

export interface ActiveReview extends ReviewBase {
  status: 'active';
}

export interface RetractedReview extends ReviewBase {
  status: 'retracted';
  retractedAt: Date;
  retractedBy?: string;
}

/** Retraction is one-way; there is no transition back to active */
export type Review = ActiveReview | RetractedReview;

export interface PublicAuthor {
  id: string;
  displayName: string;
}

export type ReviewWithAuthor = Omit<ActiveReview, 'author'> & { author: PublicAuthor };

export interface NewReview {
  author: string;
  product: string;
  grade: number;
  comment?: string;
  submittedOn: string;
}

export interface GradeTally {
  total: number;
  count: number;
}

export interface Product {
  id: string;
  slug: string;
  name: string;
  isActive: boolean;
  rating: number;
  reviewCount: number;
}

export interface CatalogEntry {
  slug: string;
  name: string;
  isActive: boolean;
}

export interface UserRecord {
  id: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  createdAt: Date;
}

export type NewUser = Omit<UserRecord, 'id' | 'createdAt'>;

export interface ReviewRepository {
  insert(review: NewReview): Promise<ActiveReview>;
  findActive(id: ReviewId): Promise<ActiveReview | null>;
  /** Moves an active review to retracted; null when no active review has that id */
  retract(id: ReviewId, by: string, at: Date): Promise<RetractedReview | null>;
  listActive(): Promise<ActiveReview[]>;
  /** Newest submittedOn first, ties broken by id descending */
  listActiveForProduct(productId: string, limit: number): Promise<ReviewWithAuthor[]>;
  tallyActiveGrades(productId: string): Promise<GradeTally>;
}

export interface ProductRepository {
  findBySlug(slug: string): Promise<Product | null>;
  findById(id: string): Promise<Product | null>;
  /** Creates or renames a catalog entry by slug; never touches rating fields */
  upsert(entry: CatalogEntry): Promise<Product>;
  /** Takes the product row's write lock for the rest of the transaction */
  lockForRating(id: string): Promise<void>;
  setRating(id: string, rating: number, reviewCount: number): Promise<void>;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  create(user: NewUser): Promise<UserRecord>;
}

export interface Repositories {
  reviews: ReviewRepository;
  products: ProductRepository;
  users: UserRepository;
}

export interface DataStore extends Repositories {
  /**
   * Runs `work` in one transaction. Everything written through the
   * repositories handed to `work` commits together or not at all.
   */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
