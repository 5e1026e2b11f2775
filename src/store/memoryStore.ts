import { randomUUID } from 'crypto';
import { toPublicAuthor } from '../utils/sanitizeUser';
import {
  ActiveReview,
  CatalogEntry,
  DataStore,
  GradeTally,
  NewReview,
  NewUser,
  Product,
  ProductRepository,
  Repositories,
  RetractedReview,
  Review,
  ReviewId,
  ReviewRepository,
  ReviewWithAuthor,
  UserRecord,
  UserRepository,
} from './types';

// Records are replaced, never mutated in place, so a shallow copy of the
// maps is a full snapshot.
interface MemoryState {
  reviews: Map<ReviewId, Review>;
  products: Map<string, Product>;
  users: Map<string, UserRecord>;
  lastReviewId: number;
}

interface StateRef {
  current: MemoryState;
}

function emptyState(): MemoryState {
  return { reviews: new Map(), products: new Map(), users: new Map(), lastReviewId: 0 };
}

function snapshot(state: MemoryState): MemoryState {
  return {
    reviews: new Map(state.reviews),
    products: new Map(state.products),
    users: new Map(state.users),
    lastReviewId: state.lastReviewId,
  };
}

function byNewest(a: Review, b: Review): number {
  if (a.submittedOn !== b.submittedOn) return a.submittedOn < b.submittedOn ? 1 : -1;
  return b.id - a.id;
}

class MemoryReviewRepository implements ReviewRepository {
  constructor(private readonly state: StateRef) {}

  async insert(input: NewReview): Promise<ActiveReview> {
    const state = this.state.current;
    state.lastReviewId += 1;
    const review: ActiveReview = {
      id: state.lastReviewId,
      author: input.author,
      product: input.product,
      grade: input.grade,
      comment: input.comment,
      submittedOn: input.submittedOn,
      createdAt: new Date(),
      status: 'active',
    };
    state.reviews.set(review.id, review);
    return review;
  }

  async findActive(id: ReviewId): Promise<ActiveReview | null> {
    const review = this.state.current.reviews.get(id);
    return review && review.status === 'active' ? review : null;
  }

  async retract(id: ReviewId, by: string, at: Date): Promise<RetractedReview | null> {
    const review = await this.findActive(id);
    if (!review) return null;
    const retracted: RetractedReview = { ...review, status: 'retracted', retractedAt: at, retractedBy: by };
    this.state.current.reviews.set(id, retracted);
    return retracted;
  }

  async listActive(): Promise<ActiveReview[]> {
    return this.active().sort((a, b) => a.id - b.id);
  }

  async listActiveForProduct(productId: string, limit: number): Promise<ReviewWithAuthor[]> {
    const users = this.state.current.users;
    return this.active()
      .filter((r) => r.product === productId)
      .sort(byNewest)
      .slice(0, limit)
      .map((r) => ({ ...r, author: toPublicAuthor(users.get(r.author) ?? null) }));
  }

  async tallyActiveGrades(productId: string): Promise<GradeTally> {
    let total = 0;
    let count = 0;
    for (const review of this.active()) {
      if (review.product !== productId) continue;
      total += review.grade;
      count += 1;
    }
    return { total, count };
  }

  private active(): ActiveReview[] {
    const result: ActiveReview[] = [];
    for (const review of this.state.current.reviews.values()) {
      if (review.status === 'active') result.push(review);
    }
    return result;
  }
}

class MemoryProductRepository implements ProductRepository {
  constructor(private readonly state: StateRef) {}

  async findBySlug(slug: string): Promise<Product | null> {
    const wanted = slug.toLowerCase();
    for (const product of this.state.current.products.values()) {
      if (product.slug === wanted) return product;
    }
    return null;
  }

  async findById(id: string): Promise<Product | null> {
    return this.state.current.products.get(id) ?? null;
  }

  async upsert(entry: CatalogEntry): Promise<Product> {
    const existing = await this.findBySlug(entry.slug);
    const product: Product = existing
      ? { ...existing, name: entry.name, isActive: entry.isActive }
      : {
          id: randomUUID(),
          slug: entry.slug.toLowerCase(),
          name: entry.name,
          isActive: entry.isActive,
          rating: 0,
          reviewCount: 0,
        };
    this.state.current.products.set(product.id, product);
    return product;
  }

  async lockForRating(): Promise<void> {
    // Transactions already run one at a time
  }

  async setRating(id: string, rating: number, reviewCount: number): Promise<void> {
    const product = this.state.current.products.get(id);
    if (!product) return;
    this.state.current.products.set(id, { ...product, rating, reviewCount });
  }
}

class MemoryUserRepository implements UserRepository {
  constructor(private readonly state: StateRef) {}

  async findById(id: string): Promise<UserRecord | null> {
    return this.state.current.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const wanted = email.toLowerCase();
    for (const user of this.state.current.users.values()) {
      if (user.email === wanted) return user;
    }
    return null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    if (await this.findByEmail(input.email)) {
      throw new Error(`Duplicate email: ${input.email}`);
    }
    const user: UserRecord = {
      ...input,
      id: randomUUID(),
      email: input.email.toLowerCase(),
      createdAt: new Date(),
    };
    this.state.current.users.set(user.id, user);
    return user;
  }
}

function createRepositories(state: StateRef): Repositories {
  return {
    reviews: new MemoryReviewRepository(state),
    products: new MemoryProductRepository(state),
    users: new MemoryUserRepository(state),
  };
}

/**
 * In-process store for tests and for running without MongoDB. Transactions
 * are serialized; each works on a private snapshot that replaces the live
 * state only when the work resolves. Writes through the store's own
 * repositories are single-statement transactions on the same queue, so
 * they must not be called from inside `transaction` work.
 */
export class MemoryDataStore implements DataStore {
  readonly reviews: ReviewRepository;
  readonly products: ProductRepository;
  readonly users: UserRepository;

  private readonly state: StateRef = { current: emptyState() };
  private tail: Promise<void> = Promise.resolve();

  constructor() {
    const live = createRepositories(this.state);
    this.reviews = {
      insert: (review) => this.transaction((tx) => tx.reviews.insert(review)),
      findActive: (id) => live.reviews.findActive(id),
      retract: (id, by, at) => this.transaction((tx) => tx.reviews.retract(id, by, at)),
      listActive: () => live.reviews.listActive(),
      listActiveForProduct: (productId, limit) => live.reviews.listActiveForProduct(productId, limit),
      tallyActiveGrades: (productId) => live.reviews.tallyActiveGrades(productId),
    };
    this.products = {
      findBySlug: (slug) => live.products.findBySlug(slug),
      findById: (id) => live.products.findById(id),
      upsert: (entry) => this.transaction((tx) => tx.products.upsert(entry)),
      lockForRating: (id) => this.transaction((tx) => tx.products.lockForRating(id)),
      setRating: (id, rating, reviewCount) =>
        this.transaction((tx) => tx.products.setRating(id, rating, reviewCount)),
    };
    this.users = {
      findById: (id) => live.users.findById(id),
      findByEmail: (email) => live.users.findByEmail(email),
      create: (user) => this.transaction((tx) => tx.users.create(user)),
    };
  }

  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const draft: StateRef = { current: snapshot(this.state.current) };
      const result = await work(createRepositories(draft));
      this.state.current = draft.current;
      return result;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    this.state.current = emptyState();
  }
}
