import mongoose, { ClientSession, Types } from 'mongoose';
import Review, { IReview } from '../models/Review';
import Product, { IProduct } from '../models/Product';
import User, { IUser } from '../models/User';
import { nextSequence } from '../models/Counter';
import { toPublicAuthor } from '../utils/sanitizeUser';
import {
  ActiveReview,
  CatalogEntry,
  DataStore,
  GradeTally,
  NewReview,
  NewUser,
  Product as ProductRecord,
  ProductRepository,
  RetractedReview,
  Repositories,
  Review as ReviewRecord,
  ReviewId,
  ReviewRepository,
  ReviewWithAuthor,
  UserRecord,
  UserRepository,
} from './types';

type PopulatedAuthor = Pick<IUser, '_id' | 'firstName' | 'lastName'>;
type PopulatedReview = Omit<IReview, 'author'> & { author: PopulatedAuthor | null };

const PUBLIC_AUTHOR_FIELDS = 'firstName lastName';

function toReview(doc: IReview): ReviewRecord {
  const base = {
    id: doc._id,
    author: doc.author.toString(),
    product: doc.product.toString(),
    grade: doc.grade,
    comment: doc.comment ?? undefined,
    submittedOn: doc.submittedOn,
    createdAt: doc.createdAt,
  };
  if (doc.status === 'retracted') {
    return {
      ...base,
      status: 'retracted',
      retractedAt: doc.retractedAt ?? doc.updatedAt,
      retractedBy: doc.retractedBy?.toString(),
    };
  }
  return { ...base, status: 'active' };
}

function toProduct(doc: IProduct): ProductRecord {
  return {
    id: doc._id.toString(),
    slug: doc.slug,
    name: doc.name,
    isActive: doc.isActive,
    rating: doc.rating,
    reviewCount: doc.reviewCount,
  };
}

function toUser(doc: IUser): UserRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    passwordHash: doc.password,
    firstName: doc.firstName,
    lastName: doc.lastName,
    role: doc.role,
    createdAt: doc.createdAt,
  };
}

class MongoReviewRepository implements ReviewRepository {
  constructor(private readonly session?: ClientSession) {}

  async insert(input: NewReview): Promise<ActiveReview> {
    const id = await nextSequence('review');
    const [doc] = await Review.create(
      [
        {
          _id: id,
          author: new Types.ObjectId(input.author),
          product: new Types.ObjectId(input.product),
          grade: input.grade,
          comment: input.comment,
          submittedOn: input.submittedOn,
          status: 'active',
        },
      ],
      { session: this.session }
    );
    const review = toReview(doc.toObject());
    if (review.status !== 'active') {
      throw new Error(`Review ${id} was not stored as active`);
    }
    return review;
  }

  async findActive(id: ReviewId): Promise<ActiveReview | null> {
    const doc = await Review.findOne({ _id: id, status: 'active' }).session(this.session ?? null).lean<IReview>();
    if (!doc) return null;
    const review = toReview(doc);
    return review.status === 'active' ? review : null;
  }

  async retract(id: ReviewId, by: string, at: Date): Promise<RetractedReview | null> {
    const doc = await Review.findOneAndUpdate(
      { _id: id, status: 'active' },
      { $set: { status: 'retracted', retractedAt: at, retractedBy: new Types.ObjectId(by) } },
      { new: true, session: this.session }
    ).lean<IReview>();
    if (!doc) return null;
    const review = toReview(doc);
    return review.status === 'retracted' ? review : null;
  }

  async listActive(): Promise<ActiveReview[]> {
    const docs = await Review.find({ status: 'active' }).sort({ _id: 1 }).session(this.session ?? null).lean<IReview[]>();
    const reviews: ActiveReview[] = [];
    for (const doc of docs) {
      const review = toReview(doc);
      if (review.status === 'active') reviews.push(review);
    }
    return reviews;
  }

  async listActiveForProduct(productId: string, limit: number): Promise<ReviewWithAuthor[]> {
    const docs = await Review.find({ product: productId, status: 'active' })
      .sort({ submittedOn: -1, _id: -1 })
      .limit(limit)
      .populate('author', PUBLIC_AUTHOR_FIELDS)
      .session(this.session ?? null)
      .lean<PopulatedReview[]>();

    return docs.map((doc): ReviewWithAuthor => ({
      id: doc._id,
      author: toPublicAuthor(
        doc.author
          ? { id: doc.author._id.toString(), firstName: doc.author.firstName, lastName: doc.author.lastName }
          : null
      ),
      product: doc.product.toString(),
      grade: doc.grade,
      comment: doc.comment ?? undefined,
      submittedOn: doc.submittedOn,
      createdAt: doc.createdAt,
      status: 'active',
    }));
  }

  async tallyActiveGrades(productId: string): Promise<GradeTally> {
    // aggregate() does not cast, so the id is converted here
    const [row] = await Review.aggregate<GradeTally>([
      { $match: { product: new Types.ObjectId(productId), status: 'active' } },
      { $group: { _id: null, total: { $sum: '$grade' }, count: { $sum: 1 } } },
    ]).session(this.session ?? null);
    return row ? { total: row.total, count: row.count } : { total: 0, count: 0 };
  }
}

class MongoProductRepository implements ProductRepository {
  constructor(private readonly session?: ClientSession) {}

  async findBySlug(slug: string): Promise<ProductRecord | null> {
    const doc = await Product.findOne({ slug: slug.toLowerCase() }).session(this.session ?? null).lean<IProduct>();
    return doc ? toProduct(doc) : null;
  }

  async findById(id: string): Promise<ProductRecord | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const doc = await Product.findById(id).session(this.session ?? null).lean<IProduct>();
    return doc ? toProduct(doc) : null;
  }

  async upsert(entry: CatalogEntry): Promise<ProductRecord> {
    const doc = await Product.findOneAndUpdate(
      { slug: entry.slug.toLowerCase() },
      { $set: { name: entry.name, isActive: entry.isActive } },
      { new: true, upsert: true, setDefaultsOnInsert: true, session: this.session }
    ).lean<IProduct>();
    if (!doc) {
      throw new Error(`Product ${entry.slug} could not be upserted`);
    }
    return toProduct(doc);
  }

  async lockForRating(id: string): Promise<void> {
    // A write on the product document makes any concurrent transaction that
    // also writes it fail with a write conflict and be retried.
    await Product.updateOne({ _id: id }, { $inc: { ratingVersion: 1 } }, { session: this.session });
  }

  async setRating(id: string, rating: number, reviewCount: number): Promise<void> {
    await Product.updateOne({ _id: id }, { $set: { rating, reviewCount } }, { session: this.session });
  }
}

class MongoUserRepository implements UserRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<UserRecord | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const doc = await User.findById(id).session(this.session ?? null).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email: email.toLowerCase() }).session(this.session ?? null).lean<IUser>();
    return doc ? toUser(doc) : null;
  }

  async create(user: NewUser): Promise<UserRecord> {
    const [doc] = await User.create(
      [
        {
          email: user.email,
          password: user.passwordHash,
          firstName: user.firstName,
          lastName: user.lastName,
          role: user.role,
        },
      ],
      { session: this.session }
    );
    return toUser(doc.toObject());
  }
}

function createRepositories(session?: ClientSession): Repositories {
  return {
    reviews: new MongoReviewRepository(session),
    products: new MongoProductRepository(session),
    users: new MongoUserRepository(session),
  };
}

/**
 * MongoDB-backed store. Transactions need a replica set (a single-node
 * replica set is enough for development).
 */
export class MongoDataStore implements DataStore {
  readonly reviews: ReviewRepository;
  readonly products: ProductRepository;
  readonly users: UserRepository;

  constructor() {
    const repos = createRepositories();
    this.reviews = repos.reviews;
    this.products = repos.products;
    this.users = repos.users;
  }

  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      // withTransaction retries the callback on TransientTransactionError
      // (write conflicts included) and returns the callback's value.
      return await session.withTransaction(() => work(createRepositories(session)), {
        readConcern: { level: 'snapshot' },
        writeConcern: { w: 'majority' },
      });
    } finally {
      await session.endSession();
    }
  }

  async close(): Promise<void> {
    await mongoose.disconnect();
  }
}
