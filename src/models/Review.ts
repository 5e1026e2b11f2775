import mongoose, { Schema, Types } from 'mongoose';

export type ReviewStatus = 'active' | 'retracted';

export interface IReview {
  _id: number;
  author: Types.ObjectId;
  product: Types.ObjectId;
  grade: number;
  comment?: string;
  submittedOn: string; // YYYY-MM-DD
  status: ReviewStatus;
  retractedAt?: Date;
  retractedBy?: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const ReviewSchema = new Schema<IReview>(
  {
    _id: {
      type: Number,
      required: true,
    },
    author: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      required: true,
      immutable: true,
    },
    product: {
      type: Schema.Types.ObjectId,
      ref: 'Product',
      required: true,
      immutable: true,
    },
    grade: {
      type: Number,
      required: true,
      min: 1,
      max: 5,
      immutable: true,
      validate: {
        validator: Number.isInteger,
        message: 'grade must be an integer',
      },
    },
    comment: {
      type: String,
      trim: true,
      maxlength: 2000,
      immutable: true,
    },
    submittedOn: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
      immutable: true,
    },
    status: {
      type: String,
      enum: ['active', 'retracted'],
      default: 'active',
    },
    retractedAt: Date,
    retractedBy: {
      type: Schema.Types.ObjectId,
      ref: 'User',
    },
  },
  {
    timestamps: true,
  }
);

// Per-product listing and aggregation
ReviewSchema.index({ product: 1, status: 1, submittedOn: -1, _id: -1 });

export default mongoose.model<IReview>('Review', ReviewSchema);
