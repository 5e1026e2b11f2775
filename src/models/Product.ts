import mongoose, { Schema, Types } from 'mongoose';

export interface IProduct {
  _id: Types.ObjectId;
  slug: string;
  name: string;
  isActive: boolean;
  rating: number; // derived, written only by the rating aggregator
  reviewCount: number;
  ratingVersion: number; // bumped to take the row's write lock during recompute
  createdAt: Date;
  updatedAt: Date;
}

const ProductSchema = new Schema<IProduct>(
  {
    slug: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    rating: {
      type: Number,
      default: 0,
      min: 0,
      max: 5,
    },
    reviewCount: {
      type: Number,
      default: 0,
    },
    ratingVersion: {
      type: Number,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<IProduct>('Product', ProductSchema);
