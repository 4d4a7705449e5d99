/**
 * Like Model - One row per (submission, requester); the unique index is what
 * makes a second like from the same requester fail
 */
import mongoose from 'mongoose';

export interface LikeRecord {
  submissionId: string;
  /** Requester identity the like is counted against (client IP) */
  identifier: string;
  createdAt: Date;
}

export interface ILike extends LikeRecord {
  _id?: mongoose.Types.ObjectId;
}

const likeSchema = new mongoose.Schema<ILike>({
  submissionId: {
    type: String,
    required: true
  },
  identifier: {
    type: String,
    required: true,
    index: true
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
});

likeSchema.index({ submissionId: 1, identifier: 1 }, { unique: true });

const Like = mongoose.model<ILike>('Like', likeSchema);

export default Like;
