/**
 * Submission Model - Stores check-in posts and their moderation state
 * Rejected and banned posts keep their document; status `banned` is terminal
 */
import mongoose from 'mongoose';
import type { ArchiveMetadata } from '../services/archive/extractor';

// Types
export type ModerationStatus = 'pending' | 'approved' | 'banned';

export type ModerationReason =
  | 'auto_approved'
  | 'contact_info'
  | 'no_media'
  | 'flagged_nickname'
  | 'approved'
  | 'rejected'
  | 'banned';

export type SubmissionFileType = 'media' | 'archive';

export const MODERATION_STATUSES: readonly ModerationStatus[] = ['pending', 'approved', 'banned'];

export interface SubmissionRecord {
  submissionId: string;
  content: string;
  mediaFiles: string[];
  fileType: SubmissionFileType;
  archiveMetadata?: ArchiveMetadata;
  /** Stored archive, relative to the archive directory */
  archivePath?: string;
  ipAddress?: string;
  region: string;
  fingerprint?: string;
  nickname: string;
  avatar: string;
  email?: string;
  qq?: string;
  url?: string;
  status: ModerationStatus;
  moderationReason: ModerationReason;
  moderatedAt?: Date;
  likeCount: number;
  createdAt: Date;
}

export interface ISubmission extends SubmissionRecord {
  _id?: mongoose.Types.ObjectId;
}

const archiveMetadataSchema = new mongoose.Schema<ArchiveMetadata>({
  filename: { type: String, required: true },
  size: { type: Number, required: true },
  totalFiles: { type: Number, required: true },
  imageCount: { type: Number, required: true },
  previewImages: { type: [String], default: [] }
}, { _id: false });

const submissionSchema = new mongoose.Schema<ISubmission>({
  submissionId: {
    type: String,
    required: true,
    unique: true
  },
  content: {
    type: String,
    required: true,
    maxlength: 10000
  },
  mediaFiles: {
    type: [String],
    default: []
  },
  fileType: {
    type: String,
    enum: ['media', 'archive'],
    default: 'media'
  },
  archiveMetadata: archiveMetadataSchema,
  archivePath: String,
  ipAddress: String,
  region: {
    type: String,
    default: 'unknown'
  },
  fingerprint: String,
  nickname: {
    type: String,
    required: true
  },
  avatar: {
    type: String,
    required: true
  },
  email: String,
  qq: String,
  url: String,
  status: {
    type: String,
    enum: MODERATION_STATUSES,
    required: true,
    index: true
  },
  moderationReason: {
    type: String,
    required: true
  },
  moderatedAt: Date,
  likeCount: {
    type: Number,
    default: 0
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
});

// Public listing and admin queues: newest first within a status
submissionSchema.index({ status: 1, createdAt: -1 });

const Submission = mongoose.model<ISubmission>('Submission', submissionSchema);

export default Submission;
