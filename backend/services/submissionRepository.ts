/**
 * Submission persistence
 * Moderation and check-in services depend on this interface only; the
 * Mongo implementation keeps every query parameterized through mongoose.
 */
import type { FilterQuery } from 'mongoose';
import Submission, {
  MODERATION_STATUSES,
  type ISubmission,
  type ModerationReason,
  type ModerationStatus,
  type SubmissionRecord
} from '../models/Submission';
import { StorageError, getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface StatusUpdate {
  status: ModerationStatus;
  moderationReason: ModerationReason;
  moderatedAt: Date;
}

export type SortField = 'createdAt' | 'likeCount';
export type SortOrder = 'asc' | 'desc';

export interface ListFilter {
  /** Case-insensitive substring of the nickname */
  nickname?: string;
  /** Case-insensitive substring of the content */
  keyword?: string;
  /** Minimum content length in code points */
  minLength?: number;
  /** Leave out posts under the default nickname */
  excludeNickname?: string;
}

export interface ListSort {
  field: SortField;
  order: SortOrder;
}

export const DEFAULT_SORT: ListSort = { field: 'createdAt', order: 'desc' };

export interface ListQuery {
  status?: ModerationStatus;
  filter?: ListFilter;
  sort?: ListSort;
  skip: number;
  limit: number;
}

export interface ListResult {
  items: SubmissionRecord[];
  total: number;
}

export type StatusCounts = Record<ModerationStatus, number>;

export interface SubmissionRepository {
  create(record: SubmissionRecord): Promise<SubmissionRecord>;
  findById(submissionId: string): Promise<SubmissionRecord | null>;
  /**
   * Apply `update` only while the current status is one of `from`.
   * Returns the updated record, or null when no document matched.
   */
  transition(submissionId: string, from: readonly ModerationStatus[], update: StatusUpdate): Promise<SubmissionRecord | null>;
  /** Newest first unless `sort` says otherwise; ties fall back to newest first */
  list(query: ListQuery): Promise<ListResult>;
  countByStatus(): Promise<StatusCounts>;
  /**
   * Add one like to a published submission. Null when it is not published.
   */
  incrementLikes(submissionId: string): Promise<SubmissionRecord | null>;
}

export function emptyCounts(): StatusCounts {
  return { pending: 0, approved: 0, banned: 0 };
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function toMongoFilter(query: ListQuery): FilterQuery<ISubmission> {
  const filter: FilterQuery<ISubmission> = {};
  if (query.status) filter.status = query.status;

  const { nickname, keyword, minLength, excludeNickname } = query.filter ?? {};
  if (nickname !== undefined || excludeNickname !== undefined) {
    filter.nickname = {
      ...(nickname !== undefined ? { $regex: escapeRegex(nickname), $options: 'i' } : {}),
      ...(excludeNickname !== undefined ? { $ne: excludeNickname } : {})
    };
  }
  if (keyword !== undefined) {
    filter.content = { $regex: escapeRegex(keyword), $options: 'i' };
  }
  if (minLength !== undefined) {
    filter.$expr = { $gte: [{ $strLenCP: '$content' }, minLength] };
  }
  return filter;
}

function toRecord(doc: ISubmission): SubmissionRecord {
  const { _id: _ignored, ...record } = doc;
  return record;
}

async function storage<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    logger.error('Submission storage failed', { operation, error: getErrorMessage(error) });
    throw new StorageError(`Failed to ${operation}`);
  }
}

export class MongoSubmissionRepository implements SubmissionRepository {
  create(record: SubmissionRecord): Promise<SubmissionRecord> {
    return storage('save submission', async () => {
      const doc = await Submission.create(record);
      return toRecord(doc.toObject());
    });
  }

  findById(submissionId: string): Promise<SubmissionRecord | null> {
    return storage('load submission', async () => {
      const doc = await Submission.findOne({ submissionId }).select('-__v').lean<ISubmission>();
      return doc ? toRecord(doc) : null;
    });
  }

  transition(submissionId: string, from: readonly ModerationStatus[], update: StatusUpdate): Promise<SubmissionRecord | null> {
    return storage('update submission', async () => {
      const doc = await Submission.findOneAndUpdate(
        { submissionId, status: { $in: [...from] } },
        { $set: update },
        { new: true }
      ).select('-__v').lean<ISubmission>();
      return doc ? toRecord(doc) : null;
    });
  }

  list(query: ListQuery): Promise<ListResult> {
    return storage('list submissions', async () => {
      const filter = toMongoFilter(query);
      const sort = query.sort ?? DEFAULT_SORT;
      const direction = sort.order === 'asc' ? 1 : -1;
      const [docs, total] = await Promise.all([
        Submission.find(filter)
          .sort(sort.field === 'likeCount' ? { likeCount: direction, createdAt: -1 } : { createdAt: direction })
          .skip(query.skip)
          .limit(query.limit)
          .select('-__v')
          .lean<ISubmission[]>(),
        Submission.countDocuments(filter)
      ]);
      return { items: docs.map(toRecord), total };
    });
  }

  countByStatus(): Promise<StatusCounts> {
    return storage('count submissions', async () => {
      const rows = await Submission.aggregate<{ _id: string; count: number }>([
        { $group: { _id: '$status', count: { $sum: 1 } } }
      ]);
      const counts = emptyCounts();
      for (const row of rows) {
        const status = MODERATION_STATUSES.find(candidate => candidate === row._id);
        if (status) counts[status] = row.count;
      }
      return counts;
    });
  }

  incrementLikes(submissionId: string): Promise<SubmissionRecord | null> {
    return storage('update like count', async () => {
      const doc = await Submission.findOneAndUpdate(
        { submissionId, status: 'approved' },
        { $inc: { likeCount: 1 } },
        { new: true }
      ).select('-__v').lean<ISubmission>();
      return doc ? toRecord(doc) : null;
    });
  }
}

export default MongoSubmissionRepository;
