/**
 * Like persistence
 */
import Like from '../models/Like';
import { StorageError, getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface LikeRepository {
  /**
   * Record a like. Returns false when `identifier` already liked the submission.
   */
  add(submissionId: string, identifier: string, at: Date): Promise<boolean>;
  likedIds(identifier: string): Promise<string[]>;
}

const DUPLICATE_KEY = 11000;

function isDuplicateKey(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}

export class MongoLikeRepository implements LikeRepository {
  async add(submissionId: string, identifier: string, at: Date): Promise<boolean> {
    try {
      await Like.create({ submissionId, identifier, createdAt: at });
      return true;
    } catch (error) {
      if (isDuplicateKey(error)) return false;
      logger.error('Like storage failed', { operation: 'save like', error: getErrorMessage(error) });
      throw new StorageError('Failed to save like');
    }
  }

  async likedIds(identifier: string): Promise<string[]> {
    try {
      const rows = await Like.find({ identifier }).select('submissionId').lean<Array<{ submissionId: string }>>();
      return rows.map(row => row.submissionId);
    } catch (error) {
      logger.error('Like storage failed', { operation: 'list likes', error: getErrorMessage(error) });
      throw new StorageError('Failed to list likes');
    }
  }
}

export default MongoLikeRepository;
