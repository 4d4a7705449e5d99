/**
 * In-process SubmissionRepository with the same conditional transition
 * semantics as the Mongo implementation
 */
import type { ModerationStatus, SubmissionRecord } from '../../models/Submission';
import {
  DEFAULT_SORT,
  emptyCounts,
  type ListFilter,
  type ListQuery,
  type ListResult,
  type StatusCounts,
  type StatusUpdate,
  type SubmissionRepository
} from '../../services/submissionRepository';

export class MemorySubmissionRepository implements SubmissionRepository {
  readonly records = new Map<string, SubmissionRecord>();

  async create(record: SubmissionRecord): Promise<SubmissionRecord> {
    this.records.set(record.submissionId, structuredClone(record));
    return structuredClone(record);
  }

  async findById(submissionId: string): Promise<SubmissionRecord | null> {
    const record = this.records.get(submissionId);
    return record ? structuredClone(record) : null;
  }

  async transition(submissionId: string, from: readonly ModerationStatus[], update: StatusUpdate): Promise<SubmissionRecord | null> {
    const record = this.records.get(submissionId);
    if (!record || !from.includes(record.status)) return null;
    const updated = { ...record, ...update };
    this.records.set(submissionId, updated);
    return structuredClone(updated);
  }

  async list(query: ListQuery): Promise<ListResult> {
    const sort = query.sort ?? DEFAULT_SORT;
    const sign = sort.order === 'asc' ? 1 : -1;
    const newestFirst = (a: SubmissionRecord, b: SubmissionRecord): number => b.createdAt.getTime() - a.createdAt.getTime();
    const matching = [...this.records.values()]
      .filter(record => query.status === undefined || record.status === query.status)
      .filter(record => matchesFilter(record, query.filter ?? {}))
      .sort((a, b) => sort.field === 'likeCount'
        ? sign * (a.likeCount - b.likeCount) || newestFirst(a, b)
        : sign * (a.createdAt.getTime() - b.createdAt.getTime()));
    return {
      items: matching.slice(query.skip, query.skip + query.limit).map(record => structuredClone(record)),
      total: matching.length
    };
  }

  async countByStatus(): Promise<StatusCounts> {
    const counts = emptyCounts();
    for (const record of this.records.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  async incrementLikes(submissionId: string): Promise<SubmissionRecord | null> {
    const record = this.records.get(submissionId);
    if (!record || record.status !== 'approved') return null;
    const updated = { ...record, likeCount: record.likeCount + 1 };
    this.records.set(submissionId, updated);
    return structuredClone(updated);
  }
}

function matchesFilter(record: SubmissionRecord, filter: ListFilter): boolean {
  if (filter.nickname !== undefined && !record.nickname.toLowerCase().includes(filter.nickname.toLowerCase())) return false;
  if (filter.excludeNickname !== undefined && record.nickname === filter.excludeNickname) return false;
  if (filter.keyword !== undefined && !record.content.toLowerCase().includes(filter.keyword.toLowerCase())) return false;
  if (filter.minLength !== undefined && [...record.content].length < filter.minLength) return false;
  return true;
}

export default MemorySubmissionRepository;
