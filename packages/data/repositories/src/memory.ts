import type { Result } from '@shared/result';
import type { MutableRepository } from './interfaces';

export class InMemoryRepository<TId, TEntity> implements MutableRepository<TId, TEntity> {
  private readonly records = new Map<string, TEntity>();

  constructor(private readonly idOf: (entity: TEntity) => TId) {}

  async findById(id: TId): Promise<TEntity | null> {
    return this.records.get(String(id)) ?? null;
  }

  async save(entity: TEntity): Promise<void> {
    this.records.set(String(this.idOf(entity)), entity);
  }

  async deleteById(id: TId): Promise<void> {
    this.records.delete(String(id));
  }

  async all(): Promise<TEntity[]> {
    return Array.from(this.records.values());
  }

  /** Replaces the stored record in one step; `change` must not mutate `current`. */
  async update(id: TId, change: (current: TEntity) => TEntity): Promise<TEntity | null> {
    const key = String(id);
    const current = this.records.get(key);
    if (current === undefined) return null;
    const next = change(current);
    this.records.set(key, next);
    return next;
  }

  /**
   * Like `update`, but `change` may refuse; the stored record is replaced only
   * on success. Returns null for an unknown id.
   */
  async updateWith<TError>(
    id: TId,
    change: (current: TEntity) => Result<TEntity, TError>,
  ): Promise<Result<TEntity, TError> | null> {
    const key = String(id);
    const current = this.records.get(key);
    if (current === undefined) return null;
    const outcome = change(current);
    if (outcome.ok) this.records.set(key, outcome.value);
    return outcome;
  }

  count(): number {
    return this.records.size;
  }
}
