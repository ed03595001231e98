export interface Repository<TId, TEntity> {
  findById(id: TId): Promise<TEntity | null>;
  save(entity: TEntity): Promise<void>;
  deleteById(id: TId): Promise<void>;
  all(): Promise<TEntity[]>;
}

export interface MutableRepository<TId, TEntity> extends Repository<TId, TEntity> {
  update(id: TId, change: (current: TEntity) => TEntity): Promise<TEntity | null>;
}

export interface Query<TFilter = unknown> {
  filter?: TFilter;
  limit?: number;
  cursor?: string;
}
