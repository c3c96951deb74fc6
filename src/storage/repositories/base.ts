/**
 * Base Repository Interface
 *
 * The generic CRUD contract the entity repositories implement. Business
 * logic works against these domain-model methods rather than Drizzle
 * queries, and tests can substitute an in-memory implementation.
 */

/**
 * Generic repository interface defining standard CRUD operations.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 * @typeParam UpdateInput - The type for updating entities
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /**
   * Retrieves an entity by its unique identifier, or null if not found.
   */
  findById(id: string): Promise<T | null>;

  /**
   * Retrieves all entities of this type.
   *
   * Note: prefer the learner-scoped finders for anything user-facing.
   */
  findAll(): Promise<T[]>;

  /**
   * Creates a new entity and persists it to the database.
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Updates an existing entity with partial data.
   *
   * @throws NotFoundError if the entity with the given id does not exist
   */
  update(id: string, input: UpdateInput): Promise<T>;

  /**
   * Permanently deletes an entity from the database.
   *
   * @throws NotFoundError if the entity with the given id does not exist
   */
  delete(id: string): Promise<void>;
}

/** Offset pagination shared by the list queries. */
export interface PageOptions {
  skip?: number;
  limit?: number;
}

export const DEFAULT_PAGE_LIMIT = 20;
