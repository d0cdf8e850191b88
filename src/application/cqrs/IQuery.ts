/**
 * allocation-core - CQRS Query Interface
 *
 * Queries read the denormalized read model and never touch write-side
 * aggregates or raise events. They are executed directly by their handler,
 * outside the message bus.
 *
 * @module application/cqrs/IQuery
 */

import { v4 as uuidv4 } from 'uuid';

import type { ILogger } from '../ports';

/**
 * Query metadata for logging and tracing.
 */
export interface QueryMetadata {
  /**
   * Unique identifier for this query instance.
   */
  queryId: string;

  /**
   * The type name of the query (e.g., 'GetAllocations').
   */
  queryType: string;

  /**
   * Timestamp when the query was created.
   */
  timestamp: Date;
}

/**
 * IQuery - Marker interface for CQRS queries.
 *
 * @template TResult - The type of result returned by the query
 */
export interface IQuery<TResult = unknown> {
  /**
   * Phantom property to capture the result type.
   * This property doesn't exist at runtime but enables TypeScript
   * to infer the result type from the query.
   *
   * @internal
   */
  readonly __resultType?: TResult;
}

/**
 * Abstract base class for queries with metadata support.
 *
 * @template TResult - The type of result returned by the query
 *
 * @example
 * ```typescript
 * class GetAllocations extends QueryBase<AllocationView[]> {
 *   constructor(readonly orderid: string) {
 *     super();
 *   }
 * }
 *
 * new GetAllocations('order-1').metadata.queryType; // 'GetAllocations'
 * ```
 */
export abstract class QueryBase<TResult = unknown> implements IQuery<TResult> {
  readonly metadata: QueryMetadata;

  protected constructor() {
    this.metadata = {
      queryId: uuidv4(),
      queryType: new.target.name,
      timestamp: new Date(),
    };
  }

  /**
   * Phantom property for result type inference.
   * @internal
   */
  readonly __resultType?: TResult;
}

/**
 * Query handler interface.
 */
export interface IQueryHandler<TQuery extends IQuery<TResult>, TResult = unknown> {
  execute(query: TQuery): Promise<TResult>;
}

/**
 * Abstract base class for query handlers with logging boilerplate.
 *
 * @template TQuery - The query type this handler processes
 * @template TResult - The type of result returned by the handler
 */
export abstract class QueryHandlerBase<TQuery extends QueryBase<TResult>, TResult = unknown>
  implements IQueryHandler<TQuery, TResult>
{
  protected constructor(protected readonly logger: ILogger) {}

  /**
   * Execute the query with logging.
   */
  async execute(query: TQuery): Promise<TResult> {
    const startTime = Date.now();
    const { queryId, queryType } = query.metadata;

    this.logger.debug(`Executing ${queryType}`, { queryId });

    try {
      const result = await this.doExecute(query);
      this.logger.debug(`${queryType} completed`, {
        queryId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.logger.error(`${queryType} failed`, error, {
        queryId,
        duration: Date.now() - startTime,
      });
      throw error;
    }
  }

  /**
   * Implement the actual query execution logic.
   */
  protected abstract doExecute(query: TQuery): Promise<TResult>;
}
