/**
 * allocation-core - Read-model queries
 *
 * Queries read `allocations_view` inside a Unit of Work that is never
 * committed, so they cannot change state.
 *
 * @module application/queries/GetAllocations
 */

import type { AllocationView } from '../../domain/repository/IRepository';
import type { IUnitOfWork } from '../../domain/repository/IUnitOfWork';
import { QueryBase, QueryHandlerBase } from '../cqrs/IQuery';
import type { ILogger } from '../ports';

/**
 * Allocations of one order, one row per SKU.
 */
export class GetAllocations extends QueryBase<AllocationView[]> {
  constructor(readonly orderid: string) {
    super();
  }
}

/**
 * Read the allocations of an order from the read model.
 *
 * @example
 * ```typescript
 * await allocations('o1', bus.uow); // [{ sku: 'SKU1', batchref: 'b1' }]
 * ```
 */
export function allocations(orderid: string, uow: IUnitOfWork): Promise<AllocationView[]> {
  return uow.executeInTransaction((unitOfWork) => unitOfWork.allocationsView.findByOrder(orderid));
}

export class GetAllocationsHandler extends QueryHandlerBase<GetAllocations, AllocationView[]> {
  constructor(
    private readonly uow: IUnitOfWork,
    logger: ILogger,
  ) {
    super(logger);
  }

  protected doExecute(query: GetAllocations): Promise<AllocationView[]> {
    return allocations(query.orderid, this.uow);
  }
}

/**
 * Recompute `allocations_view` from the stored write model, replacing every
 * row. Used to repair the view after projector handlers failed.
 *
 * @returns Number of rows written
 */
export function rebuildAllocationsView(uow: IUnitOfWork): Promise<number> {
  return uow.executeInTransaction(async (unitOfWork) => {
    const records = await unitOfWork.products.listAllocations();
    await unitOfWork.allocationsView.replaceAll(records);
    await unitOfWork.commit();
    return records.length;
  });
}
