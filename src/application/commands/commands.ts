/**
 * Allocation commands.
 *
 * @module application/commands/commands
 */

import { CommandBase } from '../cqrs/ICommand';

/**
 * Register a new batch of stock. A batch without an ETA is warehouse stock.
 */
export class CreateBatch extends CommandBase {
  constructor(
    readonly ref: string,
    readonly sku: string,
    readonly qty: number,
    readonly eta: Date | null = null,
  ) {
    super();
  }
}

/**
 * Allocate an order line to the preferred batch of its SKU.
 */
export class Allocate extends CommandBase {
  constructor(
    readonly orderid: string,
    readonly sku: string,
    readonly qty: number,
  ) {
    super();
  }
}

/**
 * Set a batch's purchased quantity.
 */
export class ChangeBatchQuantity extends CommandBase {
  constructor(
    readonly ref: string,
    readonly qty: number,
  ) {
    super();
  }
}
