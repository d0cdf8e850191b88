/**
 * Command handlers of the allocation service.
 *
 * Each handler runs one transaction on the injected Unit of Work and commits
 * it explicitly; the events raised by the touched aggregates are collected
 * by the message bus after the handler returns.
 *
 * @module application/handlers/commandHandlers
 */

import { Batch, Product } from '../../domain/model/Product';
import { InvalidBatchReference, InvalidSku } from '../../domain/exceptions/exceptions';
import type { HandlerDefinition } from '../cqrs/IHandler';
import type { Allocate, ChangeBatchQuantity, CreateBatch } from '../commands/commands';
import type { AppDependencies } from './dependencies';

/**
 * Create the batch, creating its product first when the SKU is new.
 */
export const addBatch: HandlerDefinition<CreateBatch, AppDependencies, 'uow'> = {
  name: 'addBatch',
  inject: ['uow'],
  async handle(command, { uow }) {
    await uow.executeInTransaction(async (unitOfWork) => {
      let product = await unitOfWork.products.get(command.sku);
      if (!product) {
        product = new Product(command.sku);
        unitOfWork.products.add(product);
      }
      product.addBatch(new Batch(command.ref, command.sku, command.qty, command.eta));
      await unitOfWork.commit();
    });
  },
};

/**
 * @throws {InvalidSku} When no product exists for the line's SKU
 */
export const allocate: HandlerDefinition<Allocate, AppDependencies, 'uow'> = {
  name: 'allocate',
  inject: ['uow'],
  async handle(command, { uow }) {
    await uow.executeInTransaction(async (unitOfWork) => {
      const product = await unitOfWork.products.get(command.sku);
      if (!product) {
        throw new InvalidSku(command.sku);
      }
      product.allocate({ orderid: command.orderid, sku: command.sku, qty: command.qty });
      await unitOfWork.commit();
    });
  },
};

/**
 * @throws {InvalidBatchReference} When no product holds the batch
 */
export const changeBatchQuantity: HandlerDefinition<ChangeBatchQuantity, AppDependencies, 'uow'> = {
  name: 'changeBatchQuantity',
  inject: ['uow'],
  async handle(command, { uow }) {
    await uow.executeInTransaction(async (unitOfWork) => {
      const product = await unitOfWork.products.getByBatchRef(command.ref);
      if (!product) {
        throw new InvalidBatchReference(command.ref);
      }
      product.changeBatchQuantity(command.ref, command.qty);
      await unitOfWork.commit();
    });
  },
};
