/**
 * Inventory Port
 *
 * Stock reduction for confirmed orders. Owned by the inventory context.
 */

import { DomainError } from '../../shared/errors/domain.errors';

export const INVENTORY_PORT = Symbol('INVENTORY_PORT');

export interface InventoryPort {
  /**
   * Take `quantity` units of the product out of available stock.
   * Fails with StockReductionError when not enough is left.
   */
  reduceStock(productId: string, quantity: number): Promise<void>;
}

export class StockReductionError extends DomainError {
  readonly code = 'STOCK_REDUCTION_FAILED';
  readonly httpStatus = 409;

  constructor(
    public readonly productId: string,
    public readonly quantity: number,
  ) {
    super(`Cannot reduce stock of '${productId}' by ${quantity}`, {
      productId,
      quantity,
    });
  }
}
