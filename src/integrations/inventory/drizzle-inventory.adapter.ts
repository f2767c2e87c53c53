import { Injectable } from '@nestjs/common';
import { and, eq, gte } from 'drizzle-orm';
import { DrizzleService } from '../../helpers/drizzle/drizzle.service';
import { decrement, productStock } from '../../db/schema';
import { InventoryPort, StockReductionError } from './inventory.port';

@Injectable()
export class DrizzleInventoryAdapter implements InventoryPort {
  constructor(private readonly drizzleService: DrizzleService) {}

  async reduceStock(productId: string, quantity: number): Promise<void> {
    // Conditional decrement: stock never goes negative.
    const updated = await this.drizzleService.db
      .update(productStock)
      .set({
        availableStock: decrement(productStock.availableStock, quantity),
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(productStock.productId, productId),
          gte(productStock.availableStock, quantity),
        ),
      )
      .returning({ productId: productStock.productId });

    if (updated.length === 0) {
      throw new StockReductionError(productId, quantity);
    }
  }
}
