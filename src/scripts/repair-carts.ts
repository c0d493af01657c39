/**
 * Merges duplicate active carts left over from data written before the
 * one-active-cart index existed.
 *
 * Run: npm run carts:repair
 */

import { closeStore } from '../shared/database/db';
import { logError, logger } from '../shared/services/logger.service';
import { cartService } from '../modules/cart/cart.service';

async function main(): Promise<void> {
  const repaired = await cartService.repairDuplicateCarts();
  logger.info('Cart repair complete', { usersRepaired: repaired });
}

main()
  .then(() => closeStore())
  .catch(async (error: unknown) => {
    logError('Cart repair failed', error);
    await closeStore();
    process.exit(1);
  });
