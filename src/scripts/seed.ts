/**
 * Seeds the demo catalog and, when ADMIN_EMAIL and ADMIN_PASSWORD are set,
 * a staff account.
 *
 * Run: npm run db:seed [-- --reset]
 */

import { config } from '../config/environment';
import { closeStore, getStore } from '../shared/database/db';
import { logError, logger } from '../shared/services/logger.service';
import { ensureStaffUser, loadDemoCatalog, seedCatalog } from './seed-catalog';

async function main(): Promise<void> {
  const reset = process.argv.includes('--reset');
  const catalog = loadDemoCatalog();

  const summary = await getStore().transaction(repos => seedCatalog(repos, catalog, { reset }));
  logger.info('Demo catalog seeded', { ...summary, reset });

  if (config.admin.email && config.admin.password) {
    await getStore().transaction(repos => ensureStaffUser(repos, config.admin.email, config.admin.password));
  }
}

main()
  .then(() => closeStore())
  .catch(async (error: unknown) => {
    logError('Seed failed', error);
    await closeStore();
    process.exit(1);
  });
