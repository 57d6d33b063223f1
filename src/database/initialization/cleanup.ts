/**
 * Database cleanup and shutdown module
 */

import { debugLog } from '../../utils/debug-logger.js';
import { getAdapterInstance, resetAdapterInstance } from './init.js';

/**
 * Close database connection and clean up resources
 */
export async function closeDatabase(): Promise<void> {
  const adapterInstance = getAdapterInstance();
  if (adapterInstance) {
    resetAdapterInstance();
    await adapterInstance.disconnect();
    debugLog('INFO', 'Database connection closed');
  }
}
