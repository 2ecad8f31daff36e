/**
 * Asset custody layer
 */

export type { AssetLedger, LedgerMovement } from './ledger.js';
export { InMemoryLedger, InsufficientBalanceError } from './ledger.js';
