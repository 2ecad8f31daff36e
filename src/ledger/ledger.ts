/**
 * Asset ledger
 * Custody and balances of every asset the settlement account touches,
 * with nested all-or-nothing units of work
 */

import type { Hex } from '../core/types.js';
import { normalizeHex } from '../core/hex.js';
import type { Result } from '../core/result.js';
import { SettlementError } from '../errors.js';

/**
 * Interface for ledger backends
 */
export interface AssetLedger {
  /** Balance of an asset held by an account */
  balanceOf(asset: Hex, holder: Hex): Promise<bigint>;
  /** Move an amount between accounts, throwing InsufficientBalanceError when short */
  transfer(asset: Hex, from: Hex, to: Hex, amount: bigint): Promise<void>;
  /**
   * Run a unit of work. Every movement made inside it is kept when it
   * returns Ok and undone when it returns Err or throws. Units nest.
   */
  atomic<T, E>(fn: () => Promise<Result<T, E>>): Promise<Result<T, E>>;
}

export class InsufficientBalanceError extends SettlementError {
  constructor(config: { asset: Hex; holder: Hex; balance: bigint; required: bigint }) {
    super({
      code: 'INSUFFICIENT_BALANCE',
      message: `${config.holder} holds ${config.balance.toString()} of ${config.asset}, needs ${config.required.toString()}`,
      details: {
        asset: config.asset,
        holder: config.holder,
        balance: config.balance.toString(),
        required: config.required.toString(),
      },
      suggestion: 'Fund the account or lower the amount',
    });
    this.name = 'InsufficientBalanceError';
  }
}

/**
 * A single balance movement, as recorded by the in-memory ledger
 */
export interface LedgerMovement {
  asset: Hex;
  from: Hex | null;
  to: Hex | null;
  amount: bigint;
}

type BalanceKey = string;

interface Savepoint {
  /** Balance of each touched key before the unit started */
  previous: Map<BalanceKey, bigint>;
  /** Length of the movement log when the unit started */
  movementCount: number;
}

/**
 * In-memory ledger
 * Reference backend for hosts without their own atomic execution, and for tests
 */
export class InMemoryLedger implements AssetLedger {
  private readonly balances = new Map<BalanceKey, bigint>();
  private readonly savepoints: Savepoint[] = [];
  private readonly log: LedgerMovement[] = [];

  async balanceOf(asset: Hex, holder: Hex): Promise<bigint> {
    return Promise.resolve(this.read(asset, holder));
  }

  /**
   * Synchronous balance read for inspection
   */
  balance(asset: Hex, holder: Hex): bigint {
    return this.read(asset, holder);
  }

  async transfer(asset: Hex, from: Hex, to: Hex, amount: bigint): Promise<void> {
    this.assertAmount(amount);
    const balance = this.read(asset, from);
    if (balance < amount) {
      throw new InsufficientBalanceError({ asset, holder: from, balance, required: amount });
    }
    this.write(asset, from, balance - amount);
    this.write(asset, to, this.read(asset, to) + amount);
    this.log.push({ asset: normalizeHex(asset), from: normalizeHex(from), to: normalizeHex(to), amount });
    return Promise.resolve();
  }

  /**
   * Create an amount out of nothing (bridge receipt, test funding)
   */
  mint(asset: Hex, holder: Hex, amount: bigint): void {
    this.assertAmount(amount);
    this.write(asset, holder, this.read(asset, holder) + amount);
    this.log.push({ asset: normalizeHex(asset), from: null, to: normalizeHex(holder), amount });
  }

  /**
   * Destroy an amount (bridge lock/burn, native unwrap)
   */
  burn(asset: Hex, holder: Hex, amount: bigint): void {
    this.assertAmount(amount);
    const balance = this.read(asset, holder);
    if (balance < amount) {
      throw new InsufficientBalanceError({ asset, holder, balance, required: amount });
    }
    this.write(asset, holder, balance - amount);
    this.log.push({ asset: normalizeHex(asset), from: normalizeHex(holder), to: null, amount });
  }

  async atomic<T, E>(fn: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
    const savepoint: Savepoint = { previous: new Map(), movementCount: this.log.length };
    this.savepoints.push(savepoint);
    let result: Result<T, E>;
    try {
      result = await fn();
    } catch (error) {
      this.rollback(savepoint);
      throw error;
    }
    if (result.ok) {
      this.commit(savepoint);
    } else {
      this.rollback(savepoint);
    }
    return result;
  }

  /**
   * Movements that are currently in effect, oldest first
   */
  get movements(): readonly LedgerMovement[] {
    return this.log;
  }

  private commit(savepoint: Savepoint): void {
    this.savepoints.pop();
    const parent = this.savepoints[this.savepoints.length - 1];
    if (!parent) return;
    // The parent must still be able to restore what existed before this unit
    for (const [key, value] of savepoint.previous) {
      if (!parent.previous.has(key)) {
        parent.previous.set(key, value);
      }
    }
  }

  private rollback(savepoint: Savepoint): void {
    this.savepoints.pop();
    for (const [key, value] of savepoint.previous) {
      this.balances.set(key, value);
    }
    this.log.length = savepoint.movementCount;
  }

  private read(asset: Hex, holder: Hex): bigint {
    return this.balances.get(this.key(asset, holder)) ?? 0n;
  }

  private write(asset: Hex, holder: Hex, value: bigint): void {
    const key = this.key(asset, holder);
    const current = this.savepoints[this.savepoints.length - 1];
    if (current && !current.previous.has(key)) {
      current.previous.set(key, this.balances.get(key) ?? 0n);
    }
    this.balances.set(key, value);
  }

  private key(asset: Hex, holder: Hex): BalanceKey {
    return `${normalizeHex(asset)}|${normalizeHex(holder)}`;
  }

  private assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Ledger amount must be non-negative, got ${amount.toString()}`);
    }
  }
}
