import { PRECISION } from '../config';
import { FungibleAsset } from '../types/collaborators';
import { ValidationError } from '../errors';
import { LocalLedger } from './ledger';

/**
 * Options for a {@link LocalToken}.
 */
export interface LocalTokenOptions {
  /** Share of every transfer burnt on the way, in basis points. Defaults to 0. */
  transferFeeBps?: number;
}

/**
 * Fungible asset kept on a {@link LocalLedger}.
 *
 * With a transfer fee the recipient is credited the nominal amount less
 * the fee, and the fee leaves the supply. Allowances at
 * `PRECISION.MAX_ALLOWANCE` are never decremented.
 */
export class LocalToken implements FungibleAsset {
  readonly address: string;
  readonly transferFeeBps: bigint;
  protected ledger: LocalLedger;

  constructor(ledger: LocalLedger, address: string, options: LocalTokenOptions = {}) {
    const feeBps = options.transferFeeBps ?? 0;
    if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps >= 10000) {
      throw new ValidationError('transferFeeBps must be an integer in [0, 10000)', { feeBps });
    }
    this.ledger = ledger;
    this.address = address;
    this.transferFeeBps = BigInt(feeBps);
    ledger.register(this);
  }

  async balanceOf(owner: string): Promise<bigint> {
    return this.ledger.balance(this.address, owner);
  }

  async allowance(owner: string, spender: string): Promise<bigint> {
    return this.ledger.allowance(this.address, owner, spender);
  }

  async approve(owner: string, spender: string, amount: bigint): Promise<void> {
    if (amount < 0n) throw new Error('Negative allowance');
    this.ledger.setAllowance(this.address, owner, spender, amount);
  }

  async transfer(from: string, to: string, amount: bigint): Promise<void> {
    this.move(from, to, amount);
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<void> {
    const allowed = this.ledger.allowance(this.address, from, spender);
    if (allowed < amount) {
      throw new Error(`Insufficient allowance: ${spender} may spend ${allowed} of ${from}, needs ${amount}`);
    }
    if (allowed !== PRECISION.MAX_ALLOWANCE) {
      this.ledger.setAllowance(this.address, from, spender, allowed - amount);
    }
    this.move(from, to, amount);
  }

  /**
   * Create `amount` new units for `to`.
   */
  mint(to: string, amount: bigint): void {
    if (amount < 0n) throw new Error('Negative mint');
    this.ledger.credit(this.address, to, amount);
    this.ledger.adjustSupply(this.address, amount);
  }

  /**
   * Destroy `amount` units held by `from`.
   */
  burn(from: string, amount: bigint): void {
    this.ledger.debit(this.address, from, amount);
    this.ledger.adjustSupply(this.address, -amount);
  }

  totalSupply(): Promise<bigint> {
    return Promise.resolve(this.ledger.supply(this.address));
  }

  /** Fee taken from a transfer of `amount`. */
  feeOn(amount: bigint): bigint {
    return (amount * this.transferFeeBps) / PRECISION.BPS_DENOMINATOR;
  }

  protected move(from: string, to: string, amount: bigint): void {
    if (amount < 0n) throw new Error('Negative transfer');
    const fee = this.feeOn(amount);
    this.ledger.debit(this.address, from, amount);
    this.ledger.credit(this.address, to, amount - fee);
    if (fee > 0n) this.ledger.adjustSupply(this.address, -fee);
  }
}
