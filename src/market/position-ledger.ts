import { minBigInt } from '../utils/fixed-point';
import { Account } from './account';
import { Asset } from './asset';

// ============================================================================
// Position primitives
// ============================================================================
//
// Shares leaving an account are rounded so the pool never ends up owing more
// than it holds: supply and debt repayment convert amounts to shares rounding
// down, withdrawals and new debt round up.

export interface ShareMovement {
  shares: bigint;
  amount: bigint;
}

export function suppliedBalance(account: Account, asset: Asset): bigint {
  return asset.supplied.sharesToAmount(Account.shares(account.supplied, asset.id), false);
}

export function collateralBalance(account: Account, asset: Asset): bigint {
  return asset.supplied.sharesToAmount(Account.shares(account.collateral, asset.id), false);
}

export function borrowedBalance(account: Account, asset: Asset): bigint {
  return asset.borrowed.sharesToAmount(Account.shares(account.borrowed, asset.id), true);
}

export function increaseSupplied(account: Account, asset: Asset, amount: bigint): ShareMovement {
  const shares = asset.supplied.amountToShares(amount, false);
  asset.supplied.deposit(shares, amount);
  Account.add(account.supplied, asset.id, shares);
  return { shares, amount };
}

/**
 * Removes up to `amount` (everything when omitted) from the supplied role.
 */
export function decreaseSupplied(account: Account, asset: Asset, amount?: bigint): ShareMovement {
  const held = Account.shares(account.supplied, asset.id);
  const heldAmount = asset.supplied.sharesToAmount(held, false);
  const movement =
    amount === undefined || amount >= heldAmount
      ? { shares: held, amount: heldAmount }
      : { shares: asset.supplied.amountToShares(amount, true), amount };
  asset.supplied.withdraw(movement.shares, movement.amount);
  Account.subtract(account.supplied, asset.id, movement.shares);
  return movement;
}

/**
 * Pledges supplied shares. Pool totals do not change.
 */
export function increaseCollateral(account: Account, asset: Asset, amount?: bigint): ShareMovement {
  const held = Account.shares(account.supplied, asset.id);
  const heldAmount = asset.supplied.sharesToAmount(held, false);
  const movement =
    amount === undefined || amount >= heldAmount
      ? { shares: held, amount: heldAmount }
      : { shares: minBigInt(asset.supplied.amountToShares(amount, true), held), amount };
  Account.subtract(account.supplied, asset.id, movement.shares);
  Account.add(account.collateral, asset.id, movement.shares);
  return movement;
}

/**
 * Releases pledged shares back to the supplied role.
 */
export function decreaseCollateral(account: Account, asset: Asset, amount?: bigint): ShareMovement {
  const held = Account.shares(account.collateral, asset.id);
  const heldAmount = asset.supplied.sharesToAmount(held, false);
  const movement =
    amount === undefined || amount >= heldAmount
      ? { shares: held, amount: heldAmount }
      : { shares: asset.supplied.amountToShares(amount, false), amount };
  Account.subtract(account.collateral, asset.id, movement.shares);
  Account.add(account.supplied, asset.id, movement.shares);
  return movement;
}

export function increaseBorrowed(account: Account, asset: Asset, amount: bigint): ShareMovement {
  const shares = asset.borrowed.amountToShares(amount, true);
  asset.borrowed.deposit(shares, amount);
  Account.add(account.borrowed, asset.id, shares);
  return { shares, amount };
}

/**
 * Repays up to `amount`, capped at what the account owes.
 */
export function decreaseBorrowed(account: Account, asset: Asset, amount: bigint): ShareMovement {
  const held = Account.shares(account.borrowed, asset.id);
  const owed = asset.borrowed.sharesToAmount(held, true);
  const movement =
    amount >= owed
      ? { shares: held, amount: owed }
      : { shares: asset.borrowed.amountToShares(amount, false), amount };
  asset.borrowed.withdraw(movement.shares, movement.amount);
  Account.subtract(account.borrowed, asset.id, movement.shares);
  return movement;
}
