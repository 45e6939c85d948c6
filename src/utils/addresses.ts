import { Address, StrKey, hash, xdr } from '@stellar/stellar-sdk';
import { ValidationError } from '../errors';

/**
 * Address utilities for Stellar/Soroban address handling.
 */

/**
 * Validate a Stellar public key (G... address).
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a Soroban contract address (C... address).
 *
 * @example
 * ```ts
 * isValidContractId('CAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAD2KM'); // true
 * isValidContractId('GBRPYHIL...'); // false (public key)
 * ```
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any Stellar address (public key or contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Sort two token addresses deterministically (for pair lookups).
 *
 * Pairs store their tokens in address order: token0 < token1 by the
 * encoded `ScAddress` (accounts before contracts, then raw bytes), which
 * is not the order of the strkey strings.
 *
 * @throws {ValidationError} If tokenA and tokenB are identical or not addresses
 */
export function sortTokens(tokenA: string, tokenB: string): [string, string] {
  if (tokenA === tokenB) throw new ValidationError('Identical tokens', { tokenA, tokenB });
  return compareAddresses(tokenA, tokenB) < 0 ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Order of two addresses as a Soroban contract compares them.
 */
export function compareAddresses(a: string, b: string): number {
  return Buffer.compare(addressKey(a), addressKey(b));
}

function addressKey(address: string): Buffer {
  try {
    return Address.fromString(address).toScAddress().toXDR();
  } catch {
    throw new ValidationError(`Invalid address: ${address}`, { address });
  }
}

/**
 * Derive the deterministic pair contract address off-chain.
 *
 * Mirrors the factory's deployment of a pair contract:
 * 1. Sort tokens by address order (token0 < token1)
 * 2. salt = sha256(token0_bytes || token1_bytes)
 * 3. contract ID = sha256(HashIdPreimage(networkId, factory, salt))
 *
 * Order of the tokens does not matter:
 * ```ts
 * getPairAddress(factory, tokenA, tokenB, passphrase) ===
 *   getPairAddress(factory, tokenB, tokenA, passphrase); // true
 * ```
 *
 * @throws {ValidationError} If tokenA and tokenB are identical
 */
export function getPairAddress(
  factoryAddress: string,
  tokenA: string,
  tokenB: string,
  networkPassphrase: string,
): string {
  const [token0, token1] = sortTokens(tokenA, tokenB);

  const salt = hash(
    Buffer.concat([
      Address.fromString(token0).toBuffer(),
      Address.fromString(token1).toBuffer(),
    ]),
  );

  const networkId = hash(Buffer.from(networkPassphrase));

  const preimage = xdr.HashIdPreimage.envelopeTypeContractId(
    new xdr.HashIdPreimageContractId({
      networkId,
      contractIdPreimage: xdr.ContractIdPreimage.contractIdPreimageFromAddress(
        new xdr.ContractIdPreimageFromAddress({
          address: Address.fromString(factoryAddress).toScAddress(),
          salt,
        }),
      ),
    }),
  );

  return StrKey.encodeContract(hash(preimage.toXDR()));
}
