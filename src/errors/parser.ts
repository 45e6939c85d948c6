/**
 * Mappings for pool and zap contract error codes to human-readable messages.
 *
 * These codes are defined in the Soroban contracts using #[contracterror].
 */

/** Error codes for Pair contracts (100-119) */
export const PAIR_ERROR_MAP: Record<number, string> = {
  100: 'Pair already initialized',
  101: 'Zero address provided',
  102: 'Identical tokens',
  103: 'Insufficient liquidity minted',
  104: 'Insufficient liquidity burned',
  105: 'Insufficient output amount',
  106: 'Insufficient liquidity in pool',
  107: 'Invalid amount',
  108: 'K invariant violated',
  109: 'Insufficient input amount',
  110: 'Pair locked',
  111: 'Deadline expired',
};

/** Error codes for Router contract (300-319) */
export const ROUTER_ERROR_MAP: Record<number, string> = {
  300: 'Pair not found',
  301: 'Invalid path',
  302: 'Insufficient output amount',
  303: 'Deadline expired',
  304: 'Insufficient liquidity',
  305: 'Insufficient A amount',
  306: 'Insufficient B amount',
};

/** Error codes for Factory contract (400-419) */
export const FACTORY_ERROR_MAP: Record<number, string> = {
  400: 'Factory already initialized',
  401: 'Unauthorized caller',
  402: 'Pair already exists',
  403: 'Zero address provided',
};

/** Error codes for the Zap contract (500-519) */
export const ZAP_ERROR_MAP: Record<number, string> = {
  500: 'Zero amount',
  501: 'Pair not found',
  502: 'Swap bounds violated',
  503: 'Invalid slippage',
  504: 'Slippage exceeded',
  505: 'Unsupported output token',
  506: 'Reentrant call',
  507: 'Unsupported input token',
};

/**
 * Utility for parsing numerical Soroban contract error codes and
 * converting them into descriptive labels.
 */
export class ErrorParser {
  /**
   * Resolve a contract error code to a descriptive message.
   *
   * @param code - The numerical error code (e.g. 101).
   * @returns A descriptive message, or null if the code is unrecognized.
   */
  static parseContractError(code: number): string | null {
    if (code >= 100 && code < 120) return PAIR_ERROR_MAP[code] ?? null;
    if (code >= 300 && code < 320) return ROUTER_ERROR_MAP[code] ?? null;
    if (code >= 400 && code < 420) return FACTORY_ERROR_MAP[code] ?? null;
    if (code >= 500 && code < 520) return ZAP_ERROR_MAP[code] ?? null;
    return null;
  }

  /**
   * Extract a numerical error code from a Soroban RPC error string or object.
   *
   * Recognizes formats like:
   * - "Error(Contract, #101)"
   * - "HostError: Error(Contract, #101)"
   * - { message: "Error(Contract, #101)" }
   */
  static extractErrorCode(error: unknown): number | null {
    const message = messageOf(error);
    if (!message) return null;

    const match = message.match(/Error\(Contract,\s*#?([0-9]+)\)/i);
    if (match) {
      return parseInt(match[1], 10);
    }

    return null;
  }

  /**
   * Convert any error into a human-friendly message, resolving contract codes if present.
   */
  static toHumanMessage(error: unknown): string {
    const code = this.extractErrorCode(error);
    if (code !== null) {
      const description = this.parseContractError(code);
      if (description) {
        return `Contract Error (${code}): ${description}`;
      }
      return `Contract Error (${code})`;
    }

    return messageOf(error) || 'Unknown error';
  }
}

/**
 * Best-effort message of a thrown value.
 */
export function messageOf(error: unknown): string {
  if (typeof error === 'string') return error;
  if (error instanceof Error) return error.message;
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return '';
}
