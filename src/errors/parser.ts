/**
 * Mappings for pool-manager contract error codes to human-readable messages.
 *
 * The on-chain hook reports failures as `Error(Contract, #XXX)`; the same
 * numbering is used when engine errors are surfaced to RPC callers.
 */

/** Error codes for the truncated oracle (100-119) */
export const ORACLE_ERROR_MAP: Record<number, string> = {
    100: 'Oracle already enabled',
    101: 'Oracle not enabled',
    102: 'Target too old',
    103: 'Observation out of order',
    104: 'Cardinality overflow',
};

/** Error codes for the fee controller (200-219) */
export const FEE_ERROR_MAP: Record<number, string> = {
    200: 'Already initialized',
    201: 'Not initialized',
    202: 'Unauthorized caller',
};

/** Error codes for the policy manager (300-319) */
export const POLICY_ERROR_MAP: Record<number, string> = {
    300: 'Parameter out of range',
    301: 'Min base fee above max base fee',
    302: 'Invalid tick cap',
};

/**
 * Utility for parsing numerical contract error codes and converting
 * them into descriptive labels.
 */
export class ErrorParser {
    /**
     * Resolve a contract error code to a descriptive message.
     *
     * @returns A descriptive message, or null if the code is unrecognized.
     */
    static parseContractError(code: number): string | null {
        if (code >= 100 && code < 120) return ORACLE_ERROR_MAP[code] ?? null;
        if (code >= 200 && code < 220) return FEE_ERROR_MAP[code] ?? null;
        if (code >= 300 && code < 320) return POLICY_ERROR_MAP[code] ?? null;
        return null;
    }

    /**
     * Extract a numerical error code from an RPC error string or object.
     *
     * Recognizes formats like:
     * - "Error(Contract, #101)"
     * - "HostError: Error(Contract, #101)"
     */
    static extractErrorCode(error: unknown): number | null {
        const message = ErrorParser.messageOf(error);
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

        return ErrorParser.messageOf(error) || 'Unknown error';
    }

    private static messageOf(error: unknown): string {
        if (typeof error === 'string') return error;
        if (error instanceof Error) return error.message;
        if (error && typeof error === 'object' && 'message' in error) {
            const { message } = error;
            return typeof message === 'string' ? message : '';
        }
        return '';
    }
}
