import { ErrorParser } from '../src/errors/parser';
import {
    CapFeeError,
    NetworkError,
    NotEnabledError,
    NotInitializedError,
    OutOfOrderError,
    ParameterOutOfRangeError,
    StaleLookbackError,
    UnauthorizedError,
    ValidationError,
    mapError,
} from '../src/errors';

describe('ErrorParser', () => {
    describe('extractErrorCode', () => {
        it('extracts code from standard Soroban error string', () => {
            expect(ErrorParser.extractErrorCode('Error(Contract, #101)')).toBe(101);
            expect(ErrorParser.extractErrorCode('Error(Contract, 101)')).toBe(101);
        });

        it('extracts code from HostError string', () => {
            expect(ErrorParser.extractErrorCode('HostError: Error(Contract, #202)')).toBe(202);
        });

        it('extracts code from error object message', () => {
            expect(ErrorParser.extractErrorCode({ message: 'Error(Contract, #103)' })).toBe(103);
            expect(ErrorParser.extractErrorCode(new Error('Error(Contract, #300)'))).toBe(300);
        });

        it('returns null for unrelated errors', () => {
            expect(ErrorParser.extractErrorCode('Some other error')).toBeNull();
            expect(ErrorParser.extractErrorCode(null)).toBeNull();
            expect(ErrorParser.extractErrorCode({ message: 42 })).toBeNull();
        });
    });

    describe('parseContractError', () => {
        it('maps oracle error codes', () => {
            expect(ErrorParser.parseContractError(100)).toBe('Oracle already enabled');
            expect(ErrorParser.parseContractError(102)).toBe('Target too old');
        });

        it('maps fee controller error codes', () => {
            expect(ErrorParser.parseContractError(202)).toBe('Unauthorized caller');
        });

        it('maps policy error codes', () => {
            expect(ErrorParser.parseContractError(301)).toBe('Min base fee above max base fee');
        });

        it('returns null for unknown codes', () => {
            expect(ErrorParser.parseContractError(105)).toBeNull();
            expect(ErrorParser.parseContractError(999)).toBeNull();
        });
    });

    describe('toHumanMessage', () => {
        it('formats recognized contract errors', () => {
            expect(ErrorParser.toHumanMessage('Error(Contract, #201)')).toBe('Contract Error (201): Not initialized');
        });

        it('formats unrecognized contract codes', () => {
            expect(ErrorParser.toHumanMessage('Error(Contract, #999)')).toBe('Contract Error (999)');
        });

        it('returns raw message for other errors', () => {
            expect(ErrorParser.toHumanMessage('Standard error')).toBe('Standard error');
            expect(ErrorParser.toHumanMessage(undefined)).toBe('Unknown error');
        });
    });
});

describe('Error hierarchy', () => {
    it('keeps instanceof, name and code on subclasses', () => {
        const err = new NotInitializedError('pool-1');
        expect(err).toBeInstanceOf(CapFeeError);
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('NotInitializedError');
        expect(err.code).toBe('NOT_INITIALIZED');
        expect(err.details).toEqual({ pool: 'pool-1' });
    });

    it('stringifies bigint parameter values', () => {
        const err = new ParameterOutOfRangeError('freq', 5n, 'too large');
        expect(err.message).toBe('Parameter freq out of range: too large');
        expect(err.details).toEqual({ parameter: 'freq', value: '5' });
    });

    it('describes stale lookbacks', () => {
        const err = new StaleLookbackError(900, 1000);
        expect(err.code).toBe('TARGET_TOO_OLD');
        expect(err.message).toBe('Lookback target 900 predates oldest observation 1000');
    });
});

describe('mapError', () => {
    it('passes engine errors through unchanged', () => {
        const original = new UnauthorizedError('GABC');
        expect(mapError(original)).toBe(original);
    });

    it('maps contract codes to typed errors', () => {
        expect(mapError('Error(Contract, #101)')).toBeInstanceOf(NotEnabledError);
        expect(mapError('Error(Contract, #102)')).toBeInstanceOf(StaleLookbackError);
        expect(mapError('Error(Contract, #202)')).toBeInstanceOf(UnauthorizedError);
    });

    it('keeps timestamps from details for lookback and ordering codes', () => {
        const stale = mapError({ message: 'Error(Contract, #102)', details: { target: 900, oldest: 1000 } });
        expect(stale).toBeInstanceOf(StaleLookbackError);
        expect(stale.message).toBe('Lookback target 900 predates oldest observation 1000');

        const late = mapError({ message: 'Error(Contract, #103)', details: { timestamp: 5, last: 8 } });
        expect(late).toBeInstanceOf(OutOfOrderError);
        expect(late.message).toBe('Observation timestamp 5 is older than last recorded 8');
    });

    it('uses the contract description when timestamps are missing', () => {
        expect(mapError('Error(Contract, #102)').message).toBe('Target too old');
        expect(mapError('Error(Contract, #103)').message).toBe('Observation out of order');
    });

    it('carries the pool from error details', () => {
        const err = mapError({ message: 'Error(Contract, #201)', details: { pool: 'abc' } });
        expect(err).toBeInstanceOf(NotInitializedError);
        expect(err.details).toEqual({ pool: 'abc' });
    });

    it('uses the contract description for policy codes', () => {
        const err = mapError('HostError: Error(Contract, #301)');
        expect(err).toBeInstanceOf(ParameterOutOfRangeError);
        expect(err.message).toBe('Parameter unknown out of range: Min base fee above max base fee');
    });

    it('maps connectivity failures and rate limits to NetworkError', () => {
        expect(mapError(new Error('connect ECONNRESET 127.0.0.1'))).toBeInstanceOf(NetworkError);
        expect(mapError(new Error('429 Too Many Requests'))).toBeInstanceOf(NetworkError);
        expect(mapError('Rate limit exceeded')).toBeInstanceOf(NetworkError);
    });

    it('maps authorization and validation messages', () => {
        expect(mapError(new Error('caller not authorized'))).toBeInstanceOf(UnauthorizedError);
        expect(mapError(new Error('invalid pool key'))).toBeInstanceOf(ValidationError);
    });

    it('wraps anything else as UNKNOWN_ERROR', () => {
        const err = mapError('boom');
        expect(err.code).toBe('UNKNOWN_ERROR');
        expect(err.message).toBe('boom');
        expect(err.details).toEqual({ originalError: 'boom' });
    });

    it('keeps unknown contract codes readable', () => {
        const err = mapError('Error(Contract, #999)');
        expect(err.code).toBe('UNKNOWN_ERROR');
        expect(err.message).toBe('Contract Error (999)');
    });
});
