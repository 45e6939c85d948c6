import { ErrorParser } from '../src/errors/parser';
import {
    mapError,
    DeadlineError,
    ExternalCollaboratorError,
    InsufficientLiquidityError,
    NetworkError,
    PairNotFoundError,
    ReentrancyError,
    RpcError,
    SimulationError,
    SlippageExceededError,
    ValidationError,
    ZapSDKError,
    ZeroAmountError,
} from '../src/errors';
import { contractError } from '../src/simulation';

describe('ErrorParser', () => {
    describe('extractErrorCode', () => {
        it('extracts code from standard Soroban error string', () => {
            expect(ErrorParser.extractErrorCode('Error(Contract, #101)')).toBe(101);
            expect(ErrorParser.extractErrorCode('Error(Contract, 101)')).toBe(101);
        });

        it('extracts code from HostError string', () => {
            expect(ErrorParser.extractErrorCode('HostError: Error(Contract, #102)')).toBe(102);
        });

        it('extracts code from error object message', () => {
            expect(ErrorParser.extractErrorCode({ message: 'Error(Contract, #103)' })).toBe(103);
            expect(ErrorParser.extractErrorCode(new Error('Error(Contract, #504)'))).toBe(504);
        });

        it('returns null for unrelated errors', () => {
            expect(ErrorParser.extractErrorCode('Some other error')).toBeNull();
            expect(ErrorParser.extractErrorCode(null)).toBeNull();
        });
    });

    describe('parseContractError', () => {
        it('maps Pair error codes', () => {
            expect(ErrorParser.parseContractError(100)).toBe('Pair already initialized');
            expect(ErrorParser.parseContractError(106)).toBe('Insufficient liquidity in pool');
        });

        it('maps Router error codes', () => {
            expect(ErrorParser.parseContractError(301)).toBe('Invalid path');
            expect(ErrorParser.parseContractError(303)).toBe('Deadline expired');
        });

        it('maps Zap error codes', () => {
            expect(ErrorParser.parseContractError(502)).toBe('Swap bounds violated');
            expect(ErrorParser.parseContractError(507)).toBe('Unsupported input token');
        });

        it('returns null for unknown codes', () => {
            expect(ErrorParser.parseContractError(999)).toBeNull();
            expect(ErrorParser.parseContractError(201)).toBeNull();
        });
    });

    describe('toHumanMessage', () => {
        it('formats recognized contract errors', () => {
            const msg = ErrorParser.toHumanMessage('Error(Contract, #101)');
            expect(msg).toBe('Contract Error (101): Zero address provided');
        });

        it('keeps the code of unrecognized contract errors', () => {
            expect(ErrorParser.toHumanMessage('Error(Contract, #999)')).toBe('Contract Error (999)');
        });

        it('returns raw message for unrecognized errors', () => {
            expect(ErrorParser.toHumanMessage('Standard error')).toBe('Standard error');
            expect(ErrorParser.toHumanMessage(42)).toBe('Unknown error');
        });
    });
});

describe('SDK Error Mapping Integration', () => {
    it('maps Error(Contract, #101) to ValidationError (Zero Address)', () => {
        const err = mapError('Error(Contract, #101)');
        expect(err).toBeInstanceOf(ValidationError);
        expect(err.message).toBe('Zero address provided');
        expect(err.details).toEqual({ contractErrorCode: 101 });
    });

    it('maps Error(Contract, #106) to InsufficientLiquidityError', () => {
        const err = mapError('Error(Contract, #106)');
        expect(err).toBeInstanceOf(InsufficientLiquidityError);
        expect(err.message).toBe('Insufficient liquidity in pool');
    });

    it('maps output floors to SlippageExceededError', () => {
        expect(mapError('Error(Contract, #105)')).toBeInstanceOf(SlippageExceededError);
        expect(mapError('Error(Contract, #302)')).toBeInstanceOf(SlippageExceededError);
        const err = mapError('Error(Contract, #504)');
        expect(err).toBeInstanceOf(SlippageExceededError);
        expect(err.details).toMatchObject({ contractErrorCode: 504, message: 'Slippage exceeded' });
    });

    it('maps pair and router deadlines to DeadlineError', () => {
        expect(mapError('Error(Contract, #111)')).toBeInstanceOf(DeadlineError);
        expect(mapError(contractError(303))).toBeInstanceOf(DeadlineError);
    });

    it('maps zap contract codes to their typed errors', () => {
        expect(mapError('Error(Contract, #500)')).toBeInstanceOf(ZeroAmountError);
        expect(mapError('Error(Contract, #501)')).toBeInstanceOf(PairNotFoundError);
        expect(mapError('Error(Contract, #506)')).toBeInstanceOf(ReentrancyError);
    });

    it('passes SDK errors through unchanged', () => {
        const original = new ExternalCollaboratorError('swap', new Error('boom'));
        expect(mapError(original)).toBe(original);
        expect(original.message).toBe('swap failed: boom');
    });

    it('reads the deadline out of a plain message', () => {
        const err = mapError(new Error('deadline: 1700000000'));
        expect(err).toBeInstanceOf(DeadlineError);
        expect(err.details).toEqual({ deadline: 1700000000 });
    });

    it('classifies transport failures', () => {
        expect(mapError(new Error('connect ECONNRESET'))).toBeInstanceOf(NetworkError);
        expect(mapError(new Error('429 Too Many Requests'))).toBeInstanceOf(RpcError);
        expect(mapError(new Error('Simulation failed: out of budget'))).toBeInstanceOf(SimulationError);
    });

    it('prefers a contract code over the surrounding message', () => {
        const err = mapError(new Error('Simulation failed: HostError: Error(Contract, #302)'));
        expect(err).toBeInstanceOf(SlippageExceededError);
    });

    it('falls back to UNKNOWN_ERROR', () => {
        const err = mapError('Error(Contract, #999)');
        expect(err).toBeInstanceOf(ZapSDKError);
        expect(err.code).toBe('UNKNOWN_ERROR');
        expect(err.message).toBe('Error(Contract, #999)');
    });
});
