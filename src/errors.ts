/**
 * Error taxonomy for session transitions and the crypto codec.
 * Every error aborts the current action and is surfaced to the caller; nothing is retried.
 */

export type SessionErrorCode = 'UnknownParticipant' | 'BalanceOverflow' | 'CryptoError' | 'EncodingError' | 'DecodeError';

export abstract class SessionError extends Error {
    abstract readonly code: SessionErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The sender of an action is not a registered participant of the session.
 */
export class UnknownParticipantError extends SessionError {
    readonly code = 'UnknownParticipant';

    constructor(readonly identity: string) {
        super(`participant not found: ${identity}`);
    }
}

/**
 * Crediting the reward would take a balance past the largest exactly representable integer.
 */
export class BalanceOverflowError extends SessionError {
    readonly code = 'BalanceOverflow';

    constructor(
        readonly identity: string,
        readonly balance: number,
    ) {
        super(`balance of ${identity} cannot take another reward`);
    }
}

/**
 * Key parsing, encryption or decryption failed.
 */
export class CryptoError extends SessionError {
    readonly code = 'CryptoError';
}

/**
 * A structured message could not be serialized, or decrypted bytes did not decode to one.
 */
export class EncodingError extends SessionError {
    readonly code = 'EncodingError';
}

/**
 * A wire payload was malformed. Raised before any state is touched.
 */
export class DecodeError extends SessionError {
    readonly code = 'DecodeError';

    constructor(message: string, readonly issues: string[] = []) {
        super(message);
    }
}
