import { assertPublicKey } from '../crypto';
import { BalanceOverflowError, UnknownParticipantError } from '../errors';
import { log } from '../logger';
import { ResultLedger } from './ledger';
import { PendingQueue } from './queue';
import { appendParticipants, broadcastResults, findParticipant, hasParticipant } from './registry';
import { MAX_TIMER_DELAY_MS, TimeoutPolicy } from './timeout';
import {
    GameAction,
    Outcome,
    ParticipantJoin,
    Session,
    SessionCheckpoint,
    SessionEvent,
    SessionInit,
    SessionSnapshot,
    SubmissionMessage,
} from './types';

/**
 * Default length of the reaction window armed after an accepted result.
 */
export const DEFAULT_REACTION_WINDOW_MS = 30_000;

/**
 * Builds a session from its init payload. Initial participants start with a copy of the initial results.
 * @throws CryptoError if the evaluator public key is not a usable RSA key.
 * @throws RangeError if the reaction window is longer than a timer can wait.
 */
export function initSession(init: SessionInit): Session {
    assertPublicKey(init.evaluatorPublicKey);
    if (init.reactionWindowMs > MAX_TIMER_DELAY_MS) {
        throw new RangeError(`reaction window of ${init.reactionWindowMs} ms exceeds ${MAX_TIMER_DELAY_MS} ms`);
    }
    const ledger = new ResultLedger(init.initialResults);
    const participants = init.participants.map(p => ({
        identity: p.identity,
        balance: p.balance,
        results: ledger.snapshot(),
    }));
    return {
        participants,
        stage: 'waiting',
        rewardAmount: init.rewardAmount,
        evaluatorPublicKey: init.evaluatorPublicKey,
        reactionWindowMs: init.reactionWindowMs,
        ledger,
        pending: new PendingQueue(),
    };
}

/**
 * Applies one event to the session. Runs to completion; on error nothing has been mutated.
 * @param timeouts Receives the reaction window armed by an accepted evaluation.
 */
export function handleEvent(session: Session, event: SessionEvent, timeouts: TimeoutPolicy): Outcome {
    switch (event.kind) {
        case 'action':
            return handleAction(session, event.sender, event.action, timeouts);
        case 'sync':
            return syncParticipants(session, event.participants);
    }
}

function handleAction(session: Session, sender: string, action: GameAction, timeouts: TimeoutPolicy): Outcome {
    switch (action.type) {
        case 'submit':
            return submit(session, sender, action.ciphertext);
        case 'evaluate':
            return evaluate(session, action.message, timeouts);
    }
}

/**
 * Queues a ciphertext. Accepted in any stage; the payload is never inspected.
 */
export function submit(session: Session, sender: string, ciphertext: Uint8Array): Outcome {
    if (!hasParticipant(session.participants, sender)) {
        throw new UnknownParticipantError(sender);
    }
    const pending = session.pending.push(ciphertext);
    session.stage = 'submitted';
    return { kind: 'queued', pending };
}

/**
 * Commits a decrypted submission. The caller is trusted to be the evaluator.
 * `message.content` is the result key, taken verbatim.
 *
 * The queue head is consumed without checking that it decrypts to `message`; an evaluator
 * that supplies a payload for a different submission credits whoever `message.sender` names.
 */
export function evaluate(session: Session, message: SubmissionMessage, timeouts: TimeoutPolicy): Outcome {
    const key = message.content;

    const claimedBy = session.ledger.claimant(key);
    if (claimedBy !== undefined) {
        session.pending.shift();
        session.stage = 'waiting';
        log('DEBUG', 'submitted result already claimed', { participant: message.sender, key, claimedBy });
        return { kind: 'duplicate', key, claimedBy };
    }

    const participant = findParticipant(session.participants, message.sender);
    if (!participant) {
        throw new UnknownParticipantError(message.sender);
    }
    if (!Number.isSafeInteger(participant.balance + session.rewardAmount)) {
        throw new BalanceOverflowError(participant.identity, participant.balance);
    }

    session.pending.shift();
    participant.balance += session.rewardAmount;
    session.ledger.insert(key, participant.identity);

    timeouts.arm(participant.identity, session.reactionWindowMs);

    broadcastResults(session.participants, session.ledger);

    return { kind: 'accepted', key, sender: participant.identity, balance: participant.balance };
}

/**
 * Admits newcomers. Each sees every result accepted so far.
 */
export function syncParticipants(session: Session, joins: ParticipantJoin[]): Outcome {
    appendParticipants(session.participants, joins, session.ledger);
    return { kind: 'joined', count: joins.length };
}

export function intoCheckpoint(_session: Session): SessionCheckpoint {
    return {};
}

export function snapshotSession(session: Session): SessionSnapshot {
    return {
        stage: session.stage,
        rewardAmount: session.rewardAmount,
        pending: session.pending.length,
        results: session.ledger.toJSON(),
        participants: session.participants.map(p => ({
            identity: p.identity,
            balance: p.balance,
            results: Object.fromEntries(p.results),
        })),
    };
}
