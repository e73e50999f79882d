import { Participant, ParticipantJoin } from './types';
import { ResultLedger } from './ledger';

/**
 * Finds the first participant registered under an identity.
 * Duplicate identities are allowed; the earliest entry wins.
 */
export function findParticipant(participants: Participant[], identity: string): Participant | undefined {
    return participants.find(p => p.identity === identity);
}

export function hasParticipant(participants: Participant[], identity: string): boolean {
    return findParticipant(participants, identity) !== undefined;
}

/**
 * Appends newcomers, each seeded with a copy of the ledger as it stands now.
 */
export function appendParticipants(participants: Participant[], joins: ParticipantJoin[], ledger: ResultLedger): void {
    for (const join of joins) {
        participants.push({
            identity: join.identity,
            balance: join.balance,
            results: ledger.snapshot(),
        });
    }
}

/**
 * Overwrites every participant's local results with a copy of the ledger.
 */
export function broadcastResults(participants: Participant[], ledger: ResultLedger): void {
    for (const participant of participants) {
        participant.results = ledger.snapshot();
    }
}
