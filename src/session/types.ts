import type { PendingQueue } from './queue';
import type { ResultLedger } from './ledger';

/**
 * Coarse liveness signal for the most recent submission.
 * Per-submission state lives in the pending queue, not here.
 */
export type Stage = 'waiting' | 'submitted' | 'evaluated';

/**
 * A decrypted submission: who sent it and what they claim as a solution.
 */
export type SubmissionMessage = {
  sender: string;
  content: string;
};

/**
 * A participant of a session with its own copy of the accepted results.
 */
export type Participant = {
  identity: string;
  balance: number; // never decreases inside a session
  results: Map<string, string>; // result key -> claiming identity
};

export type ParticipantJoin = {
  identity: string;
  balance: number;
};

/**
 * Payload a session is created from.
 */
export type SessionInit = {
  rewardAmount: number;
  evaluatorPublicKey: string; // PEM
  initialResults: Record<string, string>;
  participants: ParticipantJoin[];
  reactionWindowMs: number;
};

/**
 * The full live state of one session. Owned and mutated only by the state machine.
 */
export type Session = {
  participants: Participant[];
  stage: Stage;
  rewardAmount: number;
  evaluatorPublicKey: string;
  reactionWindowMs: number;
  ledger: ResultLedger;
  pending: PendingQueue;
};

/**
 * Domain actions a participant or the evaluator can send.
 */
export type GameAction =
  | { type: 'submit'; ciphertext: Uint8Array }
  | { type: 'evaluate'; message: SubmissionMessage };

/**
 * Everything the state machine reacts to.
 */
export type SessionEvent =
  | { kind: 'action'; sender: string; action: GameAction }
  | { kind: 'sync'; participants: ParticipantJoin[] };

export type Outcome =
  | { kind: 'queued'; pending: number }
  | { kind: 'accepted'; key: string; sender: string; balance: number }
  | { kind: 'duplicate'; key: string; claimedBy: string }
  | { kind: 'joined'; count: number };

/**
 * The session defines no durable state of its own beyond the live session.
 */
export type SessionCheckpoint = Record<string, never>;

/**
 * JSON-friendly view of a session.
 */
export type SessionSnapshot = {
  stage: Stage;
  rewardAmount: number;
  pending: number;
  results: Record<string, string>;
  participants: { identity: string; balance: number; results: Record<string, string> }[];
};
