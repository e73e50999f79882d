import { decryptMessage, resultKey } from '../crypto';
import { Session, SubmissionMessage } from './types';

/**
 * Decrypts the oldest pending submission and replaces its content with the result key,
 * so the ledger only ever holds digests.
 * The queue is left as is; the Evaluate transition consumes the head.
 * @returns undefined when nothing is pending.
 */
export function openOldestSubmission(session: Session, privateKeyPem: string): SubmissionMessage | undefined {
    const head = session.pending.peek();
    if (!head) return undefined;
    const { sender, content } = decryptMessage(head, privateKeyPem);
    return { sender, content: resultKey(content) };
}
