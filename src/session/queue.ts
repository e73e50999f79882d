/**
 * FIFO of ciphertexts waiting for the evaluator.
 * Submissions are consumed strictly in arrival order.
 */
export class PendingQueue {
    private readonly items: Uint8Array[] = [];

    get length(): number {
        return this.items.length;
    }

    push(ciphertext: Uint8Array): number {
        // Copy so a caller reusing its buffer cannot change a queued submission.
        this.items.push(Uint8Array.from(ciphertext));
        return this.items.length;
    }

    /**
     * Returns the oldest submission without removing it.
     */
    peek(): Uint8Array | undefined {
        const head = this.items[0];
        return head === undefined ? undefined : Uint8Array.from(head);
    }

    /**
     * Removes and returns the oldest submission; undefined when empty.
     */
    shift(): Uint8Array | undefined {
        return this.items.shift();
    }
}
