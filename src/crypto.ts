import { createHash, createPublicKey, randomBytes } from 'crypto';
import * as forge from 'node-forge';
import { z } from 'zod';
import { CryptoError, EncodingError } from './errors';
import { SubmissionMessage } from './session/types';

// RSAES-PKCS1-v1_5 pads with at least 8 random bytes plus 3 framing bytes.
const PKCS1_V15_OVERHEAD = 11;
const SCHEME = 'RSAES-PKCS1-V1_5';

/**
 * A submission message. Unknown fields are rejected.
 */
export const MessageSchema = z
    .object({
        sender: z.string().min(1),
        content: z.string(),
    })
    .strict();

function describeIssues(error: z.ZodError): string {
    return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function parsePublicKey(pem: string): forge.pki.rsa.PublicKey {
    try {
        return forge.pki.publicKeyFromPem(pem);
    } catch (err) {
        throw new CryptoError('invalid RSA public key', { cause: err });
    }
}

function parsePrivateKey(pem: string): forge.pki.rsa.PrivateKey {
    try {
        return forge.pki.privateKeyFromPem(pem);
    } catch (err) {
        throw new CryptoError('invalid RSA private key', { cause: err });
    }
}

function capacityOf(key: forge.pki.rsa.PublicKey): number {
    return Math.ceil(key.n.bitLength() / 8) - PKCS1_V15_OVERHEAD;
}

/**
 * Throws a CryptoError unless the PEM holds a usable RSA public key.
 */
export function assertPublicKey(publicKeyPem: string): void {
    parsePublicKey(publicKeyPem);
}

/**
 * Derives the SPKI PEM public key that matches a private key.
 * @param privateKeyPem A PKCS#1 or PKCS#8 PEM private key.
 */
export function publicKeyFromPrivate(privateKeyPem: string): string {
    try {
        return createPublicKey(privateKeyPem).export({ type: 'spki', format: 'pem' }).toString();
    } catch (err) {
        throw new CryptoError('invalid RSA private key', { cause: err });
    }
}

/**
 * Encrypts raw bytes for the holder of the matching private key.
 * The scheme is randomized: repeated calls with the same input yield different ciphertexts.
 */
export function encryptBytes(plaintext: Uint8Array, publicKeyPem: string): Uint8Array {
    const key = parsePublicKey(publicKeyPem);
    const capacity = capacityOf(key);
    if (plaintext.length > capacity) {
        throw new CryptoError(`plaintext is ${plaintext.length} bytes, key capacity is ${capacity} bytes`);
    }
    try {
        const encrypted = key.encrypt(Buffer.from(plaintext).toString('binary'), SCHEME);
        return Buffer.from(encrypted, 'binary');
    } catch (err) {
        throw new CryptoError('encryption failed', { cause: err });
    }
}

/**
 * Decrypts bytes produced by {@link encryptBytes}.
 */
export function decryptBytes(ciphertext: Uint8Array, privateKeyPem: string): Uint8Array {
    const key = parsePrivateKey(privateKeyPem);
    try {
        const decrypted = key.decrypt(Buffer.from(ciphertext).toString('binary'), SCHEME);
        return Buffer.from(decrypted, 'binary');
    } catch (err) {
        throw new CryptoError('decryption failed', { cause: err });
    }
}

/**
 * Canonical byte encoding of a message: compact JSON, `sender` then `content`, UTF-8.
 */
export function encodeMessage(message: SubmissionMessage): Uint8Array {
    const parsed = MessageSchema.safeParse(message);
    if (!parsed.success) {
        throw new EncodingError(`invalid message: ${describeIssues(parsed.error)}`);
    }
    const { sender, content } = parsed.data;
    return Buffer.from(JSON.stringify({ sender, content }), 'utf8');
}

export function decodeMessage(bytes: Uint8Array): SubmissionMessage {
    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (err) {
        throw new EncodingError('decrypted payload is not valid JSON', { cause: err });
    }
    const parsed = MessageSchema.safeParse(raw);
    if (!parsed.success) {
        throw new EncodingError(`decrypted payload is not a message: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Encrypts a submission message for the evaluator.
 * @param message The sender identity and the solution content.
 * @param publicKeyPem The evaluator's public key.
 */
export function encryptMessage(message: SubmissionMessage, publicKeyPem: string): Uint8Array {
    return encryptBytes(encodeMessage(message), publicKeyPem);
}

/**
 * Decrypts a submission with the evaluator's private key.
 */
export function decryptMessage(ciphertext: Uint8Array, privateKeyPem: string): SubmissionMessage {
    return decodeMessage(decryptBytes(ciphertext, privateKeyPem));
}

/**
 * Canonical result key: SHA-256 hex digest of the NFC-normalized, trimmed content.
 * Two contents that differ only by surrounding whitespace or Unicode composition share a key.
 */
export function resultKey(content: string): string {
    return createHash('sha256').update(content.normalize('NFC').trim(), 'utf8').digest('hex');
}

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}
