import { z } from 'zod';
import { MessageSchema } from '../crypto';
import { DecodeError } from '../errors';
import { DEFAULT_REACTION_WINDOW_MS } from './machine';
import { MAX_TIMER_DELAY_MS } from './timeout';
import { GameAction, ParticipantJoin, SessionInit } from './types';

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const AmountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const ParticipantJoinSchema = z.object({
    identity: z.string().trim().min(1),
    balance: AmountSchema.default(0),
});

export const SessionInitSchema = z.object({
    rewardAmount: AmountSchema,
    evaluatorPublicKey: z.string().min(1),
    initialResults: z.record(z.string(), z.string().min(1)).default({}),
    participants: z.array(ParticipantJoinSchema).default([]),
    reactionWindowMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_REACTION_WINDOW_MS),
});

export const JoinSchema = z.object({
    participants: z.array(ParticipantJoinSchema).min(1),
});

export const GameActionSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('submit'),
        ciphertext: z.string().min(1).regex(BASE64, 'ciphertext must be base64'),
    }),
    z.object({
        type: z.literal('evaluate'),
        message: MessageSchema,
    }),
]);

function parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new DecodeError(`malformed ${what}`, issues);
    }
    return result.data;
}

/**
 * Decodes a session init payload. The public key is only checked for presence here.
 */
export function decodeInit(raw: unknown): SessionInit {
    return parse(SessionInitSchema, raw, 'session init payload');
}

export function decodeJoin(raw: unknown): ParticipantJoin[] {
    return parse(JoinSchema, raw, 'join payload').participants;
}

/**
 * Decodes a tagged domain action. Submit ciphertexts travel as base64.
 */
export function decodeAction(raw: unknown): GameAction {
    const action = parse(GameActionSchema, raw, 'action');
    switch (action.type) {
        case 'submit':
            return { type: 'submit', ciphertext: Buffer.from(action.ciphertext, 'base64') };
        case 'evaluate':
            return { type: 'evaluate', message: action.message };
    }
}

