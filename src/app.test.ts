import { generateKeyPairSync } from 'crypto';
import { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { AppContext, createApp } from './app';
import { encryptMessage, publicKeyFromPrivate, resultKey } from './crypto';

const EVALUATOR_TOKEN = 'test-evaluator-token';

type Reply = { status: number; body: unknown };

function stringField(body: unknown, name: string): string {
    if (typeof body === 'object' && body !== null && name in body) {
        const value: unknown = Reflect.get(body, name);
        if (typeof value === 'string') return value;
    }
    throw new Error(`response has no string field ${name}: ${JSON.stringify(body)}`);
}

describe('HTTP surface', () => {
    let ctx: AppContext;
    let server: Server;
    let baseUrl: string;
    let evaluatorPublicKey: string;

    async function call(method: 'GET' | 'POST', path: string, body?: unknown, token?: string): Promise<Reply> {
        const headers: Record<string, string> = { 'content-type': 'application/json' };
        if (token) headers.authorization = `Bearer ${token}`;
        const res = await fetch(`${baseUrl}${path}`, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body),
        });
        return { status: res.status, body: await res.json() };
    }

    async function register(identity: string): Promise<string> {
        const reply = await call('POST', '/identity/register', { identity });
        expect(reply.status).toBe(201);
        return stringField(reply.body, 'key');
    }

    function seal(sender: string, content: string): string {
        return Buffer.from(encryptMessage({ sender, content }, evaluatorPublicKey)).toString('base64');
    }

    beforeAll(async () => {
        const { privateKey } = generateKeyPairSync('rsa', {
            modulusLength: 2048,
            publicKeyEncoding: { type: 'spki', format: 'pem' },
            privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        });
        evaluatorPublicKey = publicKeyFromPrivate(privateKey);
        ctx = createApp({
            port: 0,
            evaluatorPrivateKey: privateKey,
            evaluatorPublicKey,
            evaluatorToken: EVALUATOR_TOKEN,
            reactionWindowMs: 30_000,
            logLevel: 'ERROR',
        });
        server = await new Promise<Server>(resolve => {
            const listening = ctx.app.listen(0, () => resolve(listening));
        });
        const address = server.address();
        if (typeof address !== 'object' || address === null) throw new Error('server has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        ctx.sessions.dispose();
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('answers the health check', async () => {
        expect(await call('GET', '/health')).toEqual({ status: 200, body: { ok: true } });
    });

    it('refuses to register an identity twice', async () => {
        await register('zed');
        const again = await call('POST', '/identity/register', { identity: 'zed' });
        expect(again.status).toBe(409);
        const listed = await call('GET', '/identity/list');
        expect(listed.body).toMatchObject({ identities: expect.arrayContaining(['zed']) });
    });

    it('requires the evaluator token to create a session', async () => {
        expect((await call('POST', '/session/create', { rewardAmount: 1 })).status).toBe(401);
        expect((await call('POST', '/session/create', { rewardAmount: 1 }, 'sk_wrong')).status).toBe(403);
    });

    it('rejects a malformed init payload', async () => {
        const reply = await call('POST', '/session/create', { rewardAmount: -3 }, EVALUATOR_TOKEN);
        expect(reply.status).toBe(400);
        expect(reply.body).toMatchObject({ code: 'DecodeError' });
    });

    it('answers 404 for an unknown session', async () => {
        expect((await call('GET', '/session/nope/state')).status).toBe(404);
    });

    it('runs a session from submission to duplicate rejection', async () => {
        const aliceKey = await register('alice');
        const bobKey = await register('bob');
        const malloryKey = await register('mallory');

        const created = await call(
            'POST',
            '/session/create',
            { rewardAmount: 1, participants: [{ identity: 'alice', balance: 0 }] },
            EVALUATOR_TOKEN,
        );
        expect(created.status).toBe(200);
        const sessionId = stringField(created.body, 'sessionId');
        expect(stringField(created.body, 'evaluatorPublicKey')).toBe(evaluatorPublicKey);

        const published = await call('GET', `/session/${sessionId}/public-key`);
        expect(published.body).toEqual({ evaluatorPublicKey });

        const joined = await call('POST', `/session/${sessionId}/join`, { participants: [{ identity: 'bob' }] }, EVALUATOR_TOKEN);
        expect(joined).toEqual({ status: 200, body: { outcome: { kind: 'joined', count: 1 }, participants: 2 } });

        // alice submits and the server-side evaluator commits it
        const submitted = await call('POST', `/session/${sessionId}/submit`, { ciphertext: seal('alice', 'Solution10') }, aliceKey);
        expect(submitted).toEqual({ status: 200, body: { outcome: { kind: 'queued', pending: 1 }, stage: 'submitted' } });

        const key = resultKey('Solution10');
        const accepted = await call('POST', `/session/${sessionId}/evaluate`, {}, EVALUATOR_TOKEN);
        expect(accepted).toEqual({
            status: 200,
            body: { outcome: { kind: 'accepted', key, sender: 'alice', balance: 1 }, stage: 'submitted' },
        });

        const state = await call('GET', `/session/${sessionId}/state`);
        expect(state.body).toMatchObject({
            sessionId,
            stage: 'submitted',
            pending: 0,
            results: { [key]: 'alice' },
            participants: [
                { identity: 'alice', balance: 1, results: { [key]: 'alice' } },
                { identity: 'bob', balance: 0, results: { [key]: 'alice' } },
            ],
            reactionWindows: [{ identity: 'alice' }],
        });

        // bob submits the same solution
        await call('POST', `/session/${sessionId}/submit`, { ciphertext: seal('bob', 'Solution10') }, bobKey);
        const duplicate = await call('POST', `/session/${sessionId}/evaluate`, {}, EVALUATOR_TOKEN);
        expect(duplicate).toEqual({
            status: 200,
            body: { outcome: { kind: 'duplicate', key, claimedBy: 'alice' }, stage: 'waiting' },
        });

        const empty = await call('POST', `/session/${sessionId}/evaluate`, {}, EVALUATOR_TOKEN);
        expect(empty.status).toBe(409);

        // mallory holds a key but is not part of this session
        const outsider = await call('POST', `/session/${sessionId}/submit`, { ciphertext: seal('mallory', 'y') }, malloryKey);
        expect(outsider.status).toBe(404);
        expect(outsider.body).toMatchObject({ code: 'UnknownParticipant' });

        expect(await call('GET', `/session/${sessionId}/checkpoint`)).toEqual({ status: 200, body: {} });
    });

    it('commits an evaluator-supplied message as is', async () => {
        const created = await call(
            'POST',
            '/session/create',
            { rewardAmount: 5, participants: [{ identity: 'carol', balance: 2 }] },
            EVALUATOR_TOKEN,
        );
        const sessionId = stringField(created.body, 'sessionId');

        const reply = await call(
            'POST',
            `/session/${sessionId}/evaluate`,
            { message: { sender: 'carol', content: 'offline answer' } },
            EVALUATOR_TOKEN,
        );
        expect(reply.body).toEqual({
            outcome: { kind: 'accepted', key: 'offline answer', sender: 'carol', balance: 7 },
            stage: 'waiting',
        });

        const unknown = await call(
            'POST',
            `/session/${sessionId}/evaluate`,
            { message: { sender: 'nobody', content: 'other' } },
            EVALUATOR_TOKEN,
        );
        expect(unknown.status).toBe(404);

        const malformed = await call('POST', `/session/${sessionId}/evaluate`, { message: { content: 'x' } }, EVALUATOR_TOKEN);
        expect(malformed.status).toBe(400);
        expect(malformed.body).toMatchObject({ code: 'DecodeError' });
    });

    it('needs explicit messages for a session sealed to another evaluator key', async () => {
        const erinKey = await register('erin');
        const { privateKey: foreignPrivate } = generateKeyPairSync('rsa', {
            modulusLength: 2048,
            publicKeyEncoding: { type: 'spki', format: 'pem' },
            privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
        });
        const foreignPublic = publicKeyFromPrivate(foreignPrivate);
        const created = await call(
            'POST',
            '/session/create',
            { rewardAmount: 1, evaluatorPublicKey: foreignPublic, participants: [{ identity: 'erin', balance: 0 }] },
            EVALUATOR_TOKEN,
        );
        expect(created.status).toBe(200);
        const sessionId = stringField(created.body, 'sessionId');
        expect(stringField(created.body, 'evaluatorPublicKey')).toBe(foreignPublic);

        const ciphertext = Buffer.from(encryptMessage({ sender: 'erin', content: 'e' }, foreignPublic)).toString('base64');
        await call('POST', `/session/${sessionId}/submit`, { ciphertext }, erinKey);

        const refused = await call('POST', `/session/${sessionId}/evaluate`, {}, EVALUATOR_TOKEN);
        expect(refused).toEqual({
            status: 409,
            body: { error: 'session is sealed for another evaluator key; supply the decrypted message' },
        });

        const committed = await call(
            'POST',
            `/session/${sessionId}/evaluate`,
            { message: { sender: 'erin', content: 'digest-e' } },
            EVALUATOR_TOKEN,
        );
        expect(committed.body).toEqual({
            outcome: { kind: 'accepted', key: 'digest-e', sender: 'erin', balance: 1 },
            stage: 'submitted',
        });
        const state = await call('GET', `/session/${sessionId}/state`);
        expect(state.body).toMatchObject({ pending: 0, results: { 'digest-e': 'erin' } });
    });

    it('reports a balance that cannot take another reward', async () => {
        const created = await call(
            'POST',
            '/session/create',
            { rewardAmount: 1, participants: [{ identity: 'frank', balance: Number.MAX_SAFE_INTEGER }] },
            EVALUATOR_TOKEN,
        );
        const sessionId = stringField(created.body, 'sessionId');

        const reply = await call(
            'POST',
            `/session/${sessionId}/evaluate`,
            { message: { sender: 'frank', content: 'f' } },
            EVALUATOR_TOKEN,
        );
        expect(reply.status).toBe(422);
        expect(reply.body).toMatchObject({ code: 'BalanceOverflow' });
        const state = await call('GET', `/session/${sessionId}/state`);
        expect(state.body).toMatchObject({ results: {}, participants: [{ identity: 'frank', balance: Number.MAX_SAFE_INTEGER }] });
    });

    it('rejects submissions without a valid key or with a bad ciphertext', async () => {
        const daveKey = await register('dave');
        const created = await call(
            'POST',
            '/session/create',
            { rewardAmount: 1, participants: [{ identity: 'dave', balance: 0 }] },
            EVALUATOR_TOKEN,
        );
        const sessionId = stringField(created.body, 'sessionId');

        expect((await call('POST', `/session/${sessionId}/submit`, { ciphertext: 'AQID' })).status).toBe(401);
        expect((await call('POST', `/session/${sessionId}/submit`, { ciphertext: 'AQID' }, 'sk_unknown')).status).toBe(403);

        const bad = await call('POST', `/session/${sessionId}/submit`, { ciphertext: '***' }, daveKey);
        expect(bad.status).toBe(400);

        // the server cannot read a ciphertext that is not RSA output
        await call('POST', `/session/${sessionId}/submit`, { ciphertext: 'AQID' }, daveKey);
        const unreadable = await call('POST', `/session/${sessionId}/evaluate`, {}, EVALUATOR_TOKEN);
        expect(unreadable.status).toBe(422);
        expect(unreadable.body).toMatchObject({ code: 'CryptoError' });
    });
});
