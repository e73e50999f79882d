import { Router, Request, Response } from 'express';
import { bearerToken } from '../auth';
import { Config } from '../config';
import { cryptoRandomId } from '../crypto';
import { DecodeError, SessionError, SessionErrorCode } from '../errors';
import { IdentityStore } from '../identity/state';
import { log, LogMeta } from '../logger';
import { decodeAction, decodeInit, decodeJoin } from './codec';
import { openOldestSubmission } from './evaluator';
import { handleEvent, initSession, intoCheckpoint, snapshotSession } from './machine';
import { SessionRecord, SessionStore } from './state';
import { TimerTimeoutPolicy } from './timeout';
import { GameAction } from './types';

/**
 * Identity recorded as the sender of evaluate actions issued through this server.
 */
export const EVALUATOR_IDENTITY = 'evaluator';

const STATUS_BY_CODE: Record<SessionErrorCode, number> = {
    DecodeError: 400,
    UnknownParticipant: 404,
    BalanceOverflow: 422,
    EncodingError: 422,
    CryptoError: 422,
};

export type SessionRouteDeps = {
    sessions: SessionStore;
    identities: IdentityStore;
    config: Pick<Config, 'evaluatorPrivateKey' | 'evaluatorPublicKey' | 'evaluatorToken' | 'reactionWindowMs'>;
};

function sendError(res: Response, err: unknown, meta: LogMeta): void {
    if (err instanceof SessionError) {
        log('WARN', err.message, { ...meta, code: err.code });
        const body: { error: string; code: SessionErrorCode; issues?: string[] } = { error: err.message, code: err.code };
        if (err instanceof DecodeError) body.issues = err.issues;
        res.status(STATUS_BY_CODE[err.code]).json(body);
        return;
    }
    log('ERROR', 'unexpected failure', { ...meta, error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: 'internal error' });
}

function bodyOf(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}

export function createSessionRoutes({ sessions, identities, config }: SessionRouteDeps): Router {
    const router = Router();

    function requireEvaluator(req: Request, res: Response): boolean {
        const token = bearerToken(req);
        if (!token) {
            res.status(401).json({ error: 'Authorization header with Bearer token is required' });
            return false;
        }
        if (token !== config.evaluatorToken) {
            res.status(403).json({ error: 'Evaluator privileges required' });
            return false;
        }
        return true;
    }

    function findSession(req: Request, res: Response): SessionRecord | undefined {
        const record = sessions.get(req.params.id);
        if (!record) res.status(404).json({ error: 'session not found' });
        return record;
    }

    /**
     * @route POST /session/create
     * Creates a session. The evaluator public key and reaction window default to the server's own.
     * A session created for another key can only be evaluated with explicit messages.
     */
    router.post('/create', (req: Request, res: Response) => {
        if (!requireEvaluator(req, res)) return;
        try {
            const init = decodeInit({
                evaluatorPublicKey: config.evaluatorPublicKey,
                reactionWindowMs: config.reactionWindowMs,
                ...bodyOf(req),
            });
            const session = initSession(init);
            const id = cryptoRandomId();
            const timeouts = new TimerTimeoutPolicy(identity => {
                log('INFO', 'reaction window elapsed', { sessionId: id, participant: identity });
            });
            sessions.set({ id, createdAt: Date.now(), session, timeouts });
            log('INFO', 'session created', {
                sessionId: id,
                participants: session.participants.length,
                results: session.ledger.size,
            });
            res.status(200).json({
                sessionId: id,
                rewardAmount: session.rewardAmount,
                evaluatorPublicKey: session.evaluatorPublicKey,
            });
        } catch (err) {
            sendError(res, err, {});
        }
    });

    /**
     * @route GET /session/:id/public-key
     * The key participants encrypt their submissions for.
     */
    router.get('/:id/public-key', (req: Request, res: Response) => {
        const record = findSession(req, res);
        if (!record) return;
        res.status(200).json({ evaluatorPublicKey: record.session.evaluatorPublicKey });
    });

    /**
     * @route POST /session/:id/join
     * Admits new participants. Each receives every result accepted so far.
     */
    router.post('/:id/join', (req: Request, res: Response) => {
        if (!requireEvaluator(req, res)) return;
        const record = findSession(req, res);
        if (!record) return;
        try {
            const joins = decodeJoin(req.body);
            const outcome = handleEvent(record.session, { kind: 'sync', participants: joins }, record.timeouts);
            log('INFO', 'participants joined', { sessionId: record.id, joined: joins.map(j => j.identity) });
            res.status(200).json({ outcome, participants: record.session.participants.length });
        } catch (err) {
            sendError(res, err, { sessionId: record.id });
        }
    });

    /**
     * @route POST /session/:id/submit
     * Queues an encrypted submission. The sender is the identity owning the Bearer key.
     * Body: { ciphertext } (base64)
     */
    router.post('/:id/submit', (req: Request, res: Response) => {
        const key = bearerToken(req);
        if (!key) {
            res.status(401).json({ error: 'Authorization header with Bearer token is required' });
            return;
        }
        const sender = identities.identityByKey(key);
        if (!sender) {
            res.status(403).json({ error: 'Invalid authentication key' });
            return;
        }
        const record = findSession(req, res);
        if (!record) return;
        try {
            const action = decodeAction({ type: 'submit', ciphertext: bodyOf(req).ciphertext });
            const outcome = handleEvent(record.session, { kind: 'action', sender, action }, record.timeouts);
            log('INFO', 'submission queued', { sessionId: record.id, participant: sender });
            res.status(200).json({ outcome, stage: record.session.stage });
        } catch (err) {
            sendError(res, err, { sessionId: record.id, participant: sender });
        }
    });

    /**
     * @route POST /session/:id/evaluate
     * Commits the oldest pending submission. Without a body message the server decrypts the
     * queue head with its own key and commits the digest of the content; with one, the supplied
     * message is committed as is. Sessions created for another evaluator key need the message.
     * Body: { message?: { sender, content } }
     */
    router.post('/:id/evaluate', (req: Request, res: Response) => {
        if (!requireEvaluator(req, res)) return;
        const record = findSession(req, res);
        if (!record) return;
        try {
            const supplied = bodyOf(req).message;
            let action: GameAction;
            if (supplied !== undefined) {
                action = decodeAction({ type: 'evaluate', message: supplied });
            } else {
                if (record.session.evaluatorPublicKey !== config.evaluatorPublicKey) {
                    res.status(409).json({
                        error: 'session is sealed for another evaluator key; supply the decrypted message',
                    });
                    return;
                }
                const message = openOldestSubmission(record.session, config.evaluatorPrivateKey);
                if (!message) {
                    res.status(409).json({ error: 'no pending submissions' });
                    return;
                }
                action = { type: 'evaluate', message };
            }
            const outcome = handleEvent(record.session, { kind: 'action', sender: EVALUATOR_IDENTITY, action }, record.timeouts);
            if (outcome.kind === 'accepted') {
                log('INFO', 'result accepted', { sessionId: record.id, participant: outcome.sender, key: outcome.key });
            } else if (outcome.kind === 'duplicate') {
                log('INFO', 'duplicate result ignored', { sessionId: record.id, key: outcome.key });
            }
            res.status(200).json({ outcome, stage: record.session.stage });
        } catch (err) {
            sendError(res, err, { sessionId: record.id });
        }
    });

    /**
     * @route GET /session/:id/state
     * Stage, balances, the result ledger, every participant's view and the open reaction windows.
     */
    router.get('/:id/state', (req: Request, res: Response) => {
        const record = findSession(req, res);
        if (!record) return;
        res.status(200).json({
            sessionId: record.id,
            ...snapshotSession(record.session),
            reactionWindows: record.timeouts.armed(),
        });
    });

    /**
     * @route GET /session/:id/checkpoint
     */
    router.get('/:id/checkpoint', (req: Request, res: Response) => {
        const record = findSession(req, res);
        if (!record) return;
        res.status(200).json(intoCheckpoint(record.session));
    });

    return router;
}
