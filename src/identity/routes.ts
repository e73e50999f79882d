import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { IdentityStore } from './state';
import { cryptoRandomId } from '../crypto';
import { log } from '../logger';

const RegisterSchema = z.object({
    identity: z.string().trim().min(1),
});

export function createIdentityRoutes(identities: IdentityStore): Router {
    const router = Router();

    /**
     * @route POST /identity/register
     * Registers an identity and returns its secret key. The key is only ever sent here.
     */
    router.post('/register', (req: Request, res: Response) => {
        const parsed = RegisterSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'identity is required and must be a string', code: 'DecodeError' });
            return;
        }
        const name = parsed.data.identity;
        if (identities.exists(name)) {
            res.status(409).json({ error: 'identity already registered' });
            return;
        }

        const key = `sk_` + cryptoRandomId();
        identities.register(name, key);
        log('INFO', 'identity registered', { participant: name });

        res.status(201).json({ identity: name, key });
    });

    /**
     * @route GET /identity/list
     * Lists registered identities (never their keys).
     */
    router.get('/list', (_req: Request, res: Response) => {
        res.status(200).json({ identities: identities.list() });
    });

    return router;
}
