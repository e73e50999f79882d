import { Request } from 'express';

/**
 * Extracts the token of a `Bearer` authorization header.
 * @returns undefined when the header is missing or uses another scheme.
 */
export function bearerToken(req: Request): string | undefined {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) return undefined;
    const token = authHeader.slice('Bearer '.length).trim();
    return token || undefined;
}
