import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { withLogContext } from '@webpilot/shared';

declare global {
    namespace Express {
        interface Request {
            id?: string;
        }
    }
}

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Accept or generate an X-Request-ID and run the rest of the request inside its log context
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.get('x-request-id');
    const id = incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : uuidv4();

    req.id = id;
    res.setHeader('X-Request-ID', id);

    withLogContext({ requestId: id }, () => next());
}
