import { NextFunction, Response, Request } from 'express';

export const CORS_REJECTED_MESSAGE = 'Not allowed by CORS';

/** Turns an allow-list rejection from the cors middleware into a 403. */
const handleCorsError = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) => {
    if (err.message !== CORS_REJECTED_MESSAGE) {
        next(err);
        return;
    }
    console.warn(`[CORS] Rejected origin ${req.headers.origin ?? 'unknown'} for ${req.method} ${req.originalUrl}`);
    res.status(403).json({
        code: 'NOT_ALLOWED_BY_CORS',
        message: `Access forbidden: origin ${req.headers.origin ?? 'unknown'} is not on the CORS allow-list.`,
    });
};

export default handleCorsError;
