import { Request, Response, NextFunction, RequestHandler } from "express";

// Forwards rejected handler promises to the error chain.
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
    return (req, res, next) => {
        void Promise.resolve(fn(req, res, next)).catch(next);
    };
};
