import type { NextFunction, Request, RequestHandler, Response } from "express"
import { NotFoundError, processError, sendErrorResponse } from "../utils/errors"

/**
 * Global error handler. Must stay the last middleware registered.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const appError = processError(error)
  const startTime: unknown = res.locals.startTime

  sendErrorResponse(res, appError, req, typeof startTime === "number" ? Date.now() - startTime : undefined)
}

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.originalUrl}`))
}

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next)
  }
}
