import type { ErrorRequestHandler, RequestHandler } from "express";
import {
  ApiError,
  badRequest,
  internalError,
  methodNotAllowed,
  notFound,
} from "../utils/httpErrors";

// body-parser failures carry `type: "entity.parse.failed"` and friends
function isBodyParserError(err: unknown): err is Error & { type: string } {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    /^(entity|encoding|charset|request)\./.test(err.type)
  );
}

function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;
  if (isBodyParserError(err)) return badRequest(`${err.type}: ${err.message}`);
  return internalError(err instanceof Error ? err.message : String(err), err);
}

/** Terminal handler for paths no router matched. */
export const unknownRoute: RequestHandler = (req, _res, next) => {
  next(notFound(`no route for ${req.method} ${req.path}`));
};

/** Chain with `.all()` on a route so unsupported verbs answer 405, not 404. */
export const rejectMethod: RequestHandler = (req, _res, next) => {
  next(methodNotAllowed(`${req.method} not supported on ${req.baseUrl}${req.path}`));
};

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) return next(err);

  const apiError = toApiError(err);
  if (apiError.status >= 500 || apiError.cause !== undefined) {
    console.error("[ERR]", `${req.method} ${req.originalUrl}`, apiError.detail ?? "", apiError.cause ?? "");
  }
  res.status(apiError.status).json(apiError.toJSON());
};
