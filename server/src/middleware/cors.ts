import cors from "cors";
import type { RequestHandler } from "express";

export const ALLOWED_HEADERS = ["Content-Type", "Authorization"];
export const ALLOWED_METHODS = ["GET", "PUT", "POST", "DELETE", "OPTIONS"];

/** Any origin; the allow-headers/methods pair goes on every response, not only preflights. */
export function corsMiddleware(): RequestHandler[] {
  const allowHeaders: RequestHandler = (_req, res, next) => {
    res.setHeader("Access-Control-Allow-Headers", ALLOWED_HEADERS.join(","));
    res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS.join(","));
    next();
  };

  return [
    allowHeaders,
    cors({
      origin: "*",
      allowedHeaders: ALLOWED_HEADERS,
      methods: ALLOWED_METHODS,
    }),
  ];
}
