import { describeStoreError, type StoreError } from "../store/types";

export const ERROR_MESSAGES = {
  400: "bad request",
  404: "resource not found",
  405: "method not allowed",
  422: "unprocessable",
  500: "internal server error",
} as const;

export type ApiErrorStatus = keyof typeof ERROR_MESSAGES;

export type ErrorEnvelope = {
  success: false;
  error: ApiErrorStatus;
  message: (typeof ERROR_MESSAGES)[ApiErrorStatus];
};

export class ApiError extends Error {
  readonly status: ApiErrorStatus;
  /** What went wrong underneath; logged, never sent to the client. */
  readonly detail?: string;

  constructor(status: ApiErrorStatus, detail?: string, options?: { cause?: unknown }) {
    super(ERROR_MESSAGES[status], options);
    this.name = "ApiError";
    this.status = status;
    this.detail = detail;
  }

  toJSON(): ErrorEnvelope {
    return { success: false, error: this.status, message: ERROR_MESSAGES[this.status] };
  }
}

export const badRequest = (detail?: string) => new ApiError(400, detail);
export const notFound = (detail?: string) => new ApiError(404, detail);
export const methodNotAllowed = (detail?: string) => new ApiError(405, detail);
export const unprocessable = (detail?: string, cause?: unknown) =>
  new ApiError(422, detail, { cause });
export const internalError = (detail?: string, cause?: unknown) =>
  new ApiError(500, detail, { cause });

/** Read endpoints: a missing row is a 404, anything else a 500. */
export function fromStoreError(error: StoreError): ApiError {
  const detail = describeStoreError(error);
  switch (error.kind) {
    case "NotFound":
      return notFound(detail);
    case "ValidationFailed":
      return internalError(detail);
    case "StoreUnavailable":
      return internalError(detail, error.cause);
  }
}

/** Mutating endpoints and the quiz report every failure as 422. */
export function unprocessableFromStoreError(error: StoreError): ApiError {
  return unprocessable(
    describeStoreError(error),
    error.kind === "StoreUnavailable" ? error.cause : undefined
  );
}
