import { CustomError } from "./error.js";

export const enum Http {
  OK = 200,
  Created = 201,
  PartialContent = 206,
  BadRequest = 400,
  NotFound = 404,
  RequestTimeout = 408,
  Conflict = 409,
  PayloadTooLarge = 413,
  UnprocessableEntity = 422,
  TooManyRequests = 429,
  InternalServerError = 500,
  BadGateway = 502,
  ServiceUnavailable = 503,
  GatewayTimeout = 504,
  WebServerIsDown = 521,
  ConnectionTimedOut = 522,
  ATimeoutOccurred = 524,
}
// Status codes after which a request is sent again
export const retryCodes: readonly number[] = [
  Http.RequestTimeout,
  Http.TooManyRequests,
  Http.InternalServerError,
  Http.BadGateway,
  Http.ServiceUnavailable,
  Http.GatewayTimeout,
  Http.WebServerIsDown,
  Http.ConnectionTimedOut,
  Http.ATimeoutOccurred,
];

export const isRetryableStatus = (statusCode: number): boolean =>
  retryCodes.includes(statusCode);

// A response that sending the same request again will not fix
export class InvalidResponseError extends CustomError {}
