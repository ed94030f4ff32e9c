import { isCelebrateError } from "celebrate";
import cors from "cors";
import Debug from "debug";
import express, { Express, NextFunction, Request, Response } from "express";
import helmet from "helmet";
import morgan from "morgan";

import { ErrorCode, errorCode } from "../errors.js";
import type { UploadService } from "../upload-service.js";
import { makeUploadRouter } from "./routes.js";
import type { ErrorResponse } from "./wire.js";

const debug = Debug("server");

export const statusCodes: Record<ErrorCode, number> = {
  InvalidConfig: 400,
  ValidationError: 400,
  JobNotFound: 404,
  InvalidTransition: 409,
  IntegrityError: 409,
  ChecksumMismatch: 422,
  ChunkUploadFailed: 500,
  TimeoutExceeded: 500,
  CancelledByUser: 500,
  Unknown: 500,
};

// Errors raised by the body parser carry their own status
const clientErrorStatus = (error: Error): number | undefined => {
  if (
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return undefined;
};

const sendError = (
  response: Response,
  status: number,
  body: ErrorResponse
): void => {
  response.status(status).json(body).end();
};

export const createApp = (service: UploadService): Express => {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(helmet());
  app.use(
    morgan("combined", {
      stream: { write: (line: string) => debug(line.trimEnd()) },
    })
  );

  // Health check
  app.get("/", (_request: Request, response: Response) => {
    response.json({});
  });

  app.use("/", makeUploadRouter(service));

  // Send not found status codes
  app.use((_request: Request, response: Response) => {
    response.status(404).end();
  });
  // Send errors as JSON
  app.use(
    (error: Error, _request: Request, response: Response, next: NextFunction) => {
      if (response.headersSent) {
        next(error);
        return;
      }
      if (isCelebrateError(error)) {
        const messages = [...error.details.values()].map(
          (detail) => detail.message
        );
        sendError(response, 400, {
          error: "ValidationError",
          message: [error.message, ...messages].join(": "),
        });
        return;
      }
      const code = errorCode(error);
      const status =
        code === "Unknown" ? clientErrorStatus(error) : statusCodes[code];
      if (status === undefined || status >= 500) {
        debug("error handling request: %O", error);
        sendError(response, status ?? 500, {
          error: code,
          message: "Internal server error",
        });
        return;
      }
      sendError(response, status, {
        error: code === "Unknown" ? "ValidationError" : code,
        message: error.message,
      });
    }
  );
  return app;
};
