import { celebrate, Joi, Segments } from "celebrate";
import express, { NextFunction, Request, Response, Router } from "express";

import { ValidationError } from "../errors.js";
import type { UploadService } from "../upload-service.js";
import {
  checksumHeader,
  InitiateBody,
  initiateBodySchema,
  StateResponse,
  toCommitResponse,
  toInitiateResponse,
  toLimitsResponse,
  toResumeResponse,
  toStatusResponse,
  toUploadJobRequest,
} from "./wire.js";

type Handler = (request: Request, response: Response) => Promise<void>;

// Hands rejections to the error handler
const handle =
  (handler: Handler) =>
  (request: Request, response: Response, next: NextFunction): void => {
    handler(request, response).catch(next);
  };

const param = (request: Request, name: string): string => {
  const value = request.params[name];
  if (value === undefined) {
    throw new ValidationError(`Missing parameter "${name}"`);
  }
  return value;
};

const jobParams = celebrate({
  [Segments.PARAMS]: Joi.object({
    jobId: Joi.string().required(),
  }),
});
const chunkParams = celebrate({
  [Segments.PARAMS]: Joi.object({
    jobId: Joi.string().required(),
    index: Joi.string()
      .pattern(/^\d+$/)
      .required(),
  }),
});

export const makeUploadRouter = (service: UploadService): Router => {
  const router = Router();

  router.post(
    "/upload/initiate",
    celebrate({ [Segments.BODY]: initiateBodySchema }),
    handle(async (request, response) => {
      const body: InitiateBody = request.body;
      const result = await service.initiate(toUploadJobRequest(body));
      response.status(201).json(toInitiateResponse(result));
    })
  );

  router.put(
    "/upload/chunk/:jobId/:index",
    chunkParams,
    express.raw({ type: () => true, limit: service.limits().maxChunkSize }),
    handle(async (request, response) => {
      const jobId = param(request, "jobId");
      const index = Number(param(request, "index"));
      const data: unknown = request.body;
      if (!Buffer.isBuffer(data)) {
        throw new ValidationError(`Chunk ${index} of ${jobId} has no body`);
      }
      const header = request.get(checksumHeader);
      const result = await service.commitChunk(
        jobId,
        index,
        data,
        header === undefined || header === "" ? undefined : header
      );
      response.json(toCommitResponse(result));
    })
  );

  router.get(
    "/upload/resume/:jobId",
    jobParams,
    handle(async (request, response) => {
      const info = await service.getResumeInfo(param(request, "jobId"));
      response.json(toResumeResponse(info));
    })
  );

  router.get(
    "/upload/status/:jobId",
    jobParams,
    handle(async (request, response) => {
      response.json(toStatusResponse(service.getStatus(param(request, "jobId"))));
    })
  );

  const actions = {
    cancel: (jobId: string) => service.cancel(jobId),
    pause: (jobId: string) => service.pause(jobId),
    resume: (jobId: string) => service.resume(jobId),
  };
  for (const [name, action] of Object.entries(actions)) {
    router.post(
      `/upload/${name}/:jobId`,
      jobParams,
      handle(async (request, response) => {
        const jobId = param(request, "jobId");
        const state: StateResponse = {
          job_id: jobId,
          status: await action(jobId),
        };
        response.json(state);
      })
    );
  }

  router.get(
    "/upload/limits",
    handle(async (_request, response) => {
      response.json(toLimitsResponse(service.limits()));
    })
  );

  return router;
};
