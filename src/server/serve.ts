import { Command, Option } from "commander";
import Debug from "debug";
import { once } from "node:events";
import { createServer, Server } from "node:http";
import { join } from "node:path";

import { makeSourceFactory } from "../client/sources.js";
import { touch } from "../client/fs.js";
import { Config, getConfig } from "../config.js";
import { CommandConversionDispatcher } from "../conversion.js";
import { createLedger } from "../database-ledger.js";
import { databaseTypes } from "../entity/data-source.js";
import { InvalidConfigError } from "../errors.js";
import { JobRegistry } from "../job/registry.js";
import { StagingStore } from "../staging.js";
import { UploadService } from "../upload-service.js";
import { waitForSignal } from "../utils/signal.js";
import { createApp } from "./app.js";

const debug = Debug("server");

export interface RunningServer {
  port: number;
  service: UploadService;
  close(): Promise<void>;
}

/**
 * Creates the service for a configuration and starts listening.
 */
export const startServer = async (config: Config): Promise<RunningServer> => {
  const { dataDirectory, databaseType } = config;
  let { connectionString } = config;
  if (databaseType === "sqlite" && connectionString === undefined) {
    connectionString = join(dataDirectory, "ledger.sqlite");
    await touch(connectionString);
  }
  const ledger = await createLedger(databaseType, connectionString);
  const dispatcher = await CommandConversionDispatcher.fromFile(
    config.convertersFile
  );
  const { endpoint, region, accessKeyId, secretAccessKey } = config.s3;
  const service = new UploadService({
    ledger,
    staging: new StagingStore(join(dataDirectory, "staging")),
    dispatcher,
    uploadDirectory: join(dataDirectory, "uploads"),
    convertedDirectory: join(dataDirectory, "converted"),
    registry: new JobRegistry({ retentionMs: config.retentionMs }),
    sources: makeSourceFactory({
      s3: {
        endpoint,
        region,
        forcePathStyle: endpoint !== undefined,
        credentials:
          accessKeyId !== undefined && secretAccessKey !== undefined
            ? { accessKeyId, secretAccessKey }
            : undefined,
      },
    }),
    maxConcurrentJobs: config.maxConcurrentJobs,
    maxWorkers: config.maxWorkers,
    chunkTimeoutMs: config.chunkTimeoutMs,
    limits: {
      defaultChunkSize: config.defaultChunkSize,
      minChunkSize: config.minChunkSize,
      maxChunkSize: config.maxChunkSize,
      maxFileSize: config.maxFileSize,
      checksumAlgorithm: config.checksumAlgorithm,
    },
  });

  const server: Server = createServer(createApp(service));
  server.on("error", (error: Error) => {
    debug("received error from http server: %O", error);
  });
  server.listen(config.port);
  await once(server, "listening");
  const address = server.address();
  const port =
    address !== null && typeof address === "object" ? address.port : config.port;
  debug("listening on port %d", port);

  const sweeper = setInterval(() => {
    service.sweep().then(
      (removed) => {
        if (removed.length > 0) {
          debug("forgot %d finished jobs", removed.length);
        }
      },
      (error: unknown) => debug("error sweeping jobs: %O", error)
    );
  }, config.sweepIntervalMs);
  sweeper.unref();

  return {
    port,
    service,
    close: async () => {
      clearInterval(sweeper);
      server.close();
      server.closeAllConnections();
      await service.close();
      await ledger.close();
    },
  };
};

const parseInteger = (value: string): number => {
  const number = Number(value);
  if (!Number.isSafeInteger(number)) {
    throw new InvalidConfigError(`"${value}" is not an integer`);
  }
  return number;
};

export const makeServeCommand = (): Command => {
  const command = new Command("serve");
  command
    .description("Accept uploads over HTTP")
    .option("--port <number>", "Port to listen on", parseInteger)
    .option("--data-directory <path>", "Where staged and assembled files go")
    .addOption(
      new Option(
        "--database-type <type>",
        "Where to keep the record of committed chunks"
      ).choices(databaseTypes)
    )
    .option("--connection-string <value>", "Connection string to the database")
    .option(
      "--max-concurrent-jobs <number>",
      "Number of jobs that upload at the same time",
      parseInteger
    )
    .option("--converters-file <path>", "Commands to run for each sensor")
    .showHelpAfterError()
    .action(async () => {
      const options = command.opts();
      const config = getConfig();
      const port: unknown = options["port"];
      if (typeof port === "number") {
        config.port = port;
      }
      const dataDirectory: unknown = options["dataDirectory"];
      if (typeof dataDirectory === "string") {
        config.dataDirectory = dataDirectory;
      }
      const databaseType: unknown = options["databaseType"];
      const databaseTypeOption = databaseTypes.find(
        (type) => type === databaseType
      );
      if (databaseTypeOption !== undefined) {
        config.databaseType = databaseTypeOption;
      }
      const connectionString: unknown = options["connectionString"];
      if (typeof connectionString === "string") {
        config.connectionString = connectionString;
      }
      const maxConcurrentJobs: unknown = options["maxConcurrentJobs"];
      if (typeof maxConcurrentJobs === "number") {
        config.maxConcurrentJobs = maxConcurrentJobs;
      }
      const convertersFile: unknown = options["convertersFile"];
      if (typeof convertersFile === "string") {
        config.convertersFile = convertersFile;
      }

      const server = await startServer(config);
      await waitForSignal();
      debug("shutting down");
      await server.close();
    });
  return command;
};
