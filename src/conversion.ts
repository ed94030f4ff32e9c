import Debug from "debug";
import Joi from "joi";
import { execFile } from "node:child_process";
import { mkdir, readFile } from "node:fs/promises";
import { promisify } from "node:util";

import { InvalidConfigError, toError } from "./errors.js";

const debug = Debug("conversion");

export const sensors = [
  "IDX",
  "TIFF",
  "TIFF_RGB",
  "NETCDF",
  "HDF5",
  "4D_NEXUS",
  "RGB",
  "MAPIR",
  "OTHER",
] as const;
export type Sensor = (typeof sensors)[number];

const sensorAliases: Record<string, Sensor> = {
  "TIFF RGB": "TIFF_RGB",
};

export const isSensor = (value: string): value is Sensor =>
  sensors.some((sensor) => sensor === value);

export const parseSensor = (value: string): Sensor => {
  const normalized = value.trim().toUpperCase();
  const sensor = sensorAliases[normalized] ?? normalized;
  if (!isSensor(sensor)) {
    throw new InvalidConfigError(
      `Unknown sensor "${value}", expected one of ${sensors.join(", ")}`
    );
  }
  return sensor;
};

export interface ConversionRequest {
  jobId: string;
  datasetId: string;
  sensor: Sensor;
  inputDirectory: string;
  outputDirectory: string;
}

export interface ConversionResult {
  success: boolean;
  message?: string;
}

/**
 * Hands an assembled dataset to a format-specific converter.
 */
export interface ConversionDispatcher {
  dispatch(request: ConversionRequest): Promise<ConversionResult>;
}

export type ConverterCommands = Partial<Record<Sensor, string[]>>;

const commandsSchema = Joi.object<ConverterCommands>().pattern(
  Joi.string().valid(...sensors),
  Joi.array().items(Joi.string().min(1)).min(1)
);

const runFile = promisify(execFile);

/**
 * Runs one external command per sensor. `{input}` and `{output}` in the
 * arguments are replaced with the directories of the request.
 */
export class CommandConversionDispatcher implements ConversionDispatcher {
  private commands: ConverterCommands;

  constructor(commands: ConverterCommands) {
    this.commands = commands;
  }

  static async fromFile(path: string): Promise<CommandConversionDispatcher> {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, "utf8"));
    } catch (error: unknown) {
      throw new InvalidConfigError(
        `Could not read converters from ${path}: ${toError(error).message}`
      );
    }
    const { error, value } = commandsSchema.validate(data);
    if (error !== undefined) {
      throw new InvalidConfigError(
        `Invalid converters in ${path}: ${error.message}`
      );
    }
    return new CommandConversionDispatcher(value);
  }

  async dispatch({
    jobId,
    sensor,
    inputDirectory,
    outputDirectory,
  }: ConversionRequest): Promise<ConversionResult> {
    const command = this.commands[sensor];
    if (command === undefined) {
      return { success: false, message: `No converter for sensor ${sensor}` };
    }
    const [file, ...templates] = command;
    if (file === undefined) {
      return { success: false, message: `Empty converter for sensor ${sensor}` };
    }
    const args = templates.map((argument) =>
      argument
        .replaceAll("{input}", inputDirectory)
        .replaceAll("{output}", outputDirectory)
    );

    await mkdir(outputDirectory, { recursive: true });
    debug("converting %s with %s %o", jobId, file, args);
    try {
      await runFile(file, args);
    } catch (error: unknown) {
      const message = toError(error).message;
      debug("conversion of %s failed: %s", jobId, message);
      return { success: false, message: `Conversion failed: ${message}` };
    }
    return { success: true };
  }
}
