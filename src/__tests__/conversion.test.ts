import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  CommandConversionDispatcher,
  ConversionRequest,
  parseSensor,
} from "../conversion.js";
import { InvalidConfigError } from "../errors.js";

describe("sensors", () => {
  it("are normalised", () => {
    expect(parseSensor("hdf5")).toBe("HDF5");
    expect(parseSensor(" tiff rgb ")).toBe("TIFF_RGB");
    expect(parseSensor("4d_nexus")).toBe("4D_NEXUS");
  });
  it("are checked", () => {
    expect(() => parseSensor("jpeg")).toThrow(InvalidConfigError);
  });
});

describe("command conversion dispatcher", () => {
  let temporaryDirectory: string;
  let request: ConversionRequest;

  beforeEach(async () => {
    temporaryDirectory = await mkdtemp(join(tmpdir(), "conversion-"));
    request = {
      jobId: "job",
      datasetId: "dataset",
      sensor: "TIFF",
      inputDirectory: join(temporaryDirectory, "input"),
      outputDirectory: join(temporaryDirectory, "output"),
    };
  });
  afterEach(async () => {
    await rm(temporaryDirectory, { recursive: true, force: true });
  });

  it("runs the command of the sensor", async () => {
    const dispatcher = new CommandConversionDispatcher({
      TIFF: [
        process.execPath,
        "-e",
        "require('fs').writeFileSync(require('path').join(process.argv[1], 'converted.txt'), process.argv[2])",
        "{output}",
        "from {input}",
      ],
    });
    expect(await dispatcher.dispatch(request)).toStrictEqual({ success: true });
    const converted = await readFile(
      join(request.outputDirectory, "converted.txt"),
      "utf8"
    );
    expect(converted).toBe(`from ${request.inputDirectory}`);
  });

  it("reports failing commands", async () => {
    const dispatcher = new CommandConversionDispatcher({
      TIFF: [process.execPath, "-e", "process.exit(3)"],
    });
    const result = await dispatcher.dispatch(request);
    expect(result.success).toBe(false);
    expect(result.message).toMatch(/^Conversion failed: /);
  });

  it("reports sensors without a converter", async () => {
    const dispatcher = new CommandConversionDispatcher({});
    expect(await dispatcher.dispatch(request)).toStrictEqual({
      success: false,
      message: "No converter for sensor TIFF",
    });
  });

  it("loads the shipped converters", async () => {
    const dispatcher = await CommandConversionDispatcher.fromFile(
      join(__dirname, "../../config/converters.json")
    );
    expect(dispatcher).toBeInstanceOf(CommandConversionDispatcher);
  });

  it("rejects invalid converter files", async () => {
    const path = join(temporaryDirectory, "converters.json");
    await writeFile(path, JSON.stringify({ JPEG: ["convert"] }));
    await expect(CommandConversionDispatcher.fromFile(path)).rejects.toThrow(
      InvalidConfigError
    );
    await expect(
      CommandConversionDispatcher.fromFile(join(temporaryDirectory, "missing.json"))
    ).rejects.toThrow(InvalidConfigError);
  });
});
