import { JobNotFoundError } from "../../errors.js";
import { UploadJobConfig } from "../job.js";
import { JobRegistry } from "../registry.js";

const config = (jobId: string): UploadJobConfig => ({
  jobId,
  source: { kind: "local", location: "scan.raw" },
  datasetId: jobId,
  datasetName: "Beamline scan",
  userEmail: "scientist@example.com",
  sensor: "TIFF",
  destination: jobId,
  fileName: "scan.raw",
  fileHash: undefined,
  chunkSize: 10,
  maxRetries: 3,
  retryDelaySeconds: 0,
  timeoutMinutes: 1,
  autoConvert: true,
  verifyChecksum: true,
  isPublic: false,
  folder: undefined,
  teamUuid: undefined,
  resumeToken: undefined,
  createdAt: new Date(0),
});

describe("job registry", () => {
  let time: number;
  let registry: JobRegistry;

  beforeEach(() => {
    time = 0;
    registry = new JobRegistry({ retentionMs: 1000, now: () => time });
  });

  it("looks up jobs", () => {
    const entry = registry.create(config("a"), 25);
    expect(registry.get("a")).toBe(entry);
    expect(registry.require("a")).toBe(entry);
    expect(entry.machine.state).toBe("QUEUED");
    expect(() => registry.require("b")).toThrow(JobNotFoundError);
    expect(() => registry.create(config("a"), 25)).toThrow(
      "Job a is already registered"
    );
  });

  it("settles once a job has ended", async () => {
    const entry = registry.create(config("a"), 25);
    time = 500;
    entry.machine.apply("pickup");
    entry.machine.apply("fail");
    expect(await entry.settled).toBe("FAILED");
    expect(entry.completedAt).toStrictEqual(new Date(500));
  });

  it("sweeps jobs that ended before the retention window", () => {
    const ended = registry.create(config("ended"), 25);
    registry.create(config("running"), 25);
    ended.machine.apply("timeout");

    time = 999;
    expect(registry.sweep()).toStrictEqual([]);
    time = 1000;
    expect(registry.sweep().map(({ config }) => config.jobId)).toStrictEqual([
      "ended",
    ]);
    expect(registry.has("ended")).toBe(false);
    expect(registry.size).toBe(1);
  });
});
