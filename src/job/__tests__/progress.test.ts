import { ProgressAggregator, UploadProgress } from "../progress.js";

const megabyte = 1024 * 1024;

describe("progress aggregator", () => {
  let time: number;
  let progress: ProgressAggregator;

  beforeEach(() => {
    time = 0;
    progress = new ProgressAggregator({ windowMs: 5000, now: () => time });
  });

  it("reports speed, percentage and ETA", () => {
    progress.register("job", 4 * megabyte, "scan.raw");
    progress.setStatus("job", "UPLOADING");
    time = 1000;
    expect(progress.increment("job", megabyte)).toBe(true);

    expect(progress.getProgress("job")).toStrictEqual({
      jobId: "job",
      status: "UPLOADING",
      progressPercentage: 25,
      bytesUploaded: megabyte,
      bytesTotal: 4 * megabyte,
      speedMbps: 1,
      etaSeconds: 3,
      currentFile: "scan.raw",
      errorMessage: "",
      lastUpdated: new Date(1000),
    });
  });

  it("only counts bytes within the window", () => {
    progress.register("job", 4 * megabyte);
    progress.setStatus("job", "UPLOADING");
    time = 1000;
    progress.increment("job", megabyte);
    time = 10000;
    const snapshot = progress.getProgress("job");
    expect(snapshot?.speedMbps).toBe(0);
    expect(snapshot?.etaSeconds).toBe(Math.ceil(3 / 1e-6));
    expect(snapshot?.bytesUploaded).toBe(megabyte);
  });

  it("handles empty files", () => {
    progress.register("job", 0);
    expect(progress.getProgress("job")?.progressPercentage).toBe(0);
    expect(progress.getProgress("job")?.etaSeconds).toBe(0);
    progress.setStatus("job", "COMPLETED");
    expect(progress.getProgress("job")?.progressPercentage).toBe(100);
  });

  it("freezes counters once the job has ended", () => {
    progress.register("job", 100);
    progress.setStatus("job", "UPLOADING");
    progress.increment("job", 40);
    progress.setStatus("job", "FAILED", "Chunk 1 failed: connection reset");
    expect(progress.increment("job", 10)).toBe(false);

    const snapshot = progress.getProgress("job");
    expect(snapshot?.bytesUploaded).toBe(40);
    expect(snapshot?.status).toBe("FAILED");
    expect(snapshot?.errorMessage).toBe("Chunk 1 failed: connection reset");
  });

  it("rejects negative byte counts", () => {
    progress.register("job", 100);
    expect(() => progress.increment("job", -1)).toThrow(RangeError);
  });

  it("publishes snapshots to listeners", () => {
    const received: UploadProgress[] = [];
    const remove = progress.onProgress((snapshot) => {
      received.push(snapshot);
    });
    progress.register("job", 100);
    progress.increment("job", 10);
    remove();
    progress.increment("job", 10);
    expect(received.map(({ bytesUploaded }) => bytesUploaded)).toStrictEqual([
      0, 10,
    ]);
  });

  it("forgets removed jobs", () => {
    progress.register("job", 100);
    expect(progress.has("job")).toBe(true);
    progress.remove("job");
    expect(progress.getProgress("job")).toBeUndefined();
  });
});
