import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DatabaseResumeLedger } from "../database-ledger.js";
import { getDataSource } from "../entity/data-source.js";
import {
  IntegrityError,
  InvalidConfigError,
  JobNotFoundError,
} from "../errors.js";
import { MemoryResumeLedger, ResumeLedger } from "../ledger.js";

interface LedgerFixture {
  ledger: ResumeLedger;
  cleanUp(): Promise<void>;
}

const createMemoryLedger = async (): Promise<LedgerFixture> => ({
  ledger: new MemoryResumeLedger(),
  cleanUp: async () => {},
});

const createDatabaseLedger = async (): Promise<LedgerFixture> => {
  const temporaryDirectory = await mkdtemp(join(tmpdir(), "ledger-"));
  const dataSource = await getDataSource(
    "sqlite",
    join(temporaryDirectory, "ledger.sqlite")
  );
  await dataSource.synchronize();
  const ledger = new DatabaseResumeLedger(dataSource);
  return {
    ledger,
    cleanUp: async () => {
      await ledger.close();
      await rm(temporaryDirectory, { recursive: true, force: true });
    },
  };
};

describe.each([
  ["memory", createMemoryLedger],
  ["sqlite", createDatabaseLedger],
])("%s ledger", (_name, create) => {
  let fixture: LedgerFixture;
  let ledger: ResumeLedger;

  beforeEach(async () => {
    fixture = await create();
    ledger = fixture.ledger;
  });
  afterEach(async () => {
    await fixture.cleanUp();
  });

  const header = { fileSize: 25, chunkSize: 10 };

  it("remembers the plan it was opened with", async () => {
    expect(await ledger.header("job")).toBeUndefined();
    await ledger.open("job", header);
    expect(await ledger.header("job")).toStrictEqual(header);
    await ledger.open("job", header);
    await expect(
      ledger.open("job", { fileSize: 25, chunkSize: 5 })
    ).rejects.toThrow(InvalidConfigError);
  });

  it("commits chunks once", async () => {
    await ledger.open("job", header);
    const commit = { index: 2, length: 5, checksum: "aaaa" };
    expect(await ledger.commit("job", commit)).toBe("committed");
    expect(await ledger.commit("job", { ...commit })).toBe("duplicate");
    await expect(
      ledger.commit("job", { ...commit, checksum: "bbbb" })
    ).rejects.toThrow(IntegrityError);
    expect(await ledger.lookup("job", 2)).toStrictEqual(commit);
    expect(await ledger.lookup("job", 1)).toBeUndefined();
  });

  it("lists commits by index", async () => {
    await ledger.open("job", header);
    await ledger.commit("job", { index: 2, length: 5, checksum: "cccc" });
    await ledger.commit("job", { index: 0, length: 10, checksum: "aaaa" });
    expect(await ledger.committed("job")).toStrictEqual([
      { index: 0, length: 10, checksum: "aaaa" },
      { index: 2, length: 5, checksum: "cccc" },
    ]);
  });

  it("keeps jobs apart", async () => {
    await ledger.open("a", header);
    await ledger.open("b", { fileSize: 100, chunkSize: 50 });
    await ledger.commit("a", { index: 0, length: 10, checksum: "aaaa" });
    expect(await ledger.committed("b")).toStrictEqual([]);
  });

  it("needs to be opened before committing", async () => {
    await expect(
      ledger.commit("unknown", { index: 0, length: 10, checksum: "aaaa" })
    ).rejects.toThrow(JobNotFoundError);
    await expect(ledger.committed("unknown")).rejects.toThrow(JobNotFoundError);
  });

  it("can be purged", async () => {
    await ledger.open("job", header);
    await ledger.commit("job", { index: 0, length: 10, checksum: "aaaa" });
    await ledger.purge("job");
    expect(await ledger.header("job")).toBeUndefined();
    await ledger.purge("job");

    // A purged job can start over
    await ledger.open("job", header);
    expect(await ledger.committed("job")).toStrictEqual([]);
  });
});
