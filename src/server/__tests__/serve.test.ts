import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Agent } from "undici";

import { UploadApi } from "../../client/api.js";
import { getConfig } from "../../config.js";
import { InvalidConfigError } from "../../errors.js";
import { startServer } from "../serve.js";

describe("serve", () => {
  let temporaryDirectory: string;

  beforeEach(async () => {
    temporaryDirectory = await mkdtemp(join(tmpdir(), "serve-"));
  });
  afterEach(async () => {
    await rm(temporaryDirectory, { recursive: true, force: true });
  });

  const config = (env: Record<string, string>) =>
    getConfig({
      PORT: "0",
      DATA_DIRECTORY: temporaryDirectory,
      CONVERTERS_FILE: join(__dirname, "../../../config/converters.json"),
      ...env,
    });

  it("starts from the configuration", async () => {
    const server = await startServer(
      config({ DATABASE_TYPE: "memory", DEFAULT_CHUNK_SIZE: "8MB" })
    );
    const agent = new Agent();
    try {
      expect(server.port).toBeGreaterThan(0);
      const api = new UploadApi(`http://127.0.0.1:${server.port}`, agent);
      expect((await api.limits()).default_chunk_size).toBe(8 * 1024 * 1024);
    } finally {
      await agent.close();
      await server.close();
    }
  });

  it("needs a readable converters file", async () => {
    await expect(
      startServer(
        config({
          DATABASE_TYPE: "memory",
          CONVERTERS_FILE: join(temporaryDirectory, "missing.json"),
        })
      )
    ).rejects.toThrow(InvalidConfigError);
  });
});
