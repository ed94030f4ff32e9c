#!/usr/bin/env -S NODE_OPTIONS="--no-warnings --enable-source-maps" node

import "reflect-metadata";

import { Command } from "commander";
import Debug from "debug";

import { makeSynchronizeCommand } from "./cli/synchronize.js";
import { makeUploadClientCommand } from "./client/upload-client.js";
import { makeServeCommand } from "./server/serve.js";
import { name, version } from "./utils/metadata.js";

export const command = new Command();
command
  .name(name)
  .version(version)
  .option("--debug", "Output extra debug information")
  .addCommand(makeServeCommand())
  .addCommand(makeUploadClientCommand())
  .addCommand(makeSynchronizeCommand())
  .hook("preAction", (that) => {
    const options = that.opts();
    if (process.env["DEBUG"]) {
      return;
    }
    if (options["debug"]) {
      Debug.enable("*");
    } else {
      Debug.enable("client,server,service");
    }
  });

if (require.main === module) {
  command.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
