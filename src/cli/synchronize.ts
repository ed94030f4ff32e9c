import { Command, Option } from "commander";

import { touch } from "../client/fs.js";
import { databaseTypes, getDataSource } from "../entity/data-source.js";
import { InvalidConfigError } from "../errors.js";

export const makeSynchronizeCommand = (): Command => {
  const command = new Command();
  command
    .name(`synchronize`)
    .description("Create the tables of the chunk ledger")
    .addOption(
      new Option("--database-type <type>", "Which type of database to use")
        .choices(databaseTypes.filter((type) => type !== "memory"))
        .default("sqlite")
    )
    .requiredOption(
      "--connection-string <path>",
      "Connection string to the database"
    )
    .showHelpAfterError()
    .action(async () => {
      const options = command.opts();
      const databaseType: unknown = options["databaseType"];
      const connectionString: unknown = options["connectionString"];
      if (typeof connectionString !== "string") {
        throw new InvalidConfigError(`"connectionString" needs to be a string`);
      }
      let type: "sqlite" | "postgres";
      if (databaseType === "sqlite") {
        type = "sqlite";
        await touch(connectionString);
      } else if (databaseType === "postgres") {
        type = "postgres";
      } else {
        throw new InvalidConfigError(`Cannot synchronize a ${databaseType} ledger`);
      }
      const dataSource = await getDataSource(type, connectionString, true);
      await dataSource.synchronize();
      await dataSource.destroy();
    });
  return command;
};
