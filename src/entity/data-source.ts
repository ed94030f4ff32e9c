import "reflect-metadata";

import betterSqlite3 from "better-sqlite3";
import Debug from "debug";
import pg from "pg";
import { DataSource } from "typeorm";

import { Chunk } from "./chunk.js";
import { Ledger } from "./ledger.js";

export const databaseTypes = ["memory", "sqlite", "postgres"] as const;
export type DatabaseType = (typeof databaseTypes)[number];

const debug = Debug("data-source");
export const getDataSource = async (
  type: Exclude<DatabaseType, "memory">,
  connectionString: string,
  logging: boolean = false
): Promise<DataSource> => {
  const config = {
    logging,
    synchronize: false,
    entities: [Ledger, Chunk],
    subscribers: [],
    migrations: [],
    entitySkipConstructor: true,
  };
  debug("connecting to %o database at %o", type, connectionString);
  let dataSource: DataSource;
  switch (type) {
    case "sqlite":
      dataSource = await new DataSource({
        type: "better-sqlite3",
        driver: betterSqlite3,
        database: connectionString,
        ...config,
      }).initialize();

      // Run a query to ensure that the database is writable
      await dataSource.manager.query("pragma user_version=0");
      // Chunks are deleted along with their ledger
      await dataSource.manager.query("pragma foreign_keys=ON");

      return dataSource;
    case "postgres":
      return new DataSource({
        type: "postgres",
        driver: pg,
        url: connectionString,
        parseInt8: true,
        ...config,
      }).initialize();
  }
};
