import { readFileSync } from "node:fs";
import { join } from "node:path";

interface PackageMetadata {
  name: string;
  version: string;
}

const readMetadata = (): PackageMetadata => {
  const data: unknown = JSON.parse(
    readFileSync(join(__dirname, "../../package.json"), "utf8")
  );
  if (
    typeof data === "object" &&
    data !== null &&
    "name" in data &&
    typeof data.name === "string" &&
    "version" in data &&
    typeof data.version === "string"
  ) {
    return { name: data.name, version: data.version };
  }
  throw new Error("Could not read name and version from package.json");
};

export const { name, version } = readMetadata();
