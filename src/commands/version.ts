/**
 * `linewire --version`: Print the package version, then exit.
 */
import { readFile } from "node:fs/promises";

export async function readVersion(): Promise<string> {
  // src/commands and dist/commands both sit two levels below package.json
  const raw = await readFile(new URL("../../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

export async function runVersion(): Promise<void> {
  console.log(`linewire ${await readVersion()}`);
}
