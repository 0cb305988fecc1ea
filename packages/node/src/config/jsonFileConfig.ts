import { type ConfigBackend, type PersistedConfig, errorCode } from "@pcopy/core";
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Config backend over one JSON file. A missing file reads as `undefined`
 * (defaults); invalid JSON throws and is reported by the store.
 */
export function createJsonFileConfigBackend(path: string): ConfigBackend {
  return Object.freeze({
    location: path,
    read: (): unknown => {
      let text: string;
      try {
        text = readFileSync(path, "utf8");
      } catch (err) {
        if (errorCode(err) === "ENOENT") return undefined;
        throw err;
      }
      const parsed: unknown = JSON.parse(text);
      return parsed;
    },
    write: (record: PersistedConfig) => {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, `${JSON.stringify(record, null, 2)}\n`, "utf8");
    },
  });
}
