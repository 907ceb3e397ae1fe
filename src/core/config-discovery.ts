import fs from "node:fs";
import path from "node:path";

export const CONFIG_FILE_NAME = "testgen.config.json";

export type ConfigSource = "explicit" | "discovered" | "default";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export function resolveGeneratorConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const found = findUp(cwd, (dir) => fs.existsSync(path.join(dir, CONFIG_FILE_NAME)));
  if (found) {
    return { configPath: path.join(found, CONFIG_FILE_NAME), source: "discovered" };
  }

  return { configPath: null, source: "default" };
}

export function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
