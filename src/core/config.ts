import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { resolveGeneratorConfigPath, type ConfigSource } from "./config-discovery.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatManifestIssues } from "./topology-manifest.js";

export const GeneratorConfigSchema = z
  .object({
    output_dir: z.string().trim().min(1).optional(),
    strict: z.boolean().default(false),
    log_file: z.string().trim().min(1).optional(),
    color: z.boolean().optional(),
  })
  .strict();

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

export type LoadedGeneratorConfig = {
  config: GeneratorConfig;
  configPath: string | null;
  source: ConfigSource;
};

const CONFIG_HINT = "Fix testgen.config.json or pass --config with a valid file.";

export function loadGeneratorConfig(args: {
  explicitPath?: string;
  cwd?: string;
}): LoadedGeneratorConfig {
  const resolved = resolveGeneratorConfigPath(args);
  if (!resolved.configPath) {
    return { config: GeneratorConfigSchema.parse({}), configPath: null, source: resolved.source };
  }

  const configPath = resolved.configPath;
  let raw: unknown;
  try {
    raw = fse.readJsonSync(configPath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Generator config unreadable.",
      message: `Failed to read generator config at ${configPath}.`,
      hint: CONFIG_HINT,
      cause: err,
    });
  }

  const parsed = GeneratorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const lines = formatManifestIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Generator config invalid.",
      message: [`${configPath} failed validation:`, ...lines.map((line) => `- ${line}`)].join("\n"),
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  // Relative paths in the file are relative to the file itself.
  const configDir = path.dirname(configPath);
  const config: GeneratorConfig = {
    ...parsed.data,
    output_dir: parsed.data.output_dir ? path.resolve(configDir, parsed.data.output_dir) : undefined,
    log_file: parsed.data.log_file ? path.resolve(configDir, parsed.data.log_file) : undefined,
  };

  return { config, configPath, source: resolved.source };
}
