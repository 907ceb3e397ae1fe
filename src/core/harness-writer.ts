import path from "node:path";

import fse from "fs-extra";

export type HarnessWriteResult = {
  outputPath: string;
  bytes: number;
};

// The target is either left untouched or replaced with the complete text.
// Errors from the filesystem propagate unchanged.
export async function writeHarnessFile(
  outputPath: string,
  text: string,
): Promise<HarnessWriteResult> {
  const target = path.resolve(outputPath);
  const tempPath = `${target}.${process.pid}.tmp`;

  await fse.ensureDir(path.dirname(target));

  try {
    await fse.writeFile(tempPath, text, "utf8");
    await fse.move(tempPath, target, { overwrite: true });
  } catch (err) {
    await fse.remove(tempPath);
    throw err;
  }

  return { outputPath: target, bytes: Buffer.byteLength(text, "utf8") };
}
