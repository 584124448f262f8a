import fs from "node:fs/promises";
import { LocalIoError } from "../application/errors";

export type LocalFileState = {
  sizeBytes: number;
  mtimeMs: number;
};

export async function statFile(absolutePath: string): Promise<LocalFileState> {
  try {
    const stat = await fs.stat(absolutePath);
    return { sizeBytes: stat.size, mtimeMs: stat.mtimeMs };
  } catch (err) {
    throw new LocalIoError(`Failed to stat ${absolutePath}`, absolutePath, err);
  }
}
