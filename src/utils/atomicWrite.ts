import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { PersistenceFailure, errorMessage } from "../errors.js";

export interface Artifact {
  name: string;
  targetPath: string;
  // Rendered only when the save runs, so a render error is a save error.
  render: () => Promise<string | Buffer> | string | Buffer;
}

export interface FileOps {
  writeFile(filePath: string, data: string | Buffer): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(filePath: string): Promise<void>;
  mkdir(directory: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  writeFile: (filePath, data) => fs.writeFile(filePath, data),
  rename: (from, to) => fs.rename(from, to),
  rm: (filePath) => fs.rm(filePath, { force: true }),
  mkdir: async (directory) => {
    await fs.mkdir(directory, { recursive: true });
  },
};

/**
 * Writes every artifact to a temporary file in `tempDirectory`, then moves
 * each into place. Nothing is moved until all writes have succeeded; on a
 * write failure the temporary files are removed and the committed artifacts
 * are left exactly as they were.
 */
export const commitArtifacts = async (
  artifacts: readonly Artifact[],
  tempDirectory: string,
  ops: FileOps = nodeFileOps
): Promise<void> => {
  const staged: { tempPath: string; artifact: Artifact }[] = [];

  try {
    await ops.mkdir(tempDirectory);
    for (const artifact of artifacts) {
      const tempPath = path.join(
        tempDirectory,
        `${path.basename(artifact.targetPath)}.${uuidv4()}.tmp`
      );
      staged.push({ tempPath, artifact });
      await ops.writeFile(tempPath, await artifact.render());
    }
  } catch (error) {
    await removeStaged(staged, ops);
    console.error(
      `❌ [ATOMIC_SAVE_FAILED] stage=write artifacts=${artifacts.length} error=${errorMessage(error)}`
    );
    throw new PersistenceFailure(
      `Failed to stage artifacts: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  let moved = 0;
  try {
    for (const { tempPath, artifact } of staged) {
      await ops.mkdir(path.dirname(artifact.targetPath));
      await ops.rename(tempPath, artifact.targetPath);
      moved++;
    }
  } catch (error) {
    await removeStaged(staged.slice(moved), ops);
    console.error(
      `❌ [ATOMIC_SAVE_FAILED] stage=move moved=${moved}/${staged.length} error=${errorMessage(error)}`
    );
    throw new PersistenceFailure(
      `Failed to move artifacts into place: ${errorMessage(error)}`,
      { cause: error }
    );
  }
};

const removeStaged = async (
  staged: readonly { tempPath: string }[],
  ops: FileOps
): Promise<void> => {
  for (const { tempPath } of staged) {
    try {
      await ops.rm(tempPath);
    } catch (cleanupError) {
      console.warn(
        `⚠️ [ATOMIC_SAVE_CLEANUP_FAILED] path=${tempPath} error=${errorMessage(cleanupError)}`
      );
    }
  }
};

export const writeFileAtomic = (
  targetPath: string,
  data: string | Buffer,
  tempDirectory: string = path.dirname(targetPath)
): Promise<void> =>
  commitArtifacts(
    [{ name: path.basename(targetPath), targetPath, render: () => data }],
    tempDirectory
  );
