import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import { ConfigurationError } from "../config/errors.js";

export async function listStagedFiles(cwd: string): Promise<string[]> {
  const git = simpleGit({ baseDir: cwd });
  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new ConfigurationError(
      `--staged requires a git repository, but ${path.resolve(cwd)} is not one`,
    );
  }

  const baseDir = await fs.realpath(cwd);
  const topLevel = await fs.realpath(
    (await git.revparse(["--show-toplevel"])).trim(),
  );
  const output = await git.diff([
    "--cached",
    "--name-only",
    "--diff-filter=ACMR",
  ]);

  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((name) =>
      path
        .relative(baseDir, path.join(topLevel, name))
        .split(path.sep)
        .join(path.posix.sep),
    )
    .sort();
}
