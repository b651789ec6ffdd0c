import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../config/errors.js";

export async function resolveRulesDirectory(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledRulesDir = path.resolve(moduleDir, "..", "..", "rules");
  if (await existsDirectory(bundledRulesDir)) {
    return bundledRulesDir;
  }

  const cwdRulesDir = path.resolve(process.cwd(), "rules");
  if (await existsDirectory(cwdRulesDir)) {
    return cwdRulesDir;
  }

  throw new ConfigurationError(
    "Unable to find built-in rules directory. Reinstall the package or run from its root.",
  );
}

export async function loadToolVersion(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const packagePath = path.resolve(moduleDir, "..", "..", "package.json");
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(packagePath, "utf8"));
    if (
      parsed !== null &&
      typeof parsed === "object" &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
  return "0.0.0";
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
