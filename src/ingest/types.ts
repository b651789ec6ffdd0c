export interface FileEntry {
  readonly absolutePath: string;
  // Relative to the target directory, or to `cwd` for a file target.
  // Test-file and exclude globs only ever see this path.
  readonly relativePath: string;
  readonly displayPath: string;
}

export type WalkItem =
  | { readonly kind: "file"; readonly file: FileEntry }
  | { readonly kind: "missing"; readonly target: string }
  | { readonly kind: "error"; readonly path: string; readonly message: string };

export interface WalkOptions {
  readonly extensions: readonly string[];
  readonly excludePatterns?: readonly string[];
  readonly cwd?: string;
}
