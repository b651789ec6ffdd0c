export { discoverFiles, walkTargets } from "./file-discovery.js";
export {
  compilePathPatterns,
  isPathExcluded,
  matchesPathPattern,
  parsePathPattern,
  toPosixPath,
} from "./path-patterns.js";
export type { PathPattern } from "./path-patterns.js";
export { listStagedFiles } from "./staged-files.js";
export type { FileEntry, WalkItem, WalkOptions } from "./types.js";
