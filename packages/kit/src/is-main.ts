import { pathToFileURL } from "node:url";

/** True when the module at importMetaUrl is the process entry point. */
export function isMainModule(importMetaUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return importMetaUrl === pathToFileURL(entry).href;
}
