import fileTypes from "./file-types.json";

const FILE_EXTENSION_TO_UTI: Readonly<Record<string, string>> = fileTypes.files;
const DIR_EXTENSION_TO_UTI: Readonly<Record<string, string>> = fileTypes.directories;

export function pathExtension(path: string): string | undefined {
  const slash = path.lastIndexOf("/");
  const name = slash === -1 ? path : path.slice(slash + 1);
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) {
    return undefined;
  }
  return name.slice(dot + 1);
}

export function lastPathComponent(path: string): string {
  const trimmed = path.endsWith("/") && path.length > 1 ? path.slice(0, -1) : path;
  const slash = trimmed.lastIndexOf("/");
  return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

export function dirname(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "" : path.slice(0, slash);
}

/**
 * Xcode file type for a path, based on its extension. Lookups ignore case.
 */
export function utiForPath(path: string): string | undefined {
  const ext = pathExtension(path);
  if (ext === undefined) {
    return undefined;
  }
  const lowercased = ext.toLowerCase();
  return FILE_EXTENSION_TO_UTI[lowercased] ?? DIR_EXTENSION_TO_UTI[lowercased];
}

/**
 * File type of a directory that Xcode treats as a single file, like `.xcassets` or `.framework`
 */
export function bundleUTIForPath(path: string): string | undefined {
  const ext = pathExtension(path);
  if (ext === undefined) {
    return undefined;
  }
  return DIR_EXTENSION_TO_UTI[ext.toLowerCase()];
}

/**
 * Only compilable sources go into a sources build phase; headers are referenced but not built
 */
export function isCompilableUTI(uti: string | undefined): boolean {
  return uti !== undefined && uti.startsWith("sourcecode.") && !uti.endsWith(".h");
}
