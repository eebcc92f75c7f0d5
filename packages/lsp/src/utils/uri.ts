import { fileURLToPath, pathToFileURL } from 'node:url';

const FILE_SCHEME = 'file://';

/**
 * `file://` uri for a path. Relative paths resolve against the process
 * working directory; uris pass through unchanged.
 */
export function pathToUri(filePath: string): string {
  if (filePath.startsWith(FILE_SCHEME)) {
    return filePath;
  }
  return pathToFileURL(filePath).toString();
}

export function uriToPath(uri: string): string {
  if (!uri.startsWith(FILE_SCHEME)) {
    return uri;
  }
  try {
    return fileURLToPath(uri);
  } catch {
    // e.g. a uri with a host part; keep what follows the scheme
    return uri.slice(FILE_SCHEME.length);
  }
}
