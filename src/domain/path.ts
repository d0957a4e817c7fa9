import { PathFormatError } from './errors.js';

export const ROOT_PATH = '/';
export const PATH_SEPARATOR = '/';

const WHITESPACE_RE = /\s/;

/**
 * Validates a journal path without rewriting it.
 *
 * Accepted: `/` or `/seg(/seg)*` with non-empty segments that contain no
 * whitespace and are neither `.` nor `..`.
 */
export function assertValidPath(path: string): void {
  if (path.length === 0) {
    throw new PathFormatError(path, 'path is empty');
  }
  if (!path.startsWith(PATH_SEPARATOR)) {
    throw new PathFormatError(path, 'path must start with /');
  }
  if (path === ROOT_PATH) return;

  if (path.endsWith(PATH_SEPARATOR)) {
    throw new PathFormatError(path, 'trailing / is not allowed');
  }

  for (const segment of path.slice(1).split(PATH_SEPARATOR)) {
    if (segment === '') {
      throw new PathFormatError(path, 'empty path segment');
    }
    if (segment === '.' || segment === '..') {
      throw new PathFormatError(path, `relative segment '${segment}'`);
    }
    if (WHITESPACE_RE.test(segment)) {
      throw new PathFormatError(path, 'whitespace in path segment');
    }
  }
}

export function isValidPath(path: string): boolean {
  try {
    assertValidPath(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when `path` lies strictly below `ancestor` on a segment boundary.
 * `/journal/channel` is below `/journal`; `/journalist` is not.
 */
export function isDescendantPath(path: string, ancestor: string): boolean {
  if (path === ancestor) return false;
  if (ancestor === ROOT_PATH) return path.startsWith(PATH_SEPARATOR);
  return path.startsWith(ancestor + PATH_SEPARATOR);
}

/** Equal to `ancestor` or below it. */
export function isWithinPath(path: string, ancestor: string): boolean {
  return path === ancestor || isDescendantPath(path, ancestor);
}

/** Listener matching rule: exact always, descendants only when recursive. */
export function pathMatches(
  listenerPath: string,
  recursive: boolean,
  eventPath: string,
): boolean {
  if (listenerPath === eventPath) return true;
  return recursive && isDescendantPath(eventPath, listenerPath);
}

/**
 * The path itself followed by each ancestor up to the root.
 * `/journal/channel` → [`/journal/channel`, `/journal`, `/`]
 */
export function pathLineage(path: string): string[] {
  const lineage = [path];
  let current = path;
  while (current !== ROOT_PATH) {
    const cut = current.lastIndexOf(PATH_SEPARATOR);
    current = cut <= 0 ? ROOT_PATH : current.slice(0, cut);
    lineage.push(current);
  }
  return lineage;
}

/** Appends a relative `child` (`channel/add`) below `root`. */
export function joinPath(root: string, child: string): string {
  return root === ROOT_PATH ? `${ROOT_PATH}${child}` : `${root}${PATH_SEPARATOR}${child}`;
}
