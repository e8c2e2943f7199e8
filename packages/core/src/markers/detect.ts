import type { ArtifactEntry, ArtifactKind, MarkerPolicy } from '@typecensus/shared';

export const PY_TYPED = 'py.typed';

const SOURCE_SUFFIXES = ['.py', '.pyi'];
const METADATA_SUFFIXES = ['.dist-info', '.data', '.egg-info'];

export interface MarkerCheckOptions {
  policy: MarkerPolicy;
  kind: ArtifactKind;
  /** Importable module name of the package, e.g. `typing_extensions` */
  moduleName: string;
}

function isSource(path: string): boolean {
  return SOURCE_SUFFIXES.some((suffix) => path.endsWith(suffix));
}

function basename(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

function dirname(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '' : path.slice(0, slash);
}

function isUnder(path: string, dir: string): boolean {
  return dir === '' || path.startsWith(`${dir}/`);
}

/**
 * Reports whether the listed artifact ships inline type information.
 */
export function hasPyTypedMarker(entries: ArtifactEntry[], options: MarkerCheckOptions): boolean {
  return options.policy === 'strict'
    ? checkStrict(entries)
    : checkModuleRoots(entries, options.kind, options.moduleName);
}

/**
 * At least one `py.typed` exists and every Python source lies under a
 * directory holding one. Zero-byte `__init__.py` files are ignored.
 */
export function checkStrict(entries: ArtifactEntry[]): boolean {
  const markerDirs: string[] = [];
  const sources: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory) {
      continue;
    }
    const name = basename(entry.path);
    if (name === '__init__.py' && entry.size === 0) {
      continue;
    }
    if (isSource(entry.path)) {
      sources.push(entry.path);
    } else if (name === PY_TYPED) {
      markerDirs.push(dirname(entry.path));
    }
  }
  if (markerDirs.length === 0 || sources.length === 0) {
    return false;
  }
  return sources.every((source) => markerDirs.some((dir) => isUnder(source, dir)));
}

/**
 * Paths as they would sit in site-packages: the sdist root directory and
 * a `src/` layout prefix are stripped, metadata directories dropped.
 */
export function installedPaths(entries: ArtifactEntry[], kind: ArtifactKind): string[] {
  let paths = entries.filter((entry) => !entry.isDirectory).map((entry) => entry.path);

  if (kind === 'sdist') {
    const first = paths[0]?.split('/')[0];
    if (first !== undefined && paths.every((path) => path.startsWith(`${first}/`))) {
      paths = paths.map((path) => path.slice(first.length + 1));
    }
    if (paths.some((path) => path.startsWith('src/') && isSource(path))) {
      paths = paths.filter((path) => path.startsWith('src/')).map((path) => path.slice(4));
    }
  }

  return paths.filter((path) => {
    const top = path.split('/')[0];
    return !METADATA_SUFFIXES.some((suffix) => top.endsWith(suffix));
  });
}

/**
 * Top-level package directories holding Python sources. A directory
 * without `__init__.py(i)` and without sources of its own is a namespace
 * package and is replaced by its subpackages.
 */
export function moduleRoots(paths: string[]): string[] {
  const roots: string[] = [];

  const visit = (dir: string) => {
    const prefix = dir === '' ? '' : `${dir}/`;
    const below = paths.filter((path) => path.startsWith(prefix));
    const children = new Set<string>();
    for (const path of below) {
      const rest = path.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash !== -1 && isSource(rest)) {
        children.add(rest.slice(0, slash));
      }
    }
    for (const child of [...children].sort()) {
      const childDir = `${prefix}${child}`;
      const direct = paths.filter((path) => dirname(path) === childDir);
      const isNamespace =
        !direct.some((path) => /\/__init__\.pyi?$/.test(path)) && !direct.some(isSource);
      if (isNamespace) {
        visit(childDir);
      } else {
        roots.push(childDir);
      }
    }
  };

  visit('');
  return roots;
}

function matchesModule(root: string, moduleName: string): boolean {
  const key = root.replace(/\//g, '_').toLowerCase();
  const name = moduleName.toLowerCase();
  return key === name || key === `${name}-stubs`;
}

/**
 * Every module root of the package holds a `py.typed` marker. When some
 * roots match the importable module name, only those are considered.
 */
export function checkModuleRoots(
  entries: ArtifactEntry[],
  kind: ArtifactKind,
  moduleName: string,
): boolean {
  const paths = installedPaths(entries, kind);
  const roots = moduleRoots(paths);
  const matching = roots.filter((root) => matchesModule(root, moduleName));
  const considered = matching.length > 0 ? matching : roots;
  if (considered.length === 0) {
    return false;
  }
  const files = new Set(paths);
  return considered.every((root) => files.has(`${root}/${PY_TYPED}`));
}
