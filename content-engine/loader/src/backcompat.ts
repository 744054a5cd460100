import { ResourceStore } from './resource-store.js';

/**
 * Alternative locations tried when a definition file is not where its pointer says.
 *
 * Older courses named rich-text files `x.html.xml` or `x.html.html`, and some nested them
 * one directory deeper than their category. Candidates are the path itself and every
 * suffix obtained by dropping leading directories, followed by `.html` variants of the
 * `.xml` candidates.
 */
export function backcompatPaths(filepath: string): string[] {
  let path = filepath;
  if (path.endsWith('.html.xml')) {
    path = `${path.slice(0, -'.html.xml'.length)}.html`;
  }
  if (path.endsWith('.html.html')) {
    path = path.slice(0, -'.html'.length);
  }

  const candidates: string[] = [];
  while (path.includes('/')) {
    candidates.push(path);
    path = path.slice(path.indexOf('/') + 1);
  }

  const htmlCandidates = candidates
    .filter(candidate => candidate.endsWith('.xml'))
    .map(candidate => `${candidate.slice(0, -'.xml'.length)}.html`);

  return [...candidates, ...htmlCandidates];
}

/**
 * The first existing path among `filepath` and its backcompat candidates, or `filepath`
 * itself when none exists so that the subsequent read reports the path the pointer named.
 */
export function resolveExistingPath(
  store: ResourceStore,
  filepath: string,
  accept: (candidate: string) => boolean = () => true
): string {
  if (store.exists(filepath)) {
    return filepath;
  }
  return backcompatPaths(filepath).find(candidate => accept(candidate) && store.exists(candidate)) ?? filepath;
}
