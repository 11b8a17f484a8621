import { relative, isAbsolute } from 'node:path';

/** Path as shown to the operator: relative to `root` when it lies inside it. */
export function displayPath(filePath: string, root: string): string {
  const rel = relative(root, filePath);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return filePath;
  return rel;
}
