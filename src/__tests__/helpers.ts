import type { PlainObject } from '../composer/document';
import type { Plugin } from '../plugins/types';

/** In-memory plugin; no directory behind it. */
export function makePlugin(
  name: string,
  declarations: PlainObject[] = [],
  dependsOn: string[] = [],
  extra: Partial<Plugin> = {}
): Plugin {
  return {
    name,
    version: '0.0.1',
    description: '',
    author: '',
    license: '',
    dependsOn: new Set(dependsOn),
    declarations,
    declarationFiles: [],
    sourceRefs: [],
    sourceImports: [],
    directory: `/plugins/${name}`,
    lastModified: 0,
    ...extra,
  };
}
