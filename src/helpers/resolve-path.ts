import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

export function resolvePath(moduleUrl: string, relativePath: string): string {
  return resolve(dirname(fileURLToPath(moduleUrl)), relativePath);
}
