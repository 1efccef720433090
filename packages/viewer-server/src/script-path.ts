import { dirname, extname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Absolute path of the standalone companion script (`serve.ts`, or
 * `serve.js` once built), the file users run next to their viewer.
 * @public
 */
export function getViewerScriptPath(): string {
  const here = fileURLToPath(import.meta.url);
  return join(dirname(here), `serve${extname(here)}`);
}
