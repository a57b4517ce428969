import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import { TOOL_NAME } from '../constants/index.js';

const manifestSchema = z.object({ name: z.string(), version: z.string() });

let cachedVersion: string | undefined;

/**
 * Version of the installed mmpkg package. Walks up from this module until
 * it finds our package.json, which works from both src/ and dist/src/.
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const file = join(dir, 'package.json');
    if (existsSync(file)) {
      const manifest = manifestSchema.safeParse(JSON.parse(readFileSync(file, 'utf8')));
      if (manifest.success && manifest.data.name === TOOL_NAME) {
        cachedVersion = manifest.data.version;
        return cachedVersion;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}
