import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const UNKNOWN_PACKAGE: PackageInfo = { name: 'issuescout', version: '0.0.0', description: '' };

/**
 * Reads the nearest package.json above this file, so it resolves the same way
 * from src/ under the test runner and from the bundled dist/ entry.
 */
export function getPackageInfo(): PackageInfo {
  let dir = dirname(fileURLToPath(import.meta.url));

  while (true) {
    const info = readPackageJson(join(dir, 'package.json'));
    if (info) return info;

    const parent = dirname(dir);
    if (parent === dir) return UNKNOWN_PACKAGE;
    dir = parent;
  }
}

function readPackageJson(path: string): PackageInfo | null {
  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }

  if (typeof pkg !== 'object' || pkg === null) return null;
  const name = 'name' in pkg ? pkg.name : undefined;
  const version = 'version' in pkg ? pkg.version : undefined;
  const description = 'description' in pkg ? pkg.description : undefined;
  if (typeof version !== 'string') return null;

  return {
    name: typeof name === 'string' ? name : UNKNOWN_PACKAGE.name,
    version,
    description: typeof description === 'string' ? description : '',
  };
}
