/* src/runner/version.ts
 * Package version lookup for `--version`.
 */
import { readFileSync } from 'node:fs';

export const PACKAGE_NAME = 'script-debugger';

/** Read the version from this package's package.json (two levels above src/runner). */
export const getVersion = (): string => {
  const pkgUrl = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(pkgUrl, 'utf8'));
  return pkg &&
    typeof pkg === 'object' &&
    'version' in pkg &&
    typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
};

export const printVersion = (): void => {
  console.log(`${PACKAGE_NAME} ${getVersion()}`);
};
