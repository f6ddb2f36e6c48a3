import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Either, Schema } from 'effect';

const PackageJson = Schema.Struct({ version: Schema.optional(Schema.String) });

function readPackageVersion(): string | undefined {
  const here = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(here, '..', '..', 'package.json');
  try {
    const decoded = Schema.decodeUnknownEither(Schema.parseJson(PackageJson))(readFileSync(pkgPath, 'utf8'));
    return Either.isRight(decoded) ? decoded.right.version : undefined;
  } catch (error) {
    console.warn('[everyfind] Cannot read package.json:', error);
    return undefined;
  }
}

export function getCliVersion(): string {
  const envVersion = process.env.EVERYFIND_VERSION?.trim();
  if (envVersion) {
    return envVersion;
  }
  return readPackageVersion() ?? 'unknown';
}
