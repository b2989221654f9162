import type { KindHint } from '../types/index.js';
import { NAMING } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Name normalization: pure string transforms from caller shorthand to
 * canonical registry ids, plus names derived from canonical ids.
 * Nothing here consults the registry; unknown ids surface at lookup.
 */

const KIND_HINT_ALIASES: Record<string, KindHint> = {
  runner: 'runner',
  client: 'client',
  dependency: 'dependency',
  dep: 'dependency'
};

/**
 * Parse a kind hint as written on the command line.
 */
export function parseKindHint(value: string): KindHint {
  const hint = KIND_HINT_ALIASES[value.trim().toLowerCase()];
  if (!hint) {
    throw new ValidationError(`unknown component kind '${value}' (expected runner, client or dependency)`, { kind: value });
  }
  return hint;
}

/**
 * Map a raw component name to its canonical id.
 *
 * Runner shorthand gains the runner-family prefix: `c` and `s3-c` both become
 * `runner-s3-c`. Names already carrying `runner-`, and names with any other
 * hint, are returned as given.
 */
export function normalizeComponent(kindHint: KindHint | undefined, rawName: string): string {
  const name = rawName.trim();
  if (kindHint !== 'runner' || name.startsWith(NAMING.RUNNER_PREFIX)) {
    return name;
  }
  if (name.startsWith(NAMING.RUNNER_FAMILY)) {
    return `${NAMING.RUNNER_PREFIX}${name}`;
  }
  return `${NAMING.RUNNER_PREFIX}${NAMING.RUNNER_FAMILY}${name}`;
}

/**
 * Include-directory leaf name for a library: the id without its
 * library-family prefix (`aws-c-http` -> `http`, `aws-checksums` -> `checksums`).
 */
export function deriveHeaderDirName(componentId: string): string {
  for (const prefix of NAMING.LIBRARY_FAMILY_PREFIXES) {
    if (componentId.startsWith(prefix) && componentId.length > prefix.length) {
      return componentId.slice(prefix.length);
    }
  }
  return componentId;
}
