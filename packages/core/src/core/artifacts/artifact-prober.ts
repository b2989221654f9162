import { join } from 'path';
import type {
  ArtifactCheck,
  ArtifactCheckResult,
  ArtifactDescriptor,
  ArtifactReport,
  Component
} from '../../types/index.js';
import { ARCHIVE_PATTERN, INSTALL_LAYOUT } from '../../constants/index.js';
import { probeEntry } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { deriveHeaderDirName } from '../naming.js';
import type { ComponentRegistry } from '../registry/registry.js';
import { defaultRegistry } from '../registry/registry.js';

/**
 * Expand one descriptor to the filesystem check it stands for.
 * Toolchain output is tracked by the toolchain itself and has no check.
 */
function descriptorCheck(component: Component, descriptor: ArtifactDescriptor, installRoot: string): ArtifactCheck | null {
  switch (descriptor.type) {
    case 'package-config':
      return {
        descriptor: descriptor.type,
        path: join(installRoot, INSTALL_LAYOUT.PACKAGE_CONFIG, component.id),
        expect: 'directory'
      };
    case 'archive':
      return {
        descriptor: descriptor.type,
        path: join(installRoot, INSTALL_LAYOUT.LIB, `${ARCHIVE_PATTERN.PREFIX}${descriptor.library ?? component.id}${ARCHIVE_PATTERN.SUFFIX}`),
        expect: 'file'
      };
    case 'headers':
      return {
        descriptor: descriptor.type,
        path: descriptor.path
          ? join(installRoot, INSTALL_LAYOUT.INCLUDE, descriptor.path)
          : join(installRoot, INSTALL_LAYOUT.FAMILY_INCLUDE, deriveHeaderDirName(component.id)),
        expect: 'directory'
      };
    case 'executable':
      return {
        descriptor: descriptor.type,
        path: join(installRoot, INSTALL_LAYOUT.BIN, descriptor.name),
        expect: 'file'
      };
    case 'toolchain-output':
      return null;
  }
}

/**
 * Whether a component's artifacts can be trusted to say it is built.
 * Managed-language toolchains keep their own incremental state.
 */
export function isAuthoritative(component: Component): boolean {
  return component.kind !== 'managed-client';
}

/**
 * The filesystem checks a component's artifacts expand to under `installRoot`.
 */
export function artifactPaths(component: Component, installRoot: string): ArtifactCheck[] {
  const checks: ArtifactCheck[] = [];
  for (const descriptor of component.artifacts) {
    const check = descriptorCheck(component, descriptor, installRoot);
    if (check) {
      checks.push(check);
    }
  }
  return checks;
}

/**
 * Run every check for a component and report each outcome.
 * Filesystem failures are recorded as `error` and never thrown.
 */
export async function probeArtifacts(component: Component, installRoot: string): Promise<ArtifactReport> {
  const checks: ArtifactCheckResult[] = [];

  for (const check of artifactPaths(component, installRoot)) {
    const outcome = await probeEntry(check.path, check.expect);
    if (outcome.status === 'error') {
      logger.debug(outcome.error.message, { code: outcome.error.code, componentId: component.id });
      checks.push({ ...check, status: 'error', detail: outcome.error.message });
    } else {
      checks.push({ ...check, status: outcome.status });
    }
  }

  const authoritative = isAuthoritative(component);
  const built = authoritative
    && checks.length > 0
    && checks.every(result => result.status === 'present');

  return { componentId: component.id, authoritative, built, checks };
}

/**
 * Whether `componentId` has a complete set of build artifacts under `installRoot`.
 *
 * A partial set (e.g. archive without headers) is not built. Unknown ids,
 * managed-language clients and filesystem errors all report false, since a
 * redundant rebuild is always safe.
 */
export async function isBuilt(
  componentId: string,
  installRoot: string,
  registry: ComponentRegistry = defaultRegistry()
): Promise<boolean> {
  const component = registry.lookup(componentId);
  if (!component) {
    logger.debug(`Cannot probe unknown component '${componentId}'`);
    return false;
  }

  const report = await probeArtifacts(component, installRoot);
  if (!report.authoritative) {
    logger.debug(`Build state of ${componentId} is managed by its toolchain; reporting not built`);
  }
  return report.built;
}
