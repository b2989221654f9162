/**
 * Tests for environment-driven configuration
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { loadResolverConfig, resolveInstallRoot } from '../../packages/core/src/core/config.js';
import { ConfigError } from '../../packages/core/src/utils/errors.js';

describe('loadResolverConfig', () => {
  const cwd = path.resolve('/work/bench');

  it('should default to ./install without verbose logging', () => {
    assert.deepEqual(loadResolverConfig({ env: {}, cwd }), {
      installDir: path.join(cwd, 'install'),
      verbose: false
    });
  });

  it('should resolve a relative install dir against the working directory', () => {
    const config = loadResolverConfig({ env: { RESOLVER_INSTALL_DIR: 'out/install' }, cwd });
    assert.equal(config.installDir, path.join(cwd, 'out', 'install'));
  });

  it('should keep an absolute install dir', () => {
    const installDir = path.resolve('/opt/bench/install');
    const config = loadResolverConfig({ env: { RESOLVER_INSTALL_DIR: installDir }, cwd });
    assert.equal(config.installDir, installDir);
  });

  it('should read the verbose flag', () => {
    assert.equal(loadResolverConfig({ env: { RESOLVER_VERBOSE: '1' }, cwd }).verbose, true);
    assert.equal(loadResolverConfig({ env: { RESOLVER_VERBOSE: 'false' }, cwd }).verbose, false);
    assert.equal(loadResolverConfig({ env: { RESOLVER_VERBOSE: ' Yes ' }, cwd }).verbose, true);
  });

  it('should reject unrecognised flag values', () => {
    assert.throws(
      () => loadResolverConfig({ env: { RESOLVER_VERBOSE: 'maybe' }, cwd }),
      (error: unknown) =>
        error instanceof ConfigError
        && error.message === "Invalid value for RESOLVER_VERBOSE: 'maybe' (expected 1/0, true/false or yes/no)"
    );
  });
});

describe('resolveInstallRoot', () => {
  const config = { installDir: path.resolve('/work/bench/install'), verbose: false };

  it('should fall back to the configured install dir', () => {
    assert.equal(resolveInstallRoot(undefined, config), config.installDir);
    assert.equal(resolveInstallRoot('  ', config), config.installDir);
  });

  it('should resolve an explicit root against the working directory', () => {
    const cwd = path.resolve('/elsewhere');
    assert.equal(resolveInstallRoot('install', config, cwd), path.join(cwd, 'install'));
  });
});
