/**
 * Tests for build and rebuild plans
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { buildPlan, rebuildPlan } from '../../packages/core/src/core/plan/build-plan.js';
import { DependencyGraph } from '../../packages/core/src/core/graph/dependency-graph.js';
import { ComponentRegistry } from '../../packages/core/src/core/registry/registry.js';
import { UnknownComponentError } from '../../packages/core/src/utils/errors.js';
import { installAwsLc, installNative, makeInstallRoot, removeDir } from '../test-helpers.js';

describe('buildPlan', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeInstallRoot();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should build the whole chain into an empty install root', async () => {
    const plan = await buildPlan('aws-c-io', root);
    assert.deepEqual(plan, {
      target: 'aws-c-io',
      build: ['aws-c-common', 'aws-lc', 's2n', 'aws-c-cal', 'aws-c-io'],
      skipped: []
    });
  });

  it('should skip components that are already installed', async () => {
    await installNative(root, 'aws-c-common');
    await installAwsLc(root);

    const plan = await buildPlan('aws-c-io', root);
    assert.deepEqual(plan.build, ['s2n', 'aws-c-cal', 'aws-c-io']);
    assert.deepEqual(plan.skipped, ['aws-c-common', 'aws-lc']);
  });

  it('should always build managed-language clients', async () => {
    const plan = await buildPlan('runner-s3-rust', root);
    assert.deepEqual(plan.build, ['aws-s3-transfer-manager-rs', 'runner-s3-rust']);
  });

  it('should reject unknown components', async () => {
    await assert.rejects(buildPlan('nope', root), UnknownComponentError);
  });

  it('should use the registry it is given', async () => {
    const registry = new ComponentRegistry([
      { id: 'lib', kind: 'native-dependency', artifacts: [{ type: 'package-config' }] },
      { id: 'app', kind: 'native-client', dependencies: ['lib'], artifacts: [{ type: 'package-config' }] }
    ]);
    const plan = await buildPlan('app', root, { registry });
    assert.deepEqual(plan.build, ['lib', 'app']);
  });
});

describe('rebuildPlan', () => {
  it('should clear dependents first and rebuild them last', () => {
    assert.deepEqual(rebuildPlan('aws-c-auth'), {
      target: 'aws-c-auth',
      clear: ['runner-s3-c', 'aws-c-s3', 'aws-c-auth'],
      build: [
        'aws-c-common',
        'aws-lc',
        's2n',
        'aws-c-cal',
        'aws-c-io',
        'aws-c-compression',
        'aws-c-http',
        'aws-c-sdkutils',
        'aws-c-auth',
        'aws-c-s3',
        'runner-s3-c'
      ]
    });
  });

  it('should only clear the target when nothing depends on it', () => {
    const plan = rebuildPlan('runner-s3-python');
    assert.deepEqual(plan.clear, ['runner-s3-python']);
    assert.deepEqual(plan.build, ['aws-crt-python', 'runner-s3-python']);
  });

  it('should use the graph it is given', () => {
    const graph = new DependencyGraph(new ComponentRegistry([
      { id: 'base', kind: 'native-dependency', artifacts: [] },
      { id: 'top', kind: 'native-client', dependencies: ['base'], artifacts: [] }
    ]));
    assert.deepEqual(rebuildPlan('base', { graph }), { target: 'base', clear: ['top', 'base'], build: ['base', 'top'] });
  });
});
