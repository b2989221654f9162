/**
 * Tests for resolver error types and handleError
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  ArtifactProbeError,
  CyclicDependencyError,
  UnknownComponentError,
  ValidationError,
  handleError
} from '../../packages/core/src/utils/errors.js';
import { ErrorCodes, ResolverError } from '../../packages/core/src/types/index.js';

describe('resolver errors', () => {
  it('should carry the offending component id', () => {
    const error = new UnknownComponentError('aws-c-nope');
    assert.equal(error.message, "Unknown component 'aws-c-nope'");
    assert.equal(error.code, ErrorCodes.UNKNOWN_COMPONENT);
    assert.deepEqual(error.details, { componentId: 'aws-c-nope' });
    assert.ok(error instanceof ResolverError);
  });

  it('should render the cycle path', () => {
    const error = new CyclicDependencyError(['A', 'B', 'A']);
    assert.equal(error.message, 'Dependency cycle detected: A -> B -> A');
    assert.deepEqual(error.cycle, ['A', 'B', 'A']);
  });

  it('should describe probe failures', () => {
    const error = new ArtifactProbeError('/install/lib', new Error('EACCES: permission denied'));
    assert.equal(error.message, 'Failed to probe artifact /install/lib: EACCES: permission denied');
    assert.equal(error.code, ErrorCodes.ARTIFACT_PROBE_FAILED);
  });
});

describe('handleError', () => {
  it('should pass resolver error messages through', () => {
    assert.deepEqual(handleError(new ValidationError('bad kind')), {
      success: false,
      error: 'Validation error: bad kind'
    });
  });

  it('should pass plain error messages through', () => {
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
  });

  it('should describe non-error values generically', () => {
    assert.deepEqual(handleError('boom'), { success: false, error: 'An unknown error occurred' });
  });
});
