/**
 * Tests for component name normalization
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  normalizeComponent,
  deriveHeaderDirName,
  parseKindHint
} from '../../packages/core/src/core/naming.js';
import { ValidationError } from '../../packages/core/src/utils/errors.js';

describe('normalizeComponent', () => {
  it('should prefix bare runner names', () => {
    assert.equal(normalizeComponent('runner', 'c'), 'runner-s3-c');
    assert.equal(normalizeComponent('runner', 'rust'), 'runner-s3-rust');
  });

  it('should add only the runner prefix to family-qualified names', () => {
    assert.equal(normalizeComponent('runner', 's3-java'), 'runner-s3-java');
  });

  it('should leave fully-qualified runner ids unchanged', () => {
    assert.equal(normalizeComponent('runner', 'runner-s3-python'), 'runner-s3-python');
  });

  it('should leave names with other hints unchanged', () => {
    assert.equal(normalizeComponent('client', 'aws-c-s3'), 'aws-c-s3');
    assert.equal(normalizeComponent('dependency', 'c'), 'c');
    assert.equal(normalizeComponent(undefined, 'c'), 'c');
  });

  it('should trim surrounding whitespace', () => {
    assert.equal(normalizeComponent('runner', '  c '), 'runner-s3-c');
    assert.equal(normalizeComponent(undefined, ' aws-lc\n'), 'aws-lc');
  });
});

describe('deriveHeaderDirName', () => {
  it('should strip the two-segment family prefix', () => {
    assert.equal(deriveHeaderDirName('aws-c-common'), 'common');
    assert.equal(deriveHeaderDirName('aws-c-http'), 'http');
    assert.equal(deriveHeaderDirName('aws-c-s3'), 's3');
  });

  it('should strip the one-segment family prefix', () => {
    assert.equal(deriveHeaderDirName('aws-checksums'), 'checksums');
    assert.equal(deriveHeaderDirName('aws-lc'), 'lc');
  });

  it('should return ids outside the family unchanged', () => {
    assert.equal(deriveHeaderDirName('s2n'), 's2n');
  });
});

describe('parseKindHint', () => {
  it('should accept known hints in any case', () => {
    assert.equal(parseKindHint('runner'), 'runner');
    assert.equal(parseKindHint('Client'), 'client');
    assert.equal(parseKindHint('dependency'), 'dependency');
  });

  it('should accept dep as an alias', () => {
    assert.equal(parseKindHint('dep'), 'dependency');
  });

  it('should reject unknown hints', () => {
    assert.throws(() => parseKindHint('tool'), ValidationError);
  });
});
