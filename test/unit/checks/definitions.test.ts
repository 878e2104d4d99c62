/**
 * Candidate definition recognizer tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ClassRegistry,
  CompilationState,
  DefaultCodingConvention,
  InvariantViolationError,
  isCandidatePropertyDefinition,
} from '@propsweep/core';
import { findMember, parseExpression } from '../../helpers/paths.js';

function isDefinition(code: string, name: string, registry: ClassRegistry = new ClassRegistry()): boolean {
  return isCandidatePropertyDefinition(findMember(code, name).node, registry);
}

describe('isCandidatePropertyDefinition', () => {
  it('should accept properties of this', () => {
    assert.strictEqual(isDefinition('this.x = 1;', 'x'), true);
  });

  it('should accept prototype members', () => {
    assert.strictEqual(isDefinition('Foo.prototype.run = function() {};', 'run'), true);
  });

  it('should reject statics of an unknown class', () => {
    assert.strictEqual(isDefinition('Foo.bar = 1;', 'bar'), false);
  });

  it('should accept statics of a registered class', () => {
    const registry = new ClassRegistry();
    registry.record('Foo');
    assert.strictEqual(isDefinition('Foo.bar = 1;', 'bar', registry), true);
  });

  it('should match registered dotted names', () => {
    const registry = new ClassRegistry();
    registry.record('ns.Foo');
    assert.strictEqual(isDefinition('ns.Foo.bar = 1;', 'bar', registry), true);
    assert.strictEqual(isDefinition('other.Foo.bar = 1;', 'bar', registry), false);
  });

  it('should throw InvariantViolationError for computed access', () => {
    assert.throws(
      () => isCandidatePropertyDefinition(parseExpression('this[x];'), new ClassRegistry()),
      InvariantViolationError
    );
  });
});

describe('ClassRegistry', () => {
  it('should record names once', () => {
    const registry = new ClassRegistry();
    registry.record('Foo');
    registry.record('Foo');
    assert.strictEqual(registry.size, 1);
    assert.strictEqual(registry.has('Foo'), true);
    assert.strictEqual(registry.has('Bar'), false);
  });
});

describe('CompilationState', () => {
  it('should seed every file with the constructor name', () => {
    const uses = new CompilationState('per-file', new DefaultCodingConvention()).enterFile('a.js');
    assert.strictEqual(uses.isUsed('constructor'), true);
    assert.strictEqual(uses.isUsed('x'), false);
  });

  it('should give each file a fresh registry with per-file scope', () => {
    const state = new CompilationState('per-file', new DefaultCodingConvention());
    state.enterFile('a.js').registry.record('Foo');
    assert.strictEqual(state.enterFile('b.js').registry.has('Foo'), false);
  });

  it('should share the registry with whole-compilation scope', () => {
    const state = new CompilationState('whole-compilation', new DefaultCodingConvention());
    state.enterFile('a.js').registry.record('Foo');
    assert.strictEqual(state.enterFile('b.js').registry.has('Foo'), true);
  });

  it('should list unused candidates in encounter order', () => {
    const uses = new CompilationState('per-file', new DefaultCodingConvention()).enterFile('a.js');
    const node = parseExpression('this.x;');
    uses.addCandidate(node, 'b');
    uses.addCandidate(node, 'a');
    uses.addCandidate(node, 'c');
    uses.markUsed('c');
    assert.deepStrictEqual(uses.unusedCandidates().map(candidate => candidate.name), ['b', 'a']);
  });
});
