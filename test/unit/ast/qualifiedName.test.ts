/**
 * Qualified name tests
 *
 * Tests:
 * - Dotted names of member chains
 * - Names functions and classes are bound to
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { getQualifiedName, getBestLValueName, getObjectKeyName } from '@propsweep/core';
import { findFirstOfType, parseExpression } from '../../helpers/paths.js';

describe('getQualifiedName', () => {
  it('should name identifiers and member chains', () => {
    assert.strictEqual(getQualifiedName(parseExpression('x;')), 'x');
    assert.strictEqual(getQualifiedName(parseExpression('a.b.c;')), 'a.b.c');
    assert.strictEqual(getQualifiedName(parseExpression('this.x;')), 'this.x');
    assert.strictEqual(getQualifiedName(parseExpression('a?.b;')), 'a.b');
  });

  it('should return undefined for computed access and calls', () => {
    assert.strictEqual(getQualifiedName(parseExpression('a[b].c;')), undefined);
    assert.strictEqual(getQualifiedName(parseExpression('foo().bar;')), undefined);
  });
});

describe('getObjectKeyName', () => {
  it('should name identifier, string and numeric keys', () => {
    assert.strictEqual(getObjectKeyName(parseExpression('count;')), 'count');
    assert.strictEqual(getObjectKeyName(parseExpression("('count');")), 'count');
    assert.strictEqual(getObjectKeyName(parseExpression('42;')), '42');
    assert.strictEqual(getObjectKeyName(parseExpression('a.b;')), undefined);
  });
});

describe('getBestLValueName', () => {
  it('should use a declaration\'s own name', () => {
    assert.strictEqual(getBestLValueName(findFirstOfType('function Foo() {}', 'FunctionDeclaration')), 'Foo');
    assert.strictEqual(getBestLValueName(findFirstOfType('class Foo {}', 'ClassDeclaration')), 'Foo');
  });

  it('should use the variable a function is assigned to', () => {
    assert.strictEqual(getBestLValueName(findFirstOfType('var Foo = function() {};', 'FunctionExpression')), 'Foo');
  });

  it('should prefer the binding over a class expression\'s own name', () => {
    assert.strictEqual(getBestLValueName(findFirstOfType('var Bar = class Foo {};', 'ClassExpression')), 'Bar');
  });

  it('should use a dotted assignment target', () => {
    assert.strictEqual(getBestLValueName(findFirstOfType('ns.Foo = class {};', 'ClassExpression')), 'ns.Foo');
  });

  it('should join an object literal owner and key', () => {
    const path = findFirstOfType('const ns = { Foo: function() {} };', 'FunctionExpression');
    assert.strictEqual(getBestLValueName(path), 'ns.Foo');
  });

  it('should look through conditional branches', () => {
    const path = findFirstOfType('x = cond ? function() {} : null;', 'FunctionExpression');
    assert.strictEqual(getBestLValueName(path), 'x');
  });

  it('should return undefined for anonymous arguments', () => {
    assert.strictEqual(getBestLValueName(findFirstOfType('foo(class {});', 'ClassExpression')), undefined);
  });
});
