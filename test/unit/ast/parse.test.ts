/**
 * Source parsing tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseSource, parserPluginsFor } from '@propsweep/core';

describe('parserPluginsFor', () => {
  it('should enable TypeScript only for TypeScript files', () => {
    assert.ok(parserPluginsFor('a.ts').includes('typescript'));
    assert.ok(parserPluginsFor('a.mts').includes('typescript'));
    assert.ok(!parserPluginsFor('a.js').includes('typescript'));
  });

  it('should enable JSX for .js, .jsx and .tsx but not .ts', () => {
    assert.ok(parserPluginsFor('a.js').includes('jsx'));
    assert.ok(parserPluginsFor('a.jsx').includes('jsx'));
    assert.ok(parserPluginsFor('a.tsx').includes('jsx'));
    assert.ok(!parserPluginsFor('a.ts').includes('jsx'));
  });
});

describe('parseSource', () => {
  it('should parse TypeScript class members', () => {
    const ast = parseSource('class A {\n  private x = 1;\n}', 'a.ts');
    assert.strictEqual(ast.program.body[0]?.type, 'ClassDeclaration');
  });

  it('should parse JSX', () => {
    const ast = parseSource('const el = <div />;', 'a.jsx');
    assert.strictEqual(ast.program.body.length, 1);
  });

  it('should keep JSDoc comments attached', () => {
    const ast = parseSource('/** @private */\nthis.x = 1;', 'a.js');
    assert.strictEqual(ast.program.body[0]?.leadingComments?.[0]?.value, '* @private ');
  });

  it('should throw for source it cannot parse', () => {
    assert.throws(() => parseSource('}', 'bad.js'), SyntaxError);
  });
});
