/**
 * UnusedPrivatePropertyCheck - reports private properties and methods that
 * nothing in their file reads.
 *
 * Per file, two things are collected during one post-order walk:
 * - used names: every property name read anywhere in the file, keyed by name
 *   alone (`a.count_` keeps `this.count_` alive)
 * - candidates: private declarations, i.e. `this.x`, `Foo.x` (Foo a known
 *   class), `Foo.prototype.x` in definition position, class methods and
 *   TypeScript class fields
 *
 * At the end of the file every candidate whose name was never used is
 * reported. A finding is emitted per candidate, so a property declared twice
 * is reported twice.
 *
 * Known classes come from class syntax and from functions annotated
 * `@constructor`, `@interface` or `@record`.
 */

import traverseModule, { type NodePath, type TraverseOptions } from '@babel/traverse';
import type { File, Node } from '@babel/types';
import type { CheckMetadata, FindingSink } from '@propsweep/types';
import { Check, type CheckContext, type CheckSession } from '../Check.js';
import { getTraverseFunction } from '../../ast/babelTraverse.js';
import { resolveVisibility } from '../../ast/jsdoc.js';
import { getBestLValueName } from '../../ast/qualifiedName.js';
import { InvariantViolationError } from '../../errors/PropsweepError.js';
import { DIAGNOSTIC_TYPES, formatDiagnosticMessage } from '../../diagnostics/types.js';
import { CompilationState, FileUseState } from './FileUseState.js';
import { isCandidatePropertyDefinition } from './definitions.js';
import { isPinningPropertyUse } from './pinning.js';
import { declaresClass, isCheckablePrivateDeclaration } from './visibility.js';
import { classifyEnter, classifyExit, type PassEvent } from './events.js';

const traverse = getTraverseFunction(traverseModule);

const UNUSED_PRIVATE_PROPERTY = DIAGNOSTIC_TYPES.UNUSED_PRIVATE_PROPERTY;

export interface TraversalState {
  readonly compilation: CompilationState;
  readonly file: string;
  readonly sink: FindingSink;
  /** Set between file-enter and file-exit */
  current: FileUseState | undefined;
}

const VISITOR: TraverseOptions<TraversalState> = {
  noScope: true,
  enter(path: NodePath, state: TraversalState) {
    const event = classifyEnter(path);
    if (event !== undefined) {
      handleEvent(event, state);
    }
  },
  exit(path: NodePath, state: TraversalState) {
    const event = classifyExit(path);
    if (event !== undefined) {
      handleEvent(event, state);
    }
  },
};

export class UnusedPrivatePropertyCheck extends Check {
  get metadata(): CheckMetadata {
    return {
      name: 'UnusedPrivatePropertyCheck',
      description: 'Reports private properties and methods that are never read in their file',
      diagnostics: [UNUSED_PRIVATE_PROPERTY.code],
    };
  }

  begin(context: CheckContext): CheckSession {
    const logger = this.log(context);
    const compilation = new CompilationState(context.registryScope, context.convention);

    return {
      checkFile: (ast: File, file: string): void => {
        const state: TraversalState = { compilation, file, sink: context.sink, current: undefined };
        traverse(ast, VISITOR, undefined, state);
        logger.debug('Checked file for unused private properties', { file });
      },
    };
  }
}

/**
 * Apply one pass event to the traversal state.
 *
 * @throws InvariantViolationError for an event outside a file scope
 */
export function handleEvent(event: PassEvent, state: TraversalState): void {
  switch (event.kind) {
    case 'file-enter':
      state.current = state.compilation.enterFile(state.file);
      return;

    case 'file-exit':
      reportUnused(currentFile(state, event), state.sink);
      state.current = undefined;
      return;

    case 'property-reference': {
      const uses = currentFile(state, event);
      if (isPinningPropertyUse(event.path) || !isCandidatePropertyDefinition(event.node, uses.registry)) {
        uses.markUsed(event.name);
      } else if (isCheckablePrivateDeclaration(event.path)) {
        uses.addCandidate(event.node, event.name);
      }
      return;
    }

    case 'method-declaration':
    case 'field-declaration': {
      const uses = currentFile(state, event);
      if (isCheckablePrivateDeclaration(event.path)) {
        uses.addCandidate(event.node, event.name);
      }
      return;
    }

    case 'object-literal':
    case 'object-pattern': {
      const uses = currentFile(state, event);
      for (const key of event.keys) {
        uses.markUsed(key);
      }
      return;
    }

    case 'call': {
      const uses = currentFile(state, event);
      const [first] = event.node.arguments;
      if (
        first !== undefined &&
        first.type === 'StringLiteral' &&
        state.compilation.convention.isPropertyRenameFunction(event.node.callee)
      ) {
        uses.markUsed(first.value);
      }
      return;
    }

    case 'function': {
      const uses = currentFile(state, event);
      if (declaresClass(resolveVisibility(event.path))) {
        recordClass(event.path, uses);
      }
      return;
    }

    case 'class':
      recordClass(event.path, currentFile(state, event));
      return;

    default:
      assertNever(event);
  }
}

function currentFile(state: TraversalState, event: PassEvent): FileUseState {
  if (state.current === undefined) {
    throw new InvariantViolationError(`Pass event '${event.kind}' outside a file scope`, {
      filePath: state.file,
      check: 'UnusedPrivatePropertyCheck',
    });
  }
  return state.current;
}

function recordClass(path: NodePath, uses: FileUseState): void {
  const name = getBestLValueName(path);
  // Anonymous: its static members are never definition sites
  if (name !== undefined) {
    uses.registry.record(name);
  }
}

function reportUnused(uses: FileUseState, sink: FindingSink): void {
  for (const candidate of uses.unusedCandidates()) {
    const { line, column } = findingLocation(candidate.node);
    sink.report({
      code: UNUSED_PRIVATE_PROPERTY.code,
      message: formatDiagnosticMessage(UNUSED_PRIVATE_PROPERTY.template, [candidate.name]),
      file: uses.file,
      line,
      column,
      args: [candidate.name],
    });
  }
}

/**
 * 1-based start of a node; 0:0 for nodes without a location.
 */
function findingLocation(node: Node): { line: number; column: number } {
  const start = node.loc?.start;
  return start === undefined ? { line: 0, column: 0 } : { line: start.line, column: start.column + 1 };
}

function assertNever(event: never): never {
  throw new InvariantViolationError('Unhandled pass event', { event: String(event) });
}
