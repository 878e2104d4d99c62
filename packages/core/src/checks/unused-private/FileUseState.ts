import type { Node } from '@babel/types';
import type { RegistryScope } from '@propsweep/types';
import type { CodingConvention } from '../../ast/CodingConvention.js';
import { ClassRegistry } from './ClassRegistry.js';

/**
 * A constructor may be called only from other files, so its name counts as
 * read in every file.
 */
export const CONSTRUCTOR_NAME = 'constructor';

export interface Candidate {
  node: Node;
  name: string;
}

/**
 * Uses and candidates of one file. Created at file entry, consumed at
 * file exit.
 *
 * Used names are keyed by property name only: a read of `a.count` also
 * keeps an unrelated private `this.count` alive.
 */
export class FileUseState {
  private readonly used = new Set<string>([CONSTRUCTOR_NAME]);
  private readonly candidates: Candidate[] = [];

  constructor(
    readonly file: string,
    readonly registry: ClassRegistry
  ) {}

  markUsed(name: string): void {
    this.used.add(name);
  }

  isUsed(name: string): boolean {
    return this.used.has(name);
  }

  addCandidate(node: Node, name: string): void {
    this.candidates.push({ node, name });
  }

  /**
   * Candidates whose name nothing in the file reads, in encounter order.
   */
  unusedCandidates(): Candidate[] {
    return this.candidates.filter(candidate => !this.isUsed(candidate.name));
  }
}

/**
 * State of one analyzer run: the class registry shared by its files when
 * the registry scope is whole-compilation.
 */
export class CompilationState {
  private readonly sharedRegistry = new ClassRegistry();

  constructor(
    readonly registryScope: RegistryScope,
    readonly convention: CodingConvention
  ) {}

  enterFile(file: string): FileUseState {
    const registry = this.registryScope === 'per-file' ? new ClassRegistry() : this.sharedRegistry;
    return new FileUseState(file, registry);
  }
}
