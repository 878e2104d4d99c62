/**
 * Base Check class
 *
 * CHECK CONTRACT:
 *
 * 1. Metadata - name, description and the diagnostic codes it may emit
 * 2. begin() - start one analyzer run; the returned session owns every piece
 *    of mutable state for that run
 * 3. session.checkFile() - analyze one parsed file, reporting findings to
 *    the context's sink
 *
 * Sessions are never shared between runs. Two runs over the same files
 * produce the same findings.
 */

import type { File } from '@babel/types';
import type { CheckMetadata, FindingSink, Logger, RegistryScope } from '@propsweep/types';
import type { CodingConvention } from '../ast/CodingConvention.js';
import { ConsoleLogger } from '../logging/Logger.js';

export interface CheckContext {
  sink: FindingSink;
  convention: CodingConvention;
  registryScope: RegistryScope;
  /**
   * Logger instance for structured logging.
   * Use this instead of console.log for controllable verbosity.
   */
  logger?: Logger;
}

export interface CheckSession {
  checkFile(ast: File, file: string): void;
}

export abstract class Check {
  abstract get metadata(): CheckMetadata;

  abstract begin(context: CheckContext): CheckSession;

  /**
   * Logger from context, falling back to the console.
   */
  protected log(context: CheckContext): Logger {
    return context.logger ?? new ConsoleLogger('info');
  }
}
