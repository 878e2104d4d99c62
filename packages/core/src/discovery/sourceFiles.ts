/**
 * Source file discovery for project runs.
 *
 * Walks the project directory, skipping hidden directories and
 * node_modules, and keeps files with a source extension. Declaration files
 * (`.d.ts`) hold no implementations and are skipped.
 */

import { readdirSync } from 'fs';
import { join, relative, extname } from 'path';
import { minimatch } from 'minimatch';
import { SOURCE_EXTENSIONS } from '../ast/parse.js';

export interface DiscoveryFilter {
  include?: readonly string[];
  exclude?: readonly string[];
}

/**
 * Check if path matches pattern using minimatch.
 * Normalizes path separators for cross-platform compatibility.
 */
export function matchesPattern(path: string, pattern: string): boolean {
  const normalizedPath = path.replace(/\\/g, '/');
  const normalizedPattern = pattern.replace(/\\/g, '/');
  return minimatch(normalizedPath, normalizedPattern, { dot: true });
}

export function isSourceFile(path: string): boolean {
  if (/\.d\.[mc]?ts$/.test(path)) {
    return false;
  }
  return SOURCE_EXTENSIONS.includes(extname(path).toLowerCase());
}

/**
 * Whether a project-relative path passes include/exclude. Without include
 * every path is included; exclude always wins.
 */
export function isSelected(relativePath: string, filter: DiscoveryFilter): boolean {
  const { include, exclude } = filter;
  if (include !== undefined && !include.some(pattern => matchesPattern(relativePath, pattern))) {
    return false;
  }
  return !(exclude ?? []).some(pattern => matchesPattern(relativePath, pattern));
}

/**
 * Source files under `dir`, as absolute paths in sorted order. Patterns are
 * matched against paths relative to `base`.
 */
export function discoverSourceFiles(dir: string, filter: DiscoveryFilter = {}, base: string = dir): string[] {
  const results: string[] = [];

  function walk(current: string): void {
    const entries = readdirSync(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.') || entry.name === 'node_modules') continue;

      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && isSourceFile(entry.name) && isSelected(relative(base, fullPath), filter)) {
        results.push(fullPath);
      }
    }
  }

  walk(dir);
  return results.sort();
}
