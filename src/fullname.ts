/**
 * Qualified model names built from the declaring file
 * @module fullname
 */

import { fileURLToPath } from 'node:url';
import type { FullnameResolver, ModelDefAny } from './types.js';

const SOURCE_EXTENSION = /\.(?:[cm]?[jt]sx?)$/;

/**
 * Split a declaring location into path segments, without the source extension
 */
function PathSegments(filename: string): string[] {
  const path = filename.startsWith('file:') ? fileURLToPath(filename) : filename;
  const segments = path.split(/[\\/]+/).filter((segment) => segment.length > 0);
  const last = segments.pop();
  if (last !== undefined) {
    const stem = last.replace(SOURCE_EXTENSION, '');
    if (stem.length > 0) {
      segments.push(stem);
    }
  }
  return segments;
}

/**
 * Keep the last `keep` segments of a path
 */
export function TruncatePath(filename: string, keep: number): string[] {
  if (keep <= 0) {
    return [];
  }
  return PathSegments(filename).slice(-keep);
}

/**
 * Qualified name with up to `keepPathParts` trailing path segments
 *
 * @example
 * ```typescript
 * GetQualifiedName('User', '/srv/app/models/user.ts', 2);
 * // 'models.user.User'
 * ```
 */
export function GetQualifiedName(name: string, filename: string | undefined, keepPathParts: number): string {
  const parts = filename === undefined ? [] : TruncatePath(filename, keepPathParts);
  return [...parts, name].join('.');
}

/**
 * Create a resolver reading each model's declared `filename`.
 *
 * Models defined without a filename resolve to their bare name.
 */
export function CreatePathFullnameResolver(): FullnameResolver {
  return {
    Resolve: (model: ModelDefAny, keepPathParts: number) =>
      GetQualifiedName(model.name, model.filename, keepPathParts),
  };
}
