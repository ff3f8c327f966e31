/**
 * @module errors
 * Error types raised while validating, resolving and rendering a descriptor.
 *
 * Every failure is fatal: the first error aborts the render and no output
 * is produced.
 */

/** Category of a descriptor failure. */
export type DescriptorErrorKind = 'structural' | 'semantic' | 'resource';

/**
 * Base class for all engine errors.
 * `path` locates the offending value in the descriptor (`''` is the root).
 */
export class DescriptorError extends Error {
  readonly kind: DescriptorErrorKind;
  readonly path: string;

  constructor(kind: DescriptorErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(path ? `${path}: ${message}` : message, options);
    this.name = 'DescriptorError';
    this.kind = kind;
    this.path = path;
  }
}

/** The descriptor does not match the schema. */
export class StructuralError extends DescriptorError {
  /** Every schema issue found, formatted as `path: message`. */
  readonly issues: string[];

  constructor(path: string, message: string, issues: string[] = []) {
    super('structural', path, message);
    this.name = 'StructuralError';
    this.issues = issues;
  }
}

/** The descriptor is well-formed but cannot be resolved or rendered. */
export class SemanticError extends DescriptorError {
  constructor(path: string, message: string) {
    super('semantic', path, message);
    this.name = 'SemanticError';
  }
}

/** An external file could not be read or decoded. */
export class ResourceError extends DescriptorError {
  constructor(path: string, message: string, cause?: unknown) {
    super('resource', path, message, cause === undefined ? undefined : { cause });
    this.name = 'ResourceError';
  }
}

/** Join a parent path and a child segment: `joinPath('patches[0]', 'color')`. */
export function joinPath(parent: string, segment: string | number): string {
  if (typeof segment === 'number') return `${parent}[${segment}]`;
  return parent ? `${parent}.${segment}` : segment;
}
