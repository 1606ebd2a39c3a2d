/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type ErrorCode =
  | 'NotFound'
  | 'InvalidInput'
  | 'CorruptInput'
  | 'Syntax'
  | 'Structural'
  | 'Configuration'
  | 'OutputExists'
  | 'IdentityCollision'
  | 'Orphan';

/**
 * Base for every error raised by this library.
 */
export class XmlPartitionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'XmlPartitionError';
  }
}

/** Missing path, or no documents under a pattern / inside an archive. */
export class NotFoundError extends XmlPartitionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NotFound', cause);
    this.name = 'NotFoundError';
  }
}

/** Path is neither a document, a directory nor an archive. */
export class InvalidInputError extends XmlPartitionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'InvalidInput', cause);
    this.name = 'InvalidInputError';
  }
}

/** Archive exists but cannot be opened or read. */
export class CorruptInputError extends XmlPartitionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CorruptInput', cause);
    this.name = 'CorruptInputError';
  }
}

/**
 * Malformed markup. `sourceId` names the document (file path or archive entry) when known.
 */
export class XmlSyntaxError extends XmlPartitionError {
  constructor(
    public readonly reason: string,
    public readonly sourceId: string | undefined,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(
      sourceId
        ? `Malformed XML in ${sourceId} (line ${line}, column ${column}): ${reason}`
        : `Malformed XML (line ${line}, column ${column}): ${reason}`,
      'Syntax',
    );
    this.name = 'XmlSyntaxError';
  }
}

export class StructuralError extends XmlPartitionError {
  constructor(message: string) {
    super(message, 'Structural');
    this.name = 'StructuralError';
  }
}

export class ConfigurationError extends XmlPartitionError {
  constructor(message: string) {
    super(message, 'Configuration');
    this.name = 'ConfigurationError';
  }
}

export class OutputExistsError extends XmlPartitionError {
  constructor(public readonly file: string, cause?: unknown) {
    super(`Output file already exists: ${file}`, 'OutputExists', cause);
    this.name = 'OutputExistsError';
  }
}

export class IdentityCollisionError extends XmlPartitionError {
  constructor(public readonly identity: string) {
    super(`Identity "${identity}" is used by more than one element`, 'IdentityCollision');
    this.name = 'IdentityCollisionError';
  }
}

export class OrphanError extends XmlPartitionError {
  constructor(public readonly parentIdentity: string) {
    super(`No element carries the parent identity "${parentIdentity}"`, 'Orphan');
    this.name = 'OrphanError';
  }
}

/** Node fs errors carry a string `code` such as ENOENT. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}
