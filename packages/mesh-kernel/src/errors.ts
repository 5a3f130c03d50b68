/**
 * Mesh error types.
 *
 * Each failure class is its own type so callers can tell bad geometry
 * from bad configuration from a misuse of the registry API.
 */

/** Base class for every error the kernel raises. */
export abstract class MeshError extends Error {
  abstract readonly kind: MeshErrorKind;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export type MeshErrorKind =
  | 'degenerate-geometry'
  | 'configuration'
  | 'type-contract'
  | 'unsupported'
  | 'render';

/** Zero-length edge: both endpoints at the same location. */
export class DegenerateGeometryError extends MeshError {
  readonly kind = 'degenerate-geometry';
}

/** Wrong arity or shape: vertex count, grading length, cell counts, point arrays, labels. */
export class ConfigurationError extends MeshError {
  readonly kind = 'configuration';
}

/** A registry operation received a value of the wrong class. */
export class TypeContractError extends MeshError {
  readonly kind = 'type-contract';
}

/** A feature the writer does not implement. */
export class UnsupportedFeatureError extends MeshError {
  readonly kind = 'unsupported';
}

/** An element could not be written, e.g. it references a point unknown to the mesh. */
export class RenderError extends MeshError {
  readonly kind = 'render';

  constructor(
    message: string,
    public readonly element?: string,
  ) {
    super(message);
  }
}
