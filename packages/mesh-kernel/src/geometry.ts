/**
 * Geometry — named external surfaces referenced by projected points,
 * edges and faces. The file path is opaque: nothing here reads it.
 */

import { ConfigurationError } from './errors.js';

const GEOMETRY_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export abstract class Geometry {
  abstract readonly kind: GeometryKind;

  constructor(readonly name: string) {
    if (!GEOMETRY_NAME.test(name)) {
      throw new ConfigurationError(
        `Invalid geometry name "${name}". Use a letter or underscore followed by letters, digits, "_", "." or "-".`
      );
    }
  }

  /** Geometries are matched by name. */
  equals(other: Geometry): boolean {
    return this.name === other.name;
  }

  /** Same kind of surface loaded from the same source. */
  abstract sameSource(other: Geometry): boolean;
}

export type GeometryKind = 'triSurfaceMesh';

/** Surface loaded from a triangulated file (STL, OBJ, ...). */
export class TriSurfaceMesh extends Geometry {
  readonly kind = 'triSurfaceMesh' as const;

  constructor(name: string, readonly file: string) {
    super(name);
    if (file === '' || /["\n\r]/.test(file)) {
      throw new ConfigurationError(`Invalid surface file "${file}" for geometry "${name}"`);
    }
  }

  sameSource(other: Geometry): boolean {
    return other instanceof TriSurfaceMesh && other.file === this.file;
  }
}
