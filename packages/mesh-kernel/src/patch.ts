/**
 * Boundary elements — patches, the default patch, merge pairs and
 * stand-alone projected faces.
 */

import { ConfigurationError } from './errors.js';
import type { Geometry } from './geometry.js';
import type { Point } from './point.js';

/** Four corners of a quad face. Order fixes the normal direction. */
export type FacePoints = readonly [Point, Point, Point, Point];

const PATCH_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

function checkName(what: string, name: string): void {
  if (!PATCH_NAME.test(name)) {
    throw new ConfigurationError(
      `Invalid ${what} name "${name}". Use a letter or underscore followed by letters, digits, "_", "." or "-".`
    );
  }
}

function checkFace(face: readonly Point[], owner: string): FacePoints {
  if (face.length !== 4) {
    throw new ConfigurationError(`Faces of ${owner} need 4 points, got ${face.length}`);
  }
  return [face[0], face[1], face[2], face[3]];
}

/** Named group of faces sharing one boundary type (patch, wall, symmetryPlane, ...). */
export class Patch {
  readonly faces: FacePoints[];

  constructor(
    readonly name: string,
    readonly type: string,
    faces: readonly (readonly Point[])[] = [],
  ) {
    checkName('patch', name);
    checkName('patch type', type);
    this.faces = faces.map((f) => checkFace(f, `patch "${name}"`));
  }

  addFace(face: readonly Point[]): void {
    this.faces.push(checkFace(face, `patch "${this.name}"`));
  }
}

/** Catch-all for faces that belong to no patch. */
export class DefaultPatch {
  constructor(
    readonly name = 'defaultFaces',
    readonly type = 'empty',
  ) {
    checkName('default patch', name);
    checkName('default patch type', type);
  }
}

/** Stitch the slave patch onto the master patch. */
export class PatchPair {
  constructor(readonly master: Patch, readonly slave: Patch) {
    if (master === slave) {
      throw new ConfigurationError(`Cannot merge patch "${master.name}" with itself`);
    }
  }
}

/** A block face projected onto a geometry (`faces` section). */
export class ProjectedFace {
  readonly points: FacePoints;

  constructor(points: readonly Point[], readonly geometry: Geometry) {
    this.points = checkFace(points, `projected face on "${geometry.name}"`);
  }
}
