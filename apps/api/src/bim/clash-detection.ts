import type {
  BimElement,
  BoundingBox,
  ClashType,
  ElementGeometry,
  Point3D,
  Priority,
} from '@gcpanel/types';

export interface ClashDetectionOptions {
  hardTolerance: number;
  softTolerance: number;
  includeSameSystem: boolean;
}

export interface ClashCandidate {
  elementA: BimElement;
  elementB: BimElement;
  clashType: ClashType;
  priority: Priority;
  distance: number;
  location: Point3D;
}

export interface ClashSweep {
  candidates: ClashCandidate[];
  checkedPairs: number;
  skippedPairs: number;
}

/**
 * Axis-aligned box enclosing an element. Linear runs are widened by half
 * their width along x and half their height along y and z.
 */
export function boundingBox(geometry: ElementGeometry): BoundingBox {
  if (geometry.kind === 'box') {
    return { min: { ...geometry.min }, max: { ...geometry.max } };
  }
  const { start, end, width, height } = geometry;
  const halfW = width / 2;
  const halfH = height / 2;
  return {
    min: {
      x: Math.min(start.x, end.x) - halfW,
      y: Math.min(start.y, end.y) - halfH,
      z: Math.min(start.z, end.z) - halfH,
    },
    max: {
      x: Math.max(start.x, end.x) + halfW,
      y: Math.max(start.y, end.y) + halfH,
      z: Math.max(start.z, end.z) + halfH,
    },
  };
}

/** Touching faces count as overlap. */
export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return (
    a.min.x <= b.max.x &&
    b.min.x <= a.max.x &&
    a.min.y <= b.max.y &&
    b.min.y <= a.max.y &&
    a.min.z <= b.max.z &&
    b.min.z <= a.max.z
  );
}

export function centre(box: BoundingBox): Point3D {
  return {
    x: (box.min.x + box.max.x) / 2,
    y: (box.min.y + box.max.y) / 2,
    z: (box.min.z + box.max.z) / 2,
  };
}

export function distanceBetween(a: Point3D, b: Point3D): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2 + (a.z - b.z) ** 2);
}

export function midpoint(a: Point3D, b: Point3D): Point3D {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2, z: (a.z + b.z) / 2 };
}

/** Order-independent key for an element pair. */
export function pairKey(idA: string, idB: string): string {
  return idA < idB ? `${idA}|${idB}` : `${idB}|${idA}`;
}

function classify(
  distance: number,
  options: ClashDetectionOptions,
): { clashType: ClashType; priority: Priority } | undefined {
  if (distance <= options.hardTolerance) {
    return { clashType: 'hard_clash', priority: 'critical' };
  }
  if (distance <= options.softTolerance) {
    return { clashType: 'soft_clash', priority: 'high' };
  }
  return undefined;
}

/**
 * Pairwise sweep over `elements` in the order given. Pairs listed in
 * `openPairs` (see {@link pairKey}) already have an unresolved clash and are
 * skipped, as are same-system pairs unless `includeSameSystem` is set.
 */
export function findClashes(
  elements: BimElement[],
  options: ClashDetectionOptions,
  openPairs: ReadonlySet<string> = new Set(),
): ClashSweep {
  const boxes = elements.map((e) => boundingBox(e.geometry));
  const candidates: ClashCandidate[] = [];
  let checkedPairs = 0;
  let skippedPairs = 0;

  for (let i = 0; i < elements.length; i++) {
    for (let j = i + 1; j < elements.length; j++) {
      const elementA = elements[i];
      const elementB = elements[j];
      if (
        (!options.includeSameSystem && elementA.systemType === elementB.systemType) ||
        openPairs.has(pairKey(elementA.id, elementB.id))
      ) {
        skippedPairs++;
        continue;
      }

      checkedPairs++;
      if (!boxesOverlap(boxes[i], boxes[j])) {
        continue;
      }
      const centreA = centre(boxes[i]);
      const centreB = centre(boxes[j]);
      const distance = distanceBetween(centreA, centreB);
      const classification = classify(distance, options);
      if (classification) {
        candidates.push({
          elementA,
          elementB,
          ...classification,
          distance,
          location: midpoint(centreA, centreB),
        });
      }
    }
  }

  return { candidates, checkedPairs, skippedPairs };
}

export function displayName(element: BimElement): string {
  return `${element.elementType} ${element.customId ?? element.name}`;
}

export function locationDescription(element: BimElement): string {
  const parts = [element.level];
  if (element.zone) {
    parts.push(`Zone ${element.zone}`);
  }
  if (element.gridLocation) {
    parts.push(`Grid ${element.gridLocation}`);
  }
  return parts.join(' - ');
}
