export type Vec3i = Readonly<{ x: number; y: number; z: number }>;

export type BBox = Readonly<{ min: Vec3i; max: Vec3i }>;

export type Size3 = Readonly<{ width: number; height: number; length: number }>;

export function normalizeBBox(box: BBox): BBox {
  return {
    min: {
      x: Math.min(box.min.x, box.max.x),
      y: Math.min(box.min.y, box.max.y),
      z: Math.min(box.min.z, box.max.z),
    },
    max: {
      x: Math.max(box.min.x, box.max.x),
      y: Math.max(box.min.y, box.max.y),
      z: Math.max(box.min.z, box.max.z),
    },
  };
}

/** Width is along x, height along y, length along z (schematic naming). */
export function bboxSize(box: BBox): Size3 {
  const b = normalizeBBox(box);
  return {
    width: b.max.x - b.min.x + 1,
    height: b.max.y - b.min.y + 1,
    length: b.max.z - b.min.z + 1,
  };
}

export function bboxOfPoints(points: Iterable<Vec3i>): BBox | null {
  let box: { min: { x: number; y: number; z: number }; max: { x: number; y: number; z: number } } | null = null;
  for (const p of points) {
    if (!box) {
      box = { min: { ...p }, max: { ...p } };
      continue;
    }
    box.min.x = Math.min(box.min.x, p.x);
    box.min.y = Math.min(box.min.y, p.y);
    box.min.z = Math.min(box.min.z, p.z);
    box.max.x = Math.max(box.max.x, p.x);
    box.max.y = Math.max(box.max.y, p.y);
    box.max.z = Math.max(box.max.z, p.z);
  }
  return box;
}

export function bboxIterate(
  box: BBox,
  visit: (pos: Vec3i) => void,
): void {
  const b = normalizeBBox(box);
  for (let x = b.min.x; x <= b.max.x; x += 1) {
    for (let y = b.min.y; y <= b.max.y; y += 1) {
      for (let z = b.min.z; z <= b.max.z; z += 1) {
        visit({ x, y, z });
      }
    }
  }
}

export function isOnShell(box: BBox, pos: Vec3i): boolean {
  const b = normalizeBBox(box);
  return (
    pos.x === b.min.x ||
    pos.x === b.max.x ||
    pos.y === b.min.y ||
    pos.y === b.max.y ||
    pos.z === b.min.z ||
    pos.z === b.max.z
  );
}

export function posKey(pos: Vec3i): string {
  return `${pos.x},${pos.y},${pos.z}`;
}
