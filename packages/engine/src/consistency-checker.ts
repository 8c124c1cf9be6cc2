import { BANK_ID_PATTERN, SHAPE_WILDCARD, NoBanksError, ShapeMismatchError } from '@bankrecon/types';
import type { FileSetIndex } from '@bankrecon/types';

export type ConsistencyResult =
  | { ok: true; referenceBank: string; shapes: string[] }
  | { ok: false; error: ShapeMismatchError | NoBanksError };

const SHAPE_PATTERN = new RegExp(BANK_ID_PATTERN.source, 'g');

export function toShapeKey(fileName: string): string {
  return fileName.replace(SHAPE_PATTERN, SHAPE_WILDCARD);
}

export function shapeKeysOf(fileNames: Iterable<string>): Set<string> {
  const shapes = new Set<string>();
  for (const fileName of fileNames) {
    shapes.add(toShapeKey(fileName));
  }
  return shapes;
}

function sameShapes(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const shape of a) {
    if (!b.has(shape)) return false;
  }
  return true;
}

function sorted(shapes: Set<string>): string[] {
  return [...shapes].sort((a, b) => a.localeCompare(b));
}

/**
 * Checks that every bank exports the same file types as the first bank in the index.
 * Stops at the first bank that differs.
 */
export function checkConsistency(index: FileSetIndex, directory = '.'): ConsistencyResult {
  const first = index.entries().next();
  if (first.done === true) {
    return { ok: false, error: new NoBanksError(directory) };
  }

  const [referenceBank, referenceFiles] = first.value;
  const referenceShapes = shapeKeysOf(referenceFiles);

  for (const [bankId, files] of index) {
    if (bankId === referenceBank) continue;
    const shapes = shapeKeysOf(files);
    if (!sameShapes(shapes, referenceShapes)) {
      return {
        ok: false,
        error: new ShapeMismatchError({
          bankId,
          referenceBank,
          expected: sorted(referenceShapes),
          found: sorted(shapes),
        }),
      };
    }
  }

  return { ok: true, referenceBank, shapes: sorted(referenceShapes) };
}
