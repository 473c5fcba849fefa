import { UnknownArchetypeError } from "../errors";

import {
  cropToBounds,
  countFilled,
  isRectangular,
  matrixEquals,
  matrixHeight,
  matrixWidth,
  mirrorHorizontal,
  occupiedOffsets,
  parsePattern,
  rotateClockwise,
} from "./geometry";

import type {
  ArchetypeId,
  OccupancyMatrix,
  ShapeArchetype,
  ShapeVariation,
} from "./types";

type ArchetypeDef = Readonly<{
  label: string;
  pattern: ReadonlyArray<string>;
  complexity: number;
}>;

const DEFS: Record<ArchetypeId, ArchetypeDef> = {
  corner3: { complexity: 0.25, label: "Corner Trio", pattern: ["X.", "XX"] },
  corner5: {
    complexity: 0.65,
    label: "Big Corner",
    pattern: ["X..", "X..", "XXX"],
  },
  domino: { complexity: 0.1, label: "Domino", pattern: ["XX"] },
  ell4: { complexity: 0.45, label: "L Tetromino", pattern: ["X.", "X.", "XX"] },
  line3: { complexity: 0.2, label: "Line of Three", pattern: ["XXX"] },
  line4: { complexity: 0.35, label: "Line of Four", pattern: ["XXXX"] },
  line5: { complexity: 0.6, label: "Line of Five", pattern: ["XXXXX"] },
  pee5: { complexity: 0.75, label: "P Pentomino", pattern: ["XX", "XX", "X."] },
  plus5: { complexity: 0.8, label: "Plus", pattern: [".X.", "XXX", ".X."] },
  rect2x3: { complexity: 0.7, label: "Slab", pattern: ["XXX", "XXX"] },
  single: { complexity: 0, label: "Single Block", pattern: ["X"] },
  skew4: { complexity: 0.5, label: "Skew Tetromino", pattern: [".XX", "XX."] },
  square2: { complexity: 0.3, label: "Square", pattern: ["XX", "XX"] },
  tee4: { complexity: 0.45, label: "T Tetromino", pattern: ["XXX", ".X."] },
};

// Catalog order: by cell count, then simplest first
export const ARCHETYPE_IDS: ReadonlyArray<ArchetypeId> = [
  "single",
  "domino",
  "line3",
  "corner3",
  "line4",
  "square2",
  "tee4",
  "ell4",
  "skew4",
  "line5",
  "corner5",
  "pee5",
  "plus5",
  "rect2x3",
];

export const ARCHETYPES: Readonly<Record<ArchetypeId, ShapeArchetype>> =
  ((): Readonly<Record<ArchetypeId, ShapeArchetype>> => {
    const out = {} as Record<ArchetypeId, ShapeArchetype>;
    ARCHETYPE_IDS.forEach((id) => {
      const def = DEFS[id];
      const canonical = parsePattern(def.pattern);
      out[id] = {
        canonical,
        cellCount: countFilled(canonical),
        complexity: def.complexity,
        id,
        label: def.label,
      };
    });
    return out;
  })();

/**
 * Identifiers from the first release's three-shape set. Saves written by
 * that release name shapes this way; every entry is listed explicitly.
 */
export const LEGACY_ALIASES: ReadonlyMap<string, ArchetypeId> = new Map<
  string,
  ArchetypeId
>([
  ["horizontal", "domino"],
  ["lShape", "corner3"],
  ["single", "single"],
]);

export function isArchetypeId(s: unknown): s is ArchetypeId {
  return (
    typeof s === "string" &&
    (ARCHETYPE_IDS as ReadonlyArray<string>).includes(s)
  );
}

/**
 * Resolve a stored identifier (current or legacy) to an archetype id.
 * Unlisted identifiers are rejected rather than guessed.
 */
export function decodeArchetype(identifier: string): ArchetypeId {
  if (isArchetypeId(identifier)) return identifier;
  const alias = LEGACY_ALIASES.get(identifier);
  if (alias === undefined) throw new UnknownArchetypeError(identifier);
  return alias;
}

export function getArchetype(id: ArchetypeId): ShapeArchetype {
  return ARCHETYPES[id];
}

function buildVariations(archetype: ShapeArchetype): Array<ShapeVariation> {
  const rotations: Array<OccupancyMatrix> = [archetype.canonical];
  for (let i = 1; i < 4; i++) {
    const prev = rotations[i - 1] ?? archetype.canonical;
    rotations.push(rotateClockwise(prev));
  }
  const candidates = [
    ...rotations,
    ...rotations.map((m) => mirrorHorizontal(m)),
  ].map((m) => cropToBounds(m));

  const unique: Array<OccupancyMatrix> = [];
  for (const m of candidates) {
    if (!unique.some((u) => matrixEquals(u, m))) unique.push(m);
  }

  return unique.map((matrix, index) => ({
    archetype: archetype.id,
    height: matrixHeight(matrix),
    index,
    matrix,
    offsets: occupiedOffsets(matrix),
    width: matrixWidth(matrix),
  }));
}

// Precomputed once; variation sets are a pure function of the canonical matrix
const VARIATIONS: Readonly<Record<ArchetypeId, ReadonlyArray<ShapeVariation>>> =
  ((): Readonly<Record<ArchetypeId, ReadonlyArray<ShapeVariation>>> => {
    const out = {} as Record<ArchetypeId, ReadonlyArray<ShapeVariation>>;
    ARCHETYPE_IDS.forEach((id) => {
      out[id] = buildVariations(ARCHETYPES[id]);
    });
    return out;
  })();

/**
 * Symmetry-distinct orientations of an archetype, in fixed order:
 * 0°, 90°, 180°, 270°, then the mirror image of each, duplicates dropped.
 */
export function variations(id: ArchetypeId): ReadonlyArray<ShapeVariation> {
  return VARIATIONS[id];
}

export function getVariation(id: ArchetypeId, index: number): ShapeVariation {
  const variation = VARIATIONS[id][index];
  if (variation === undefined) {
    throw new Error(
      `Variation ${String(index)} does not exist for ${id} (has ${String(VARIATIONS[id].length)})`,
    );
  }
  return variation;
}

// Index of the variation whose matrix equals `matrix`, or -1
export function findVariationIndex(
  id: ArchetypeId,
  matrix: OccupancyMatrix,
): number {
  const cropped = cropToBounds(matrix);
  return VARIATIONS[id].findIndex((v) => matrixEquals(v.matrix, cropped));
}

/**
 * Structural checks on the catalog: every alias lands on a real archetype,
 * every archetype is reachable by its own id, and canonical matrices are
 * rectangular, non-empty and already minimal.
 */
export function validateCatalog(): ReadonlyArray<string> {
  const problems: Array<string> = [];

  for (const [alias, target] of LEGACY_ALIASES) {
    if (!isArchetypeId(target)) {
      problems.push(`alias ${alias} points at unknown archetype ${target}`);
    }
  }

  for (const id of ARCHETYPE_IDS) {
    const { canonical } = ARCHETYPES[id];
    if (decodeArchetype(id) !== id) {
      problems.push(`archetype ${id} is not reachable by its identifier`);
    }
    if (!isRectangular(canonical)) {
      problems.push(`archetype ${id} has a ragged or empty pattern`);
    } else if (!matrixEquals(cropToBounds(canonical), canonical)) {
      problems.push(`archetype ${id} pattern is not minimal`);
    }
    if (countFilled(canonical) === 0) {
      problems.push(`archetype ${id} has no filled cells`);
    }
  }

  return problems;
}

const CATALOG_PROBLEMS = validateCatalog();
if (CATALOG_PROBLEMS.length > 0) {
  throw new Error(`Shape catalog is invalid: ${CATALOG_PROBLEMS.join("; ")}`);
}
