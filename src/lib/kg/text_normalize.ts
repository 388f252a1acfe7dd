const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Lower-case and strip accents. Output length may differ from the input. */
export function foldText(value: string): string {
  return value.normalize("NFD").replace(COMBINING_MARKS, "").toLowerCase();
}

/**
 * Same folding as foldText, applied per code unit so that every index in the
 * output points at the same character in the input. Characters whose folded
 * form is not a single code unit are kept as they are.
 */
export function foldPreservingOffsets(value: string): string {
  let out = "";
  for (const unit of value.split("")) {
    const folded = unit.normalize("NFD").replace(COMBINING_MARKS, "").toLowerCase();
    out += folded.length === 1 ? folded : unit;
  }
  return out;
}
