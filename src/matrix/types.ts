/** Maximum number of matrix rows the controller can scan */
export const MAX_ROWS = 7;
/** Maximum number of matrix columns the controller can scan */
export const MAX_COLS = 18;

/** How keys are grouped into matrix columns */
export type GroupingPolicy = "sequential" | "positional";

/** Options the matrix pipeline reads. Everything else belongs to the CLI. */
export interface MatrixOptions {
  grouping: GroupingPolicy;
  /** Add row and column traces between neighbouring keys */
  routing: boolean;
}

export const DEFAULT_MATRIX_OPTIONS: MatrixOptions = {
  grouping: "sequential",
  routing: true,
};

/** One physical keyswitch of the layout. */
export interface Key {
  /** Parse order; never changes once assigned */
  readonly index: number;
  /** Centre position in keyboard units */
  readonly xUnit: number;
  readonly yUnit: number;
  readonly width: number;
  readonly height: number;
  /** Raw KLE label text */
  readonly label: string;
  /** Display legend, already escaped for a KiCad quoted string */
  readonly legend: string;
  /** Matrix position, -1 until grouping has run */
  row: number;
  col: number;
  /** Resolved net numbers, 0 while unresolved */
  rowNet: number;
  colNet: number;
  diodeNet: number;
}

export interface KeyboardMeta {
  name: string;
  author: string;
}

export interface Point {
  x: number;
  y: number;
}
