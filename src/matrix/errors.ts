/** Base class for every error the matrix pipeline raises. */
export class KbMatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The KLE document has an element the parser does not understand. */
export class LayoutParseError extends KbMatrixError {}

export type MatrixAxis = "row" | "column";

/** The layout needs more rows or columns than the controller can scan. */
export class MatrixCapacityError extends KbMatrixError {
  readonly axis: MatrixAxis;
  readonly limit: number;
  /** The row index, or the key count of the row, that broke the limit */
  readonly value: number;

  constructor(axis: MatrixAxis, value: number, limit: number, detail: string) {
    super(
      `Key placement produced too many ${axis === "row" ? "rows" : "columns"} (${detail}, limit ${limit}). ` +
      `A valid KiCad project cannot be generated for this layout.`
    );
    this.axis = axis;
    this.value = value;
    this.limit = limit;
  }
}

/**
 * A net name or number did not resolve. The pipeline stages run in a fixed
 * order, so this signals a bug rather than bad input.
 */
export class UnresolvedNetError extends KbMatrixError {
  constructor(what: string) {
    super(`Internal error: unresolved net for ${what}`);
  }
}
