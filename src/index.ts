/**
 * kbmatrix
 *
 * Keyboard Layout Editor grid → keyboard switch matrix for KiCad.
 */

// Matrix model
export { MAX_ROWS, MAX_COLS, DEFAULT_MATRIX_OPTIONS } from "./matrix/types";
export type { Key, KeyboardMeta, GroupingPolicy, MatrixOptions, Point } from "./matrix/types";
export { Keyboard } from "./matrix/Keyboard";
export { KeyBlockCollection } from "./matrix/KeyBlockCollection";
export { KbMatrixError, LayoutParseError, MatrixCapacityError, UnresolvedNetError } from "./matrix/errors";
export type { MatrixAxis } from "./matrix/errors";

// Pipeline stages
export { parseKle, decodeElement, readKleDocument, loadKleFile } from "./matrix/KleParser";
export type { KleElement } from "./matrix/KleParser";
export { groupKeys, rowOf, positionalColumnOf } from "./matrix/MatrixGrouper";
export { NetTable, UNKNOWN_NET, CONTROL_NETS, defineMatrixNets, annotateKeyNets } from "./matrix/NetTable";
export { placeKeyboard, columnPath, clampToFootprint, switchReference, GEOMETRY } from "./kicad/Placement";
export type { SwitchPlacement, DiodePlacement, TraceSegment, PlacementResult, CopperLayer } from "./kicad/Placement";

// KiCad output
export { buildMatrix, generateProject, writeProject, formatDate } from "./kicad/KicadGenerator";
export type { GenerateOptions, GeneratedProject, GeneratedFile, MatrixBuild } from "./kicad/KicadGenerator";
/**
 * S-expression builder and reader. `quote`, `literal`, `num` and `serialize`
 * write KiCad files; `parse`, `unquote`, `find` and `findAll` read generated
 * (or hand-edited) files back for inspection.
 */
export { SExpression } from "./kicad/SExpression";
export type { SExpr } from "./kicad/SExpression";
export { UuidManager } from "./kicad/UuidManager";
