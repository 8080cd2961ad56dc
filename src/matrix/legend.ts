/**
 * Turn a raw KLE label into a legend that can sit inside a KiCad quoted
 * string as-is.
 *
 * KLE separates the label positions of a key with newlines; they are joined
 * with commas. A tilde toggles overbar text in KiCad, so it is doubled.
 */
export function escapeLegend(label: string): string {
  let display = label;
  if (display === "") display = "Blank";
  else if (display === " ") display = "Space";

  return display
    .replace(/\r\n|\r|\n/g, ",")
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/~/g, "~~");
}
