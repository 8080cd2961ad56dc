export type SExpr = string | SExpr[];

const indentation = "\t";

/** Lists that always stay on one line, whatever they contain. */
const INLINE_KEYWORDS = new Set([
  "at", "xy", "pts", "start", "mid", "end", "size", "drill", "layers",
  "effects", "font", "stroke", "fill", "net", "reference", "uuid", "justify",
]);

/**
 * Helpers for the S-expression dialect KiCad files are written in.
 *
 * Expressions are nested arrays; atoms are strings and quoted strings carry
 * their quotes (`'"GND"'`), so the serializer never has to guess.
 * `parse`, `find`, `findAll` and `unquote` are the reading half, exported
 * from the package root for reading generated files back.
 */
export class SExpression {
  /** Quote and escape an arbitrary string. */
  static quote(s: string): string {
    return `"${s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
  }

  /** Quote a string that is already escaped. */
  static literal(escaped: string): string {
    return `"${escaped}"`;
  }

  /** Strip the quotes of a quoted atom and undo its escapes. */
  static unquote(s: string): string {
    if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) {
      return s.slice(1, -1).replace(/\\(["\\])/g, "$1");
    }
    return s;
  }

  /** Format a coordinate: at most four decimals, no trailing zeros. */
  static num(n: number): string {
    const rounded = Number(n.toFixed(4));
    return Object.is(rounded, -0) ? "0" : String(rounded);
  }

  /**
   * Render an expression as text.
   *
   * Lists of atoms, and lists whose keyword is in {@link INLINE_KEYWORDS},
   * stay on one line. Other lists put each sub-list on its own indented
   * line and close on a line of their own.
   */
  static serialize(expr: SExpr, indentLevel: number = 0): string {
    if (typeof expr === "string") {
      return expr;
    }
    if (expr.length === 0) {
      return "()";
    }

    const keyword = typeof expr[0] === "string" ? expr[0] : "";
    const isSimple = expr.every(e => typeof e === "string");
    if (isSimple || INLINE_KEYWORDS.has(keyword)) {
      return "(" + expr.map(e => this.serializeInline(e)).join(" ") + ")";
    }

    const childIndent = indentation.repeat(indentLevel + 1);
    let result = "(" + this.serialize(expr[0], indentLevel);
    for (let i = 1; i < expr.length; i++) {
      const child = expr[i];
      if (typeof child === "string") {
        result += " " + child;
      } else {
        result += "\n" + childIndent + this.serialize(child, indentLevel + 1);
      }
    }
    return result + "\n" + indentation.repeat(indentLevel) + ")";
  }

  private static serializeInline(expr: SExpr): string {
    if (typeof expr === "string") return expr;
    return "(" + expr.map(e => this.serializeInline(e)).join(" ") + ")";
  }

  /** Parse text into its top-level expressions. */
  static parse(input: string): SExpr[] {
    const tokens = this.tokenize(input);
    const [ast] = this.parseTokens(tokens, 0);
    return ast;
  }

  /** First direct child list of `expr` whose keyword is `keyword`. */
  static find(expr: SExpr, keyword: string): SExpr[] | undefined {
    if (!Array.isArray(expr)) return undefined;
    for (const child of expr) {
      if (Array.isArray(child) && child[0] === keyword) return child;
    }
    return undefined;
  }

  /** All direct child lists of `expr` whose keyword is `keyword`. */
  static findAll(expr: SExpr, keyword: string): SExpr[][] {
    if (!Array.isArray(expr)) return [];
    const found: SExpr[][] = [];
    for (const child of expr) {
      if (Array.isArray(child) && child[0] === keyword) found.push(child);
    }
    return found;
  }

  private static tokenize(input: string): string[] {
    const tokens: string[] = [];
    let current = "";
    let inString = false;
    let escaped = false;

    const flush = () => {
      if (current.length > 0) tokens.push(current);
      current = "";
    };

    for (const char of input) {
      if (inString) {
        current += char;
        if (escaped) {
          escaped = false;
        } else if (char === "\\") {
          escaped = true;
        } else if (char === '"') {
          inString = false;
          flush();
        }
      } else if (char === "(" || char === ")") {
        flush();
        tokens.push(char);
      } else if (char === '"') {
        flush();
        inString = true;
        current = '"';
      } else if (/\s/.test(char)) {
        flush();
      } else {
        current += char;
      }
    }
    flush();
    return tokens;
  }

  private static parseTokens(tokens: string[], startIndex: number): [SExpr[], number] {
    const result: SExpr[] = [];
    let i = startIndex;

    while (i < tokens.length) {
      const token = tokens[i];
      if (token === "(") {
        const [subList, nextIndex] = this.parseTokens(tokens, i + 1);
        result.push(subList);
        i = nextIndex;
      } else if (token === ")") {
        return [result, i + 1];
      } else {
        result.push(token);
        i++;
      }
    }
    return [result, i];
  }
}
