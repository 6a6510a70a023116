/**
 * Boolean predicate expressions stored in predicate fields
 *
 * Grammar (keywords are case-insensitive):
 *   predicate   := conjunction ("or" conjunction)*
 *   conjunction := negation ("and" negation)*
 *   negation    := "not" negation | primary
 *   primary     := "(" predicate ")" | "true" | "false"
 *                | feature ["not"] "in" "[" (values | range) "]"
 *   values      := label ("," label)*
 *   range       := [integer] ".." [integer]
 *
 * @example "country in [no, se] and age in [20..30]"
 */

export type Predicate =
  | { kind: "conjunction"; operands: Predicate[] }
  | { kind: "disjunction"; operands: Predicate[] }
  | { kind: "negation"; operand: Predicate }
  | { kind: "featureSet"; key: string; values: string[]; negated: boolean }
  | { kind: "featureRange"; key: string; from?: bigint; to?: bigint; negated: boolean }
  | { kind: "boolean"; value: boolean };

type TokenKind = "word" | "integer" | "quoted" | "(" | ")" | "[" | "]" | "," | ".." | "eof";

interface Token {
  kind: TokenKind;
  text: string;
  column: number;
}

/**
 * Raised with the position of the offending character or token
 */
export class PredicateSyntaxError extends Error {
  constructor(
    message: string,
    public readonly column: number
  ) {
    super(`line 1:${column} ${message}`);
    this.name = "PredicateSyntaxError";
  }
}

const WORD_START = /[A-Za-z_]/;
const WORD_CHAR = /[A-Za-z0-9_.\-]/;
const DIGIT = /[0-9]/;
const PLAIN_LABEL = /^[A-Za-z_][A-Za-z0-9_]*$/;
const KEYWORDS = new Set(["and", "or", "not", "in", "true", "false"]);
const PUNCTUATION = new Map<string, TokenKind>([
  ["(", "("],
  [")", ")"],
  ["[", "["],
  ["]", "]"],
  [",", ","],
]);

export function parsePredicate(text: string): Predicate {
  return new PredicateParser(tokenize(text)).parse();
}

/**
 * Canonical text form; parsePredicate(formatPredicate(p)) reproduces p
 */
export function formatPredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case "conjunction":
      return predicate.operands.map((p) => formatOperand(p, ["conjunction", "disjunction"])).join(" and ");
    case "disjunction":
      return predicate.operands.map((p) => formatOperand(p, ["disjunction"])).join(" or ");
    case "negation":
      return `not (${formatPredicate(predicate.operand)})`;
    case "featureSet": {
      const values = predicate.values.map(formatLabel).join(", ");
      return `${formatLabel(predicate.key)} ${predicate.negated ? "not in" : "in"} [${values}]`;
    }
    case "featureRange": {
      const from = predicate.from?.toString() ?? "";
      const to = predicate.to?.toString() ?? "";
      return `${formatLabel(predicate.key)} ${predicate.negated ? "not in" : "in"} [${from}..${to}]`;
    }
    case "boolean":
      return predicate.value ? "true" : "false";
  }
}

/**
 * Nested groups of the given kinds keep their parentheses so that they parse back as groups
 */
function formatOperand(predicate: Predicate, parenthesize: Predicate["kind"][]): string {
  const text = formatPredicate(predicate);
  return parenthesize.includes(predicate.kind) ? `(${text})` : text;
}

function formatLabel(label: string): string {
  if (PLAIN_LABEL.test(label) && !KEYWORDS.has(label.toLowerCase())) {
    return label;
  }
  return `'${label.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      tokens.push({ kind: punctuation, text: ch, column: i });
      i++;
      continue;
    }

    if (ch === "." && text.charAt(i + 1) === ".") {
      tokens.push({ kind: "..", text: "..", column: i });
      i += 2;
      continue;
    }

    if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(text.charAt(i + 1)))) {
      const start = i;
      i++;
      while (i < text.length && DIGIT.test(text.charAt(i))) i++;
      tokens.push({ kind: "integer", text: text.slice(start, i), column: start });
      continue;
    }

    if (WORD_START.test(ch)) {
      const start = i;
      while (i < text.length && WORD_CHAR.test(text.charAt(i)) && !text.startsWith("..", i)) i++;
      tokens.push({ kind: "word", text: text.slice(start, i), column: start });
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      let value = "";
      i++;
      while (i < text.length && text.charAt(i) !== ch) {
        if (text.charAt(i) === "\\" && i + 1 < text.length) i++;
        value += text.charAt(i);
        i++;
      }
      if (i >= text.length) {
        throw new PredicateSyntaxError("unterminated string", start);
      }
      i++;
      tokens.push({ kind: "quoted", text: value, column: start });
      continue;
    }

    throw new PredicateSyntaxError(`no viable alternative at character '${ch}'`, i);
  }

  tokens.push({ kind: "eof", text: "<EOF>", column: text.length });
  return tokens;
}

class PredicateParser {
  #tokens: Token[];
  #pos = 0;

  constructor(tokens: Token[]) {
    this.#tokens = tokens;
  }

  parse(): Predicate {
    const predicate = this.#disjunction();
    this.#expect("eof", "<EOF>");
    return predicate;
  }

  #disjunction(): Predicate {
    const operands = [this.#conjunction()];
    while (this.#acceptKeyword("or")) {
      operands.push(this.#conjunction());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: "disjunction", operands };
  }

  #conjunction(): Predicate {
    const operands = [this.#negation()];
    while (this.#acceptKeyword("and")) {
      operands.push(this.#negation());
    }
    return operands.length === 1 && operands[0] ? operands[0] : { kind: "conjunction", operands };
  }

  #negation(): Predicate {
    if (this.#acceptKeyword("not")) {
      return { kind: "negation", operand: this.#negation() };
    }
    return this.#primary();
  }

  #primary(): Predicate {
    const token = this.#peek();

    if (token.kind === "(") {
      this.#pos++;
      const inner = this.#disjunction();
      this.#expect(")", "')'");
      return inner;
    }

    if (this.#acceptKeyword("true")) {
      return { kind: "boolean", value: true };
    }
    if (this.#acceptKeyword("false")) {
      return { kind: "boolean", value: false };
    }

    if (token.kind !== "word" && token.kind !== "quoted") {
      throw this.#mismatch(token, "a feature name");
    }
    this.#pos++;
    const key = token.text;

    const negated = this.#acceptKeyword("not");
    if (!this.#acceptKeyword("in")) {
      throw this.#mismatch(this.#peek(), "'in'");
    }
    this.#expect("[", "'['");

    if (this.#peek().kind === ".." || this.#peekAt(1).kind === "..") {
      return this.#range(key, negated);
    }

    const values = [this.#label()];
    while (this.#peek().kind === ",") {
      this.#pos++;
      values.push(this.#label());
    }
    this.#expect("]", "']'");
    return { kind: "featureSet", key, values, negated };
  }

  #range(key: string, negated: boolean): Predicate {
    const range: Extract<Predicate, { kind: "featureRange" }> = { kind: "featureRange", key, negated };
    if (this.#peek().kind === "integer") {
      range.from = BigInt(this.#next().text);
    }
    this.#expect("..", "'..'");
    if (this.#peek().kind === "integer") {
      range.to = BigInt(this.#next().text);
    }
    this.#expect("]", "']'");
    return range;
  }

  #label(): string {
    const token = this.#peek();
    if (token.kind === "word" || token.kind === "quoted" || token.kind === "integer") {
      this.#pos++;
      return token.text;
    }
    throw this.#mismatch(token, "a value");
  }

  #acceptKeyword(keyword: string): boolean {
    const token = this.#peek();
    if (token.kind === "word" && token.text.toLowerCase() === keyword) {
      this.#pos++;
      return true;
    }
    return false;
  }

  #expect(kind: TokenKind, description: string): Token {
    const token = this.#peek();
    if (token.kind !== kind) {
      throw this.#mismatch(token, description);
    }
    this.#pos++;
    return token;
  }

  #next(): Token {
    const token = this.#peek();
    this.#pos++;
    return token;
  }

  #peek(): Token {
    return this.#peekAt(0);
  }

  #peekAt(offset: number): Token {
    const last = this.#tokens[this.#tokens.length - 1];
    const token = this.#tokens[this.#pos + offset] ?? last;
    if (!token) {
      throw new PredicateSyntaxError("empty token stream", 0);
    }
    return token;
  }

  #mismatch(token: Token, expected: string): PredicateSyntaxError {
    return new PredicateSyntaxError(`mismatched input '${token.text}' expecting ${expected}`, token.column);
  }
}
