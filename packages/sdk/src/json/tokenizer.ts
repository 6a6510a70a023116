/**
 * Pull-based JSON tokenizer
 *
 * Reads a strict RFC 8259 document from a string, a byte array or a synchronous
 * iterable of chunks. Chunks are pulled only when the next token needs them, so a
 * large feed is never held in memory as a whole.
 */

import { JsonSyntaxError } from "../errors.js";

export type JsonToken =
  | { type: "startObject" }
  | { type: "endObject" }
  | { type: "startArray" }
  | { type: "endArray" }
  | { type: "fieldName"; value: string }
  | { type: "string"; value: string }
  | { type: "number"; value: number; raw: string }
  | { type: "boolean"; value: boolean }
  | { type: "null" };

export type JsonTokenType = JsonToken["type"];

/**
 * Anything that hands out tokens one at a time; `null` marks the end of input
 */
export interface TokenSource {
  nextToken(): JsonToken | null;
}

export type JsonInput = string | Uint8Array | Iterable<string | Uint8Array>;

type Expecting = "value" | "firstValueOrEnd" | "firstKeyOrEnd" | "key" | "commaOrEnd" | "done";

const NUMBER_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const NUMBER_CHARS = /[-+0-9.eE]/;
const LITERAL_CHARS = /[a-z]/;

// Buffer is compacted once this many characters have been consumed
const COMPACT_THRESHOLD = 64 * 1024;

export class JsonTokenizer implements TokenSource {
  #buf = "";
  #pos = 0;
  #chunks: Iterator<string | Uint8Array> | null;
  #decoder = new TextDecoder("utf-8", { fatal: true });
  #stack: Array<"object" | "array"> = [];
  #expecting: Expecting = "value";
  #line = 1;
  #column = 1;

  constructor(input: JsonInput) {
    if (typeof input === "string") {
      this.#buf = input;
      this.#chunks = null;
    } else if (input instanceof Uint8Array) {
      this.#chunks = [input][Symbol.iterator]();
    } else {
      this.#chunks = input[Symbol.iterator]();
    }
  }

  /**
   * Current nesting depth (0 at top level)
   */
  get depth(): number {
    return this.#stack.length;
  }

  nextToken(): JsonToken | null {
    for (;;) {
      this.#skipWhitespace();

      switch (this.#expecting) {
        case "done": {
          const ch = this.#peek();
          if (ch === undefined) {
            return null;
          }
          throw this.#error(`unexpected trailing content '${ch}'`);
        }

        case "firstValueOrEnd":
          if (this.#peek() === "]") {
            this.#advance();
            this.#stack.pop();
            this.#afterValue();
            return { type: "endArray" };
          }
          return this.#readValue();

        case "value":
          return this.#readValue();

        case "firstKeyOrEnd":
          if (this.#peek() === "}") {
            this.#advance();
            this.#stack.pop();
            this.#afterValue();
            return { type: "endObject" };
          }
          return this.#readKey();

        case "key":
          return this.#readKey();

        case "commaOrEnd": {
          const ch = this.#peek();
          const inObject = this.#stack[this.#stack.length - 1] === "object";
          if (ch === ",") {
            this.#advance();
            this.#expecting = inObject ? "key" : "value";
            continue;
          }
          if (inObject && ch === "}") {
            this.#advance();
            this.#stack.pop();
            this.#afterValue();
            return { type: "endObject" };
          }
          if (!inObject && ch === "]") {
            this.#advance();
            this.#stack.pop();
            this.#afterValue();
            return { type: "endArray" };
          }
          throw this.#unexpected(ch, inObject ? "',' or '}'" : "',' or ']'");
        }
      }
    }
  }

  #readValue(): JsonToken {
    const ch = this.#peek();
    if (ch === undefined) {
      throw this.#unexpected(ch, "a value");
    }

    switch (ch) {
      case "{":
        this.#advance();
        this.#stack.push("object");
        this.#expecting = "firstKeyOrEnd";
        return { type: "startObject" };
      case "[":
        this.#advance();
        this.#stack.push("array");
        this.#expecting = "firstValueOrEnd";
        return { type: "startArray" };
      case '"': {
        const value = this.#readString();
        this.#afterValue();
        return { type: "string", value };
      }
    }

    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      const token = this.#readNumber();
      this.#afterValue();
      return token;
    }

    if (LITERAL_CHARS.test(ch)) {
      const token = this.#readLiteral();
      this.#afterValue();
      return token;
    }

    throw this.#unexpected(ch, "a value");
  }

  #readKey(): JsonToken {
    const ch = this.#peek();
    if (ch !== '"') {
      throw this.#unexpected(ch, "a quoted field name");
    }
    const value = this.#readString();
    this.#skipWhitespace();
    const colon = this.#peek();
    if (colon !== ":") {
      throw this.#unexpected(colon, "':'");
    }
    this.#advance();
    this.#expecting = "value";
    return { type: "fieldName", value };
  }

  #readString(): string {
    // Opening quote
    this.#advance();
    let out = "";

    for (;;) {
      const ch = this.#peek();
      if (ch === undefined) {
        throw this.#error("unterminated string");
      }
      this.#advance();

      if (ch === '"') {
        return out;
      }

      if (ch === "\\") {
        out += this.#readEscape();
        continue;
      }

      if (ch < " ") {
        throw this.#error("unescaped control character in string");
      }

      out += ch;
    }
  }

  #readEscape(): string {
    const ch = this.#peek();
    if (ch === undefined) {
      throw this.#error("unterminated string");
    }
    this.#advance();

    switch (ch) {
      case '"':
        return '"';
      case "\\":
        return "\\";
      case "/":
        return "/";
      case "b":
        return "\b";
      case "f":
        return "\f";
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "u": {
        let hex = "";
        for (let i = 0; i < 4; i++) {
          const digit = this.#peek();
          if (digit === undefined || !/[0-9a-fA-F]/.test(digit)) {
            throw this.#error("invalid unicode escape");
          }
          hex += digit;
          this.#advance();
        }
        return String.fromCharCode(Number.parseInt(hex, 16));
      }
      default:
        throw this.#error(`invalid escape '\\${ch}'`);
    }
  }

  #readNumber(): JsonToken {
    const line = this.#line;
    const column = this.#column;
    let raw = "";
    for (let ch = this.#peek(); ch !== undefined && NUMBER_CHARS.test(ch); ch = this.#peek()) {
      raw += ch;
      this.#advance();
    }
    if (!NUMBER_PATTERN.test(raw)) {
      throw new JsonSyntaxError(`invalid number '${raw}'`, line, column);
    }
    return { type: "number", value: Number(raw), raw };
  }

  #readLiteral(): JsonToken {
    const line = this.#line;
    const column = this.#column;
    let word = "";
    for (let ch = this.#peek(); ch !== undefined && LITERAL_CHARS.test(ch); ch = this.#peek()) {
      word += ch;
      this.#advance();
    }
    switch (word) {
      case "true":
        return { type: "boolean", value: true };
      case "false":
        return { type: "boolean", value: false };
      case "null":
        return { type: "null" };
      default:
        throw new JsonSyntaxError(`unexpected literal '${word}'`, line, column);
    }
  }

  #afterValue(): void {
    this.#expecting = this.#stack.length === 0 ? "done" : "commaOrEnd";
  }

  #skipWhitespace(): void {
    for (let ch = this.#peek(); ch === " " || ch === "\n" || ch === "\r" || ch === "\t"; ch = this.#peek()) {
      this.#advance();
    }
  }

  #peek(): string | undefined {
    if (this.#pos >= this.#buf.length && !this.#fill()) {
      return undefined;
    }
    return this.#buf[this.#pos];
  }

  #advance(): void {
    if (this.#buf[this.#pos] === "\n") {
      this.#line++;
      this.#column = 1;
    } else {
      this.#column++;
    }
    this.#pos++;
  }

  /**
   * Pull chunks until there is unread input; false at end of input
   */
  #fill(): boolean {
    if (!this.#chunks) {
      return false;
    }

    if (this.#pos > COMPACT_THRESHOLD) {
      this.#buf = this.#buf.slice(this.#pos);
      this.#pos = 0;
    }

    while (this.#pos >= this.#buf.length) {
      const next = this.#chunks.next();
      if (next.done) {
        this.#chunks = null;
        this.#buf += this.#decodeBytes(new Uint8Array(0), false);
        return this.#pos < this.#buf.length;
      }
      const chunk = next.value;
      this.#buf += typeof chunk === "string" ? chunk : this.#decodeBytes(chunk, true);
    }
    return true;
  }

  #decodeBytes(bytes: Uint8Array, stream: boolean): string {
    try {
      return this.#decoder.decode(bytes, { stream });
    } catch (err) {
      throw this.#error("input is not valid UTF-8", err);
    }
  }

  #unexpected(ch: string | undefined, expected: string): JsonSyntaxError {
    const found = ch === undefined ? "end of input" : `character '${ch}'`;
    return this.#error(`unexpected ${found}, expected ${expected}`);
  }

  #error(reason: string, cause?: unknown): JsonSyntaxError {
    return new JsonSyntaxError(reason, this.#line, this.#column, cause ? { cause } : undefined);
  }
}

/**
 * Human readable token description for error messages
 */
export function describeToken(token: JsonToken | null): string {
  if (!token) {
    return "end of input";
  }
  switch (token.type) {
    case "startObject":
      return "'{'";
    case "endObject":
      return "'}'";
    case "startArray":
      return "'['";
    case "endArray":
      return "']'";
    case "fieldName":
      return `field name '${token.value}'`;
    case "string":
      return `string '${token.value}'`;
    case "number":
      return `number ${token.raw}`;
    case "boolean":
      return String(token.value);
    case "null":
      return "null";
  }
}
