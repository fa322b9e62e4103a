export type PathAnchor =
  | { kind: "implicit" }
  | { kind: "crate" }
  | { kind: "self" }
  | { kind: "super"; hops: number };

export type QualifiedPath = {
  anchor: PathAnchor;
  /** Module segments between the anchor and the terminal name. */
  segments: readonly string[];
  name: string;
  text: string;
};

export type NormalizedUseEntry = QualifiedPath & {
  /** Name the entry binds in the importing module. */
  alias: string;
};

export type PathParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

type Token =
  | { kind: "ident"; value: string }
  | { kind: "sep" }
  | { kind: "open" }
  | { kind: "close" }
  | { kind: "comma" };

const PATH_KEYWORDS = new Set(["crate", "self", "super", "as"]);
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isIdentifier = (value: string): boolean =>
  IDENTIFIER.test(value) && !PATH_KEYWORDS.has(value) && value !== "_";

export const isPathKeyword = (value: string): boolean => PATH_KEYWORDS.has(value);

class PathSyntaxError extends Error {}

const tokenize = (text: string): Token[] => {
  const tokens: Token[] = [];
  let index = 0;
  while (index < text.length) {
    const char = text[index];
    if (/\s/.test(char)) {
      index += 1;
      continue;
    }
    if (text.startsWith("::", index)) {
      tokens.push({ kind: "sep" });
      index += 2;
      continue;
    }
    if (char === "{" || char === "}" || char === ",") {
      tokens.push(
        char === "{"
          ? { kind: "open" }
          : char === "}"
            ? { kind: "close" }
            : { kind: "comma" },
      );
      index += 1;
      continue;
    }
    const match = /^[A-Za-z0-9_]+/.exec(text.slice(index));
    if (!match) {
      throw new PathSyntaxError(`unexpected character "${char}"`);
    }
    tokens.push({ kind: "ident", value: match[0] });
    index += match[0].length;
  }
  return tokens;
};

class TokenCursor {
  #tokens: Token[];
  #index = 0;

  constructor(tokens: Token[]) {
    this.#tokens = tokens;
  }

  peek(): Token | undefined {
    return this.#tokens[this.#index];
  }

  next(): Token | undefined {
    const token = this.#tokens[this.#index];
    this.#index += 1;
    return token;
  }

  atEnd(): boolean {
    return this.#index >= this.#tokens.length;
  }

  consumeIf(kind: Token["kind"]): boolean {
    if (this.peek()?.kind !== kind) return false;
    this.#index += 1;
    return true;
  }

  expectName(): string {
    const token = this.next();
    if (!token || token.kind !== "ident") {
      throw new PathSyntaxError("expected a name");
    }
    if (!isIdentifier(token.value)) {
      throw new PathSyntaxError(`${token.value} is not a valid name here`);
    }
    return token.value;
  }
}

const parseAnchor = (cursor: TokenCursor): PathAnchor => {
  if (cursor.consumeIf("sep")) {
    return { kind: "crate" };
  }

  const first = cursor.peek();
  if (first?.kind !== "ident") {
    return { kind: "implicit" };
  }

  const keyword = first.value;
  if (keyword === "crate" || keyword === "self") {
    cursor.next();
    expectSeparatorAfter(cursor, keyword);
    return { kind: keyword };
  }

  let hops = 0;
  while (true) {
    const token = cursor.peek();
    if (token?.kind !== "ident" || token.value !== "super") break;
    cursor.next();
    expectSeparatorAfter(cursor, "super");
    hops += 1;
  }
  return hops > 0 ? { kind: "super", hops } : { kind: "implicit" };
};

const expectSeparatorAfter = (cursor: TokenCursor, keyword: string) => {
  if (!cursor.consumeIf("sep")) {
    throw new PathSyntaxError(`${keyword} must be followed by ::`);
  }
};

export const anchorPrefix = (anchor: PathAnchor): string => {
  switch (anchor.kind) {
    case "implicit":
      return "";
    case "crate":
      return "crate::";
    case "self":
      return "self::";
    case "super":
      return "super::".repeat(anchor.hops);
  }
};

export const formatQualifiedPath = ({
  anchor,
  segments,
  name,
}: Pick<QualifiedPath, "anchor" | "segments" | "name">): string =>
  `${anchorPrefix(anchor)}${[...segments, name].join("::")}`;

const parseUseTree = ({
  cursor,
  anchor,
  base,
}: {
  cursor: TokenCursor;
  anchor: PathAnchor;
  base: readonly string[];
}): NormalizedUseEntry[] => {
  const segments = [...base];

  while (true) {
    if (cursor.consumeIf("open")) {
      return parseUseGroup({ cursor, anchor, base: segments });
    }

    const name = cursor.expectName();
    if (cursor.consumeIf("sep")) {
      segments.push(name);
      continue;
    }

    const aliasToken = cursor.peek();
    let alias = name;
    if (aliasToken?.kind === "ident" && aliasToken.value === "as") {
      cursor.next();
      alias = cursor.expectName();
    }

    return [
      {
        anchor,
        segments,
        name,
        alias,
        text: formatQualifiedPath({ anchor, segments, name }),
      },
    ];
  }
};

const parseUseGroup = ({
  cursor,
  anchor,
  base,
}: {
  cursor: TokenCursor;
  anchor: PathAnchor;
  base: readonly string[];
}): NormalizedUseEntry[] => {
  const entries: NormalizedUseEntry[] = [];
  while (!cursor.consumeIf("close")) {
    if (cursor.atEnd()) {
      throw new PathSyntaxError("unclosed import group");
    }
    entries.push(...parseUseTree({ cursor, anchor, base }));
    if (cursor.consumeIf("comma")) continue;
    if (cursor.peek()?.kind !== "close") {
      throw new PathSyntaxError("expected , or } in import group");
    }
  }

  if (entries.length === 0) {
    throw new PathSyntaxError("empty import group");
  }
  return entries;
};

const runParser = <T>(text: string, parse: (cursor: TokenCursor) => T): PathParseResult<T> => {
  try {
    const cursor = new TokenCursor(tokenize(text));
    if (cursor.atEnd()) {
      return { ok: false, reason: "empty path" };
    }
    const value = parse(cursor);
    if (!cursor.atEnd()) {
      return { ok: false, reason: "unexpected trailing input" };
    }
    return { ok: true, value };
  } catch (error) {
    if (error instanceof PathSyntaxError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
};

/** Expands a `use` tree into one entry per bound name. */
export const parseUsePaths = (
  text: string,
): PathParseResult<NormalizedUseEntry[]> =>
  runParser(text, (cursor) => {
    const anchor = parseAnchor(cursor);
    const entries = parseUseTree({ cursor, anchor, base: [] });
    const bare = entries.find(
      (entry) => entry.anchor.kind === "implicit" && entry.segments.length === 0,
    );
    if (bare) {
      throw new PathSyntaxError(`import of ${bare.name} needs a module path`);
    }
    return entries;
  });

export const parseQualifiedPath = (text: string): PathParseResult<QualifiedPath> =>
  runParser(text, (cursor) => {
    const anchor = parseAnchor(cursor);
    const segments: string[] = [];
    let name = cursor.expectName();
    while (cursor.consumeIf("sep")) {
      segments.push(name);
      name = cursor.expectName();
    }
    return {
      anchor,
      segments,
      name,
      text: formatQualifiedPath({ anchor, segments, name }),
    };
  });

export const isBarePath = (path: QualifiedPath): boolean =>
  path.anchor.kind === "implicit" && path.segments.length === 0;
