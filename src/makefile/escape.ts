/**
 * Escaping for text embedded in a generated Makefile. Each table lists every
 * character that needs rewriting in its context; anything not listed is
 * copied through unchanged.
 */

export type EscapeTable = Readonly<Record<string, string>>;

/** Make expands `$` everywhere in rule and recipe lines. */
export const RECIPE_ESCAPES: EscapeTable = {
  "$": "$$",
};

/**
 * Prerequisite lists. Make keeps a backslash before `%` here as part of the
 * name, so `%` stays bare. Unsupported characters are rejected when the path
 * is declared.
 */
export const PREREQ_ESCAPES: EscapeTable = {
  "$": "$$",
  "#": "\\#",
  ":": "\\:",
  " ": "\\ ",
  "*": "\\*",
  "?": "\\?",
  "[": "\\[",
  "]": "\\]",
};

/** Rule targets, where a bare `%` would turn the rule into a pattern rule. */
export const TARGET_ESCAPES: EscapeTable = {
  ...PREREQ_ESCAPES,
  "%": "\\%",
};

/** Inside a shell single-quoted word only the quote itself is special. */
export const SINGLE_QUOTE_ESCAPES: EscapeTable = {
  "'": "'\\''",
};

/** Arguments of `printf '%b'`. */
export const PRINTF_B_ESCAPES: EscapeTable = {
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
};

export function translate(text: string, table: EscapeTable): string {
  let out = "";
  for (const ch of text) out += table[ch] ?? ch;
  return out;
}

export function escapeTarget(p: string): string {
  return translate(p, TARGET_ESCAPES);
}

export function escapePrereq(p: string): string {
  return translate(p, PREREQ_ESCAPES);
}

export function escapeRecipe(text: string): string {
  return translate(text, RECIPE_ESCAPES);
}

/** Single-quoted shell word, safe to place in a recipe line. */
export function quoteForRecipe(text: string): string {
  return `'${escapeRecipe(translate(text, SINGLE_QUOTE_ESCAPES))}'`;
}

/**
 * Recipe line that runs `cmd` through the recipe shell. Plain commands are
 * embedded as-is; commands make would misread (line breaks, a trailing
 * backslash, a leading recipe prefix) or whose stdout is discarded go
 * through `eval`.
 */
export function commandLine(cmd: string, quiet = false): string {
  const redirect = quiet ? " 1> /dev/null" : "";
  if (/[\n\r]/.test(cmd)) {
    return `@eval "$$(printf '%b' ${quoteForRecipe(translate(cmd, PRINTF_B_ESCAPES))})"${redirect}`;
  }
  if (quiet || cmd.endsWith("\\") || /^\s*[-@+]/.test(cmd)) {
    return `@eval ${quoteForRecipe(cmd)}${redirect}`;
  }
  return `@${escapeRecipe(cmd)}`;
}

/** Recipe line printing each line of `text` verbatim. */
export function printLine(text: string): string {
  return `@printf '%s\\n' ${splitLines(text)}`;
}

/** Recipe line echoing a command before it runs; failures to print are ignored. */
export function echoLine(cmd: string): string {
  return `-@printf '$(CMDCOL)+%s$(DEFCOL)\\n' ${splitLines(cmd)}`;
}

function splitLines(text: string): string {
  return text.split(/\r\n|\n|\r/).map(quoteForRecipe).join(" ");
}
