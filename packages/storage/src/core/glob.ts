const REGEX_SPECIAL = /[.+^${}()|\\/]/

/**
 * Translate an fnmatch-style pattern into an anchored RegExp.
 *
 * `*` matches any run of characters including "/", `?` one character,
 * `[seq]` and `[!seq]` a character set. An unclosed "[" is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ""
  let i = 0

  while (i < pattern.length) {
    const char = pattern.charAt(i)
    i++

    if (char === "*") {
      source += ".*"
    } else if (char === "?") {
      source += "."
    } else if (char === "[") {
      const close = findClassEnd(pattern, i)

      if (close === -1) {
        source += "\\["
        continue
      }

      const body = pattern.slice(i, close)
      const negated = body.startsWith("!")
      const members = (negated ? body.slice(1) : body).replace(/[\\\]\[^]/g, "\\$&")

      source += `[${negated ? "^" : ""}${members}]`
      i = close + 1
    } else {
      source += REGEX_SPECIAL.test(char) ? `\\${char}` : char
    }
  }

  return new RegExp(`^${source}$`, "s")
}

// A "]" right after "[" or "[!" belongs to the set.
function findClassEnd(pattern: string, start: number): number {
  let j = start
  if (pattern.charAt(j) === "!") j++
  if (pattern.charAt(j) === "]") j++

  return pattern.indexOf("]", j)
}

export function matchesGlob(key: string, pattern: string): boolean {
  return globToRegExp(pattern).test(key)
}
