const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g
const CLASS_SPECIAL = /[\\\]^[-]/g

function literal(ch: string): string {
  return ch.replace(REGEX_SPECIAL, "\\$&")
}

function classLiteral(ch: string): string {
  return ch.replace(CLASS_SPECIAL, "\\$&")
}

/**
 * Compiles a store-style glob into an anchored regular expression.
 *
 * @remarks
 * Supports `*`, `?`, `[abc]`, `[^abc]`, `[a-z]` and `\` escapes. Reversed
 * ranges such as `[z-a]` match the same as `[a-z]`. An unterminated class runs
 * to the end of the pattern.
 */
export function compileGlob(pattern: string): RegExp {
  const chars = [...pattern]
  let out = ""
  let i = 0

  while (i < chars.length) {
    const ch = chars[i] ?? ""

    if (ch === "*") {
      out += "[\\s\\S]*"
      i += 1
    } else if (ch === "?") {
      out += "[\\s\\S]"
      i += 1
    } else if (ch === "\\" && i + 1 < chars.length) {
      out += literal(chars[i + 1] ?? "")
      i += 2
    } else if (ch === "[") {
      i += 1
      let negate = false

      if (chars[i] === "^") {
        negate = true
        i += 1
      }

      let body = ""

      while (i < chars.length && chars[i] !== "]") {
        const c = chars[i] ?? ""

        if (c === "\\" && i + 1 < chars.length) {
          body += classLiteral(chars[i + 1] ?? "")
          i += 2
        } else if (chars[i + 1] === "-" && i + 2 < chars.length && chars[i + 2] !== "]") {
          let start = c
          let end = chars[i + 2] ?? ""
          if (start > end) [start, end] = [end, start]
          body += `${classLiteral(start)}-${classLiteral(end)}`
          i += 3
        } else {
          body += classLiteral(c)
          i += 1
        }
      }

      // skip the closing bracket when present
      i += 1
      out += `[${negate ? "^" : ""}${body}]`
    } else {
      out += literal(ch)
      i += 1
    }
  }

  return new RegExp(`^${out}$`)
}

export function globMatch(pattern: string, text: string): boolean {
  return compileGlob(pattern).test(text)
}
