const SPECIAL = new Set(["*", "#", "$", "@", "!", "?", "-", "0", "1", "2", "3", "4", "5", "6", "7", "8", "9"])
const NAME_CHAR = /\w/

/**
 * Replaces `${name}` and `$name` references with values from `lookup`.
 *
 * Unset names expand to "". Single-character special names (`$1`, `$?`, ...)
 * are looked up as-is. A `$` not followed by a name stays; `${}` and an
 * unterminated `${` are dropped.
 */
export function expandEnv(text: string, lookup: (name: string) => string | undefined): string {
  let out = ""
  let start = 0

  for (let i = 0; i < text.length; i++) {
    if (text[i] !== "$" || i + 1 >= text.length) continue

    out += text.slice(start, i)
    const { name, width } = shellName(text.slice(i + 1))

    if (name !== "") {
      out += lookup(name) ?? ""
    } else if (width === 0) {
      out += "$"
    }

    i += width
    start = i + 1
  }

  return out + text.slice(start)
}

function shellName(rest: string): { name: string; width: number } {
  const first = rest.charAt(0)

  if (first === "{") {
    if (rest.length > 2 && SPECIAL.has(rest.charAt(1)) && rest.charAt(2) === "}") {
      return { name: rest.charAt(1), width: 3 }
    }

    const close = rest.indexOf("}", 1)
    if (close === 1) return { name: "", width: 2 }
    if (close === -1) return { name: "", width: 1 }
    return { name: rest.slice(1, close), width: close + 1 }
  }

  if (SPECIAL.has(first)) return { name: first, width: 1 }

  let width = 0
  while (width < rest.length && NAME_CHAR.test(rest.charAt(width))) width++

  return { name: rest.slice(0, width), width }
}
