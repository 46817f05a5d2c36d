const SPECIAL = new Set("*#$@!?-0123456789")
const NAME_CHAR = /[A-Za-z0-9_]/

type ShellName = { name: string; width: number }

function readShellName(s: string): ShellName {
  const first = s.charAt(0)

  if (first === "{") {
    if (s.length > 2 && SPECIAL.has(s.charAt(1)) && s.charAt(2) === "}") {
      return { name: s.charAt(1), width: 3 }
    }

    const close = s.indexOf("}", 1)
    if (close === 1) return { name: "", width: 2 } // "${}"
    if (close === -1) return { name: "", width: 1 } // unterminated "${"

    return { name: s.slice(1, close), width: close + 1 }
  }

  if (SPECIAL.has(first)) return { name: first, width: 1 }

  let width = 0
  while (width < s.length && NAME_CHAR.test(s.charAt(width))) width++

  return { name: s.slice(0, width), width }
}

/**
 * Replaces `$VAR` and `${VAR}` in `input` with `lookup(VAR)`, shell-style.
 *
 * Unknown variables expand to "". Malformed references (`${}`, an unterminated
 * `${`) are dropped. A `$` not followed by a name is kept as is.
 */
export function expandVariables(input: string, lookup: (name: string) => string | undefined): string {
  let out = ""
  let from = 0

  for (let i = 0; i < input.length - 1; i++) {
    if (input.charAt(i) !== "$") continue

    out += input.slice(from, i)

    const { name, width } = readShellName(input.slice(i + 1))

    if (name !== "") out += lookup(name) ?? ""
    else if (width === 0) out += "$"

    i += width
    from = i + 1
  }

  return out + input.slice(from)
}
