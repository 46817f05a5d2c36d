import { ConversionError } from "../errors"
import type { Milliseconds } from "../schema/type-key"

const NANOS_PER_UNIT: Readonly<Record<string, bigint>> = {
  ns: 1n,
  us: 1_000n,
  "µs": 1_000n, // U+00B5 micro sign
  "μs": 1_000n, // U+03BC greek mu
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
}

// int64 nanoseconds; the negative side reaches one further.
const MAX_NANOS = 2n ** 63n - 1n
const NUMBER = /^([0-9]*)(?:\.([0-9]*))?/

/**
 * Parse a duration such as "300ms", "-1.5h" or "2h45m" into milliseconds.
 *
 * A duration is an optionally signed sequence of decimal numbers, each with a
 * unit: ns, us (or µs), ms, s, m, h. "0" needs no unit. The total is
 * truncated to whole nanoseconds and must fit a signed 64-bit count.
 */
export function parseDuration(raw: string): Milliseconds {
  const fail = (message: string) =>
    new ConversionError(`time: ${message}`, { raw, kind: "duration" })

  let rest = raw
  let negative = false

  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-")
    rest = rest.slice(1)
  }

  if (rest === "0") return 0
  if (rest === "") throw fail(`invalid duration ${JSON.stringify(raw)}`)

  let nanos = 0n

  while (rest !== "") {
    const number = NUMBER.exec(rest)
    const whole = number?.[1] ?? ""
    const fraction = number?.[2]

    if (whole === "" && !fraction) throw fail(`invalid duration ${JSON.stringify(raw)}`)

    rest = rest.slice(number?.[0].length ?? 0)

    let unitLength = 0
    while (unitLength < rest.length && !/[0-9.]/.test(rest.charAt(unitLength))) unitLength++

    if (unitLength === 0) throw fail(`missing unit in duration ${JSON.stringify(raw)}`)

    const unit = rest.slice(0, unitLength)
    const scale = NANOS_PER_UNIT[unit]
    if (scale === undefined) {
      throw fail(`unknown unit ${JSON.stringify(unit)} in duration ${JSON.stringify(raw)}`)
    }

    rest = rest.slice(unitLength)
    nanos += BigInt(whole || "0") * scale
    if (fraction) nanos += BigInt(Math.trunc(Number(`0.${fraction}`) * Number(scale)))

    if (nanos > (negative ? MAX_NANOS + 1n : MAX_NANOS)) {
      throw fail(`invalid duration ${JSON.stringify(raw)}`)
    }
  }

  const millis = Number(nanos) / 1e6

  return negative ? -millis : millis
}
