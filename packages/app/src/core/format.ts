import * as Option from "effect/Option"

// CHANGE: fixed allow-list of document formats
// WHY: input and output names resolve to one closed union before any IO
// QUOTE(TZ): "one of json, toml, yaml, case-insensitive"
// REF: req-format-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Some(f) ↔ lower(s) ∈ {"json","toml","yaml"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: formats are listed in allow-list order
// COMPLEXITY: O(1)/O(1)

export type Format = "json" | "toml" | "yaml"

export const formats: ReadonlyArray<Format> = ["json", "toml", "yaml"]

const isFormat = (value: string): value is Format => formats.some((format) => format === value)

export const parseFormat = (raw: string): Option.Option<Format> => {
  const lowered = raw.toLowerCase()
  return isFormat(lowered) ? Option.some(lowered) : Option.none()
}

export const formatLabel = (format: Format): string => format.toUpperCase()
