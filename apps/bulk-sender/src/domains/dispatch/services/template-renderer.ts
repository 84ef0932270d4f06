import { DispatchError } from "../model/dispatch.errors"

/**
 * Values for placeholder substitution. A key that is present with an
 * `undefined` value renders as an empty string; a key that is absent leaves
 * its placeholder untouched.
 */
export type TemplateValues = Readonly<Record<string, string | undefined>>

export interface CompiledTemplate {
  /** Distinct placeholder names in order of first appearance. */
  readonly placeholders: readonly string[]

  render(values: TemplateValues): string
}

type Segment =
  | { kind: "text"; text: string }
  | { kind: "placeholder"; name: string; raw: string }

const OPEN = "{{"
const CLOSE = "}}"
const placeholderName = /^[A-Za-z_][A-Za-z0-9_]*$/

function parse(template: string): Segment[] {
  const segments: Segment[] = []
  let cursor = 0

  for (;;) {
    const open = template.indexOf(OPEN, cursor)

    if (open === -1) {
      segments.push({ kind: "text", text: template.slice(cursor) })
      return segments
    }

    const close = template.indexOf(CLOSE, open + OPEN.length)
    if (close === -1) {
      throw DispatchError.templateInvalid({ reason: "unclosed placeholder", offset: open })
    }

    const name = template.slice(open + OPEN.length, close).trim()
    if (name === "") {
      throw DispatchError.templateInvalid({ reason: "empty placeholder", offset: open })
    }

    const raw = template.slice(open, close + CLOSE.length)

    segments.push({ kind: "text", text: template.slice(cursor, open) })
    segments.push(
      placeholderName.test(name) ? { kind: "placeholder", name, raw } : { kind: "text", text: raw },
    )

    cursor = close + CLOSE.length
  }
}

/**
 * Parses `{{name}}` placeholders once (inner whitespace allowed). Braces
 * around something that is not an identifier, such as `{{first-name}}`, stay
 * in the output as written.
 *
 * @throws DispatchError `template_invalid` on an unclosed `{{` or an empty
 *   `{{ }}`.
 */
export function compileTemplate(template: string): CompiledTemplate {
  const segments = parse(template)

  const placeholders = [
    ...new Set(segments.flatMap((s) => (s.kind === "placeholder" ? [s.name] : []))),
  ]

  return {
    placeholders,
    render(values: TemplateValues): string {
      return segments
        .map((segment) => {
          if (segment.kind === "text") return segment.text
          if (!Object.hasOwn(values, segment.name)) return segment.raw

          return values[segment.name] ?? ""
        })
        .join("")
    },
  }
}

export function renderTemplate(template: string, values: TemplateValues): string {
  return compileTemplate(template).render(values)
}
