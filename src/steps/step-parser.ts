import { StepSyntaxError, UnknownZoneReferenceError } from '../common/planner-errors'
import { parseDistance, parseDuration } from '../utils/units'
import { isZoneLiteral, parseZoneExpression } from '../zones/zone-expression'
import type { ZoneKind } from '../zones/zone.types'
import { STEP_KINDS } from './step.types'
import type {
  ParsedStep,
  Quantity,
  StepKind,
  StepOutline,
  StepParseContext,
  TargetRef,
  ZoneLookup,
} from './step.types'

export const REPEAT_HEADER_RE = /^repeat\s+(\d+)\s*:?\s*$/i
const QUANTITY_RE = /^(\d+(?:\.\d+)?)\s*(min|h|s|km|m)$/
const CLOCK_RE = /^\d+:\d{2}(?::\d{2})?$/
const DISTANCE_IN_TIME_RE = /^(\S+)\s+in\s+(\S+)$/
const TARGET_RE = /^(.*?)\s*@(hr\b)?\s*(.*)$/i
const DESCRIPTION_RE = /(?:^|\s)--(?:\s|$)/
const LAP_TOKENS = new Set(['lap', 'lap.button'])
const HR_SUFFIX = '_HR'

export const isStepKind = (value: string): value is StepKind => STEP_KINDS.some((k) => k === value)

const syntaxError = (message: string, line: string, column: number, ctx: StepParseContext) =>
  new StepSyntaxError(`${message} in '${line.trim()}'`, {
    step: line.trim(),
    column,
    ...(ctx.lineNumber !== undefined ? { lineNumber: ctx.lineNumber } : {}),
  })

const mapKind = (raw: string, ctx: StepParseContext): StepKind => {
  if (isStepKind(raw)) return raw
  if (raw === 'steady') {
    ctx.warnings?.push(`'steady' steps are compiled as 'interval'`)
    return 'interval'
  }
  ctx.warnings?.push(`Unknown step kind '${raw}' compiled as 'other'`)
  return 'other'
}

const parseQuantity = (text: string): Quantity | null => {
  const value = text.trim()
  if (LAP_TOKENS.has(value.toLowerCase())) return { type: 'lap' }

  const m = QUANTITY_RE.exec(value)
  if (m) {
    const unit = m[2] ?? ''
    const amount = Number(m[1])
    // fractions only make sense for km and hours
    if (!Number.isInteger(amount) && unit !== 'km' && unit !== 'h') return null
    if (amount <= 0) return null
    if (unit === 'km' || unit === 'm') return { type: 'distance', meters: Math.round(unit === 'km' ? amount * 1000 : amount) }
    const seconds = parseDuration(`${amount}${unit}`)
    return seconds === null ? null : { type: 'time', seconds }
  }

  if (CLOCK_RE.test(value)) {
    const seconds = parseDuration(value)
    return seconds === null || seconds <= 0 ? null : { type: 'time', seconds }
  }

  return null
}

const hrCandidates = (raw: string): string[] =>
  raw.endsWith(HR_SUFFIX) ? [raw, raw.slice(0, -HR_SUFFIX.length)] : [raw, `${raw}${HR_SUFFIX}`]

// a zone name wins over a literal reading of the same text (`10k`)
const namesZone = (raw: string, hrTagged: boolean, zones?: ZoneLookup): boolean => {
  if (!zones) return false
  if (hrTagged || raw.endsWith(HR_SUFFIX)) return hrCandidates(raw).some((c) => zones.has(c, 'heartRate'))
  return zones.has(raw, 'pace') || zones.has(`${raw}${HR_SUFFIX}`, 'heartRate')
}

const zoneRef = (raw: string, hrTagged: boolean, ctx: StepParseContext, line: string): TargetRef => {
  const zones = ctx.zones
  const unknown = (kind: ZoneKind) =>
    new UnknownZoneReferenceError(
      `Unknown ${kind === 'pace' ? 'pace' : 'heart rate'} zone '${raw}' in '${line.trim()}'`,
      {
        zone: raw,
        kind,
        step: line.trim(),
        ...(ctx.lineNumber !== undefined ? { lineNumber: ctx.lineNumber } : {}),
      },
    )

  const hr = (): TargetRef => {
    if (!zones) return { source: 'zone', kind: 'heartRate', zone: raw }
    const zone = hrCandidates(raw).find((c) => zones.has(c, 'heartRate'))
    if (zone === undefined) throw unknown('heartRate')
    return { source: 'zone', kind: 'heartRate', zone }
  }

  if (hrTagged || raw.endsWith(HR_SUFFIX)) return hr()
  if (!zones || zones.has(raw, 'pace')) return { source: 'zone', kind: 'pace', zone: raw }
  if (zones.has(`${raw}${HR_SUFFIX}`, 'heartRate')) return { source: 'zone', kind: 'heartRate', zone: `${raw}${HR_SUFFIX}` }
  throw unknown('pace')
}

/**
 * Parse one step line: `kind: quantity [@ target | @hr target] [-- description]`
 * or a `repeat N:` header (returned with no children).
 *
 * `indentLevel` is the number of characters stripped from the start of the
 * source line; it only shifts the reported column.
 */
export function parseStep(line: string, indentLevel = 0, ctx: StepParseContext = {}): ParsedStep {
  const text = line.trim()
  const offset = indentLevel + (line.length - line.trimStart().length)
  const column = (at: number) => offset + at + 1

  const repeat = REPEAT_HEADER_RE.exec(text)
  if (repeat) {
    const count = Number(repeat[1])
    if (count < 1) throw syntaxError('Repeat count must be at least 1', line, column(0), ctx)
    return { type: 'repeat', count, steps: [] }
  }

  const colon = text.indexOf(':')
  const rawKind = (colon >= 0 ? text.slice(0, colon) : text).trim().toLowerCase()
  if (!rawKind || !/^[a-z][a-z._-]*$/.test(rawKind)) {
    throw syntaxError("Expected 'kind: quantity'", line, column(0), ctx)
  }
  if (rawKind === 'repeat') throw syntaxError("Expected 'repeat N:'", line, column(0), ctx)

  let body = colon >= 0 ? text.slice(colon + 1) : ''
  const bodyStart = colon + 1 + (body.length - body.trimStart().length)
  body = body.trim()

  let description: string | undefined
  const dash = body.search(DESCRIPTION_RE)
  if (dash >= 0) {
    description = body.slice(dash).replace(/^\s*--\s*/, '').trim() || undefined
    body = body.slice(0, dash).trim()
  }

  let quantityText = body
  let target: TargetRef | undefined
  const at = TARGET_RE.exec(body)
  if (at) {
    quantityText = (at[1] ?? '').trim()
    const targetText = (at[3] ?? '').trim()
    const hrTagged = at[2] !== undefined
    if (!targetText) throw syntaxError('Missing target after @', line, column(bodyStart + body.indexOf('@')), ctx)
    const kind: ZoneKind = hrTagged ? 'heartRate' : 'pace'
    target = isZoneLiteral(targetText) && !namesZone(targetText, hrTagged, ctx.zones)
      ? { source: 'literal', kind, definition: parseZoneExpression(targetText, kind) }
      : zoneRef(targetText, hrTagged, ctx, line)
  }

  const kind = mapKind(rawKind, ctx)

  let quantity: Quantity | null
  const derived = DISTANCE_IN_TIME_RE.exec(quantityText)
  if (derived) {
    if (target) throw syntaxError("A 'distance in time' step cannot also name a target", line, column(bodyStart), ctx)
    const meters = parseDistance(derived[1] ?? '')
    quantity = meters !== null && meters > 0 ? { type: 'distance', meters } : null
    if (quantity) target = { source: 'literal', kind: 'pace', definition: parseZoneExpression(quantityText, 'pace') }
  } else if (!quantityText) {
    if (kind !== 'rest') throw syntaxError('Missing quantity', line, column(Math.max(bodyStart, 0)), ctx)
    quantity = { type: 'lap' }
  } else {
    quantity = parseQuantity(quantityText)
  }

  if (!quantity) throw syntaxError(`Invalid quantity '${quantityText}'`, line, column(bodyStart), ctx)

  return {
    type: 'step',
    kind,
    quantity,
    ...(target ? { target } : {}),
    ...(description ? { description } : {}),
  }
}

const measureIndent = (line: string): number => {
  let width = 0
  for (const ch of line) {
    if (ch === ' ') width += 1
    else if (ch === '\t') width += 2
    else break
  }
  return width
}

/**
 * Split a step block into lines and nest them under their `repeat N:` headers.
 * Lines are separated by newlines or `;`; a segment after `;` starts at column 0.
 */
export function outlineSteps(text: string): StepOutline[] {
  const root: StepOutline[] = []
  const stack: { indent: number; children: StepOutline[] }[] = [{ indent: -1, children: root }]

  text.split(/\r?\n/).forEach((rawLine, index) => {
    rawLine.split(';').forEach((segment, segmentIndex) => {
      if (!segment.trim()) return
      const indent = segmentIndex === 0 ? measureIndent(segment) : 0

      let top = stack[stack.length - 1]
      while (top && stack.length > 1 && indent <= top.indent) {
        stack.pop()
        top = stack[stack.length - 1]
      }
      if (!top) return

      const node: StepOutline = { text: segment.trim(), indent, lineNumber: index + 1, children: [] }
      top.children.push(node)
      if (REPEAT_HEADER_RE.test(node.text)) stack.push({ indent, children: node.children })
    })
  })

  return root
}

const buildSteps = (outline: StepOutline[], ctx: StepParseContext): ParsedStep[] =>
  outline.map((line) => {
    const step = parseStep(line.text, line.indent, { ...ctx, lineNumber: line.lineNumber })
    if (step.type === 'repeat') {
      if (line.children.length === 0) {
        throw new StepSyntaxError(`Repeat block '${line.text}' has no steps`, {
          step: line.text,
          lineNumber: line.lineNumber,
          column: line.indent + 1,
        })
      }
      return { ...step, steps: buildSteps(line.children, ctx) }
    }
    return step
  })

/** Parse a whole step block, nesting indented lines under `repeat N:` headers. */
export function parseSteps(text: string, ctx: StepParseContext = {}): ParsedStep[] {
  return buildSteps(outlineSteps(text), ctx)
}
