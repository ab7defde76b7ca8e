import type { ResolvedTarget, ZoneDefinition, ZoneKind } from '../zones/zone.types'

export const STEP_KINDS = ['warmup', 'interval', 'recovery', 'cooldown', 'rest', 'other'] as const
export type StepKind = (typeof STEP_KINDS)[number]

export type Quantity =
  | { type: 'time'; seconds: number }
  | { type: 'distance'; meters: number }
  | { type: 'lap' } // ends on the lap button

export type TargetRef =
  | { source: 'zone'; kind: ZoneKind; zone: string }
  | { source: 'literal'; kind: ZoneKind; definition: ZoneDefinition }

export type LeafStep<T> = {
  type: 'step'
  kind: StepKind
  quantity: Quantity
  target?: T
  description?: string
}

export type RepeatStep<T> = {
  type: 'repeat'
  count: number
  steps: StepNode<T>[]
}

export type StepNode<T> = LeafStep<T> | RepeatStep<T>

export type ParsedStep = StepNode<TargetRef>
export type CompiledStep = StepNode<ResolvedTarget>

export type ZoneLookup = {
  has(zone: string, kind: ZoneKind): boolean
}

export type StepParseContext = {
  // when set, identifiers are checked against it
  zones?: ZoneLookup
  lineNumber?: number
  warnings?: string[]
}

/** One line of a step block with its nesting resolved but its content unparsed. */
export type StepOutline = {
  text: string
  indent: number
  lineNumber: number
  children: StepOutline[]
}
