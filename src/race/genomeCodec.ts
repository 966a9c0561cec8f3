/**
 * Compact genome strings for the wire: `B{body}-S{shell}-P{limb}-C{RRGGBB}`.
 *
 *   B1-S1-P2-CFF00FF  mottled body, spotted shell, fins, magenta
 *   B0-S0-P0-C228B22  the default green turtle
 *
 * Only these four traits travel to observers; everything else about a
 * turtle's genetics stays server-side.
 */

export const BODY_PATTERNS = ['solid', 'mottled', 'speckled', 'marbled'] as const
export const SHELL_PATTERNS = ['hex', 'spots', 'stripes', 'rings'] as const
export const LIMB_SHAPES = ['flippers', 'feet', 'fins'] as const

export type BodyPattern = (typeof BODY_PATTERNS)[number]
export type ShellPattern = (typeof SHELL_PATTERNS)[number]
export type LimbShape = (typeof LIMB_SHAPES)[number]
export type Rgb = readonly [number, number, number]

export type VisualTraits = Readonly<{
  body: BodyPattern
  shell: ShellPattern
  limb: LimbShape
  color: Rgb
}>

export const DEFAULT_TRAITS: VisualTraits = Object.freeze({
  body: 'solid',
  shell: 'hex',
  limb: 'flippers',
  color: Object.freeze([34, 139, 34] as const),
})

export type GenomeParseResult =
  | { ok: true; traits: VisualTraits }
  | { ok: false; reason: string }

const GENOME_PATTERN = /^B([0-3])-S([0-3])-P([0-2])-C([0-9a-f]{6})$/i

function indexOrZero(items: readonly string[], value: string): number {
  const idx = items.indexOf(value)
  return idx < 0 ? 0 : idx
}

function channelHex(v: number): string {
  const c = Math.min(255, Math.max(0, Math.round(v)))
  return c.toString(16).toUpperCase().padStart(2, '0')
}

function hexToRgb(hex: string): Rgb {
  return [
    parseInt(hex.slice(0, 2), 16),
    parseInt(hex.slice(2, 4), 16),
    parseInt(hex.slice(4, 6), 16),
  ]
}

function lookup<T extends string>(items: readonly T[], raw: string): T | null {
  if (!/^\d+$/.test(raw)) return null
  const idx = Number(raw)
  return idx < items.length ? items[idx] : null
}

export function encodeGenome(traits: Partial<VisualTraits> = {}): string {
  const body = indexOrZero(BODY_PATTERNS, traits.body ?? DEFAULT_TRAITS.body)
  const shell = indexOrZero(SHELL_PATTERNS, traits.shell ?? DEFAULT_TRAITS.shell)
  const limb = indexOrZero(LIMB_SHAPES, traits.limb ?? DEFAULT_TRAITS.limb)
  const [r, g, b] = traits.color ?? DEFAULT_TRAITS.color
  return `B${body}-S${shell}-P${limb}-C${channelHex(r)}${channelHex(g)}${channelHex(b)}`
}

/**
 * Lenient decode: every well-formed segment is kept, anything unrecognised
 * is skipped. A completely malformed string yields `{}`.
 */
export function decodeGenome(genome: string): Partial<VisualTraits> {
  const result: {
    body?: BodyPattern
    shell?: ShellPattern
    limb?: LimbShape
    color?: Rgb
  } = {}

  for (const part of genome.split('-')) {
    if (!part) continue
    const prefix = part[0]
    const value = part.slice(1)
    if (prefix === 'B') {
      const body = lookup(BODY_PATTERNS, value)
      if (body) result.body = body
    } else if (prefix === 'S') {
      const shell = lookup(SHELL_PATTERNS, value)
      if (shell) result.shell = shell
    } else if (prefix === 'P') {
      const limb = lookup(LIMB_SHAPES, value)
      if (limb) result.limb = limb
    } else if (prefix === 'C' && /^[0-9a-f]{6}$/i.test(value)) {
      result.color = hexToRgb(value)
    }
  }

  return result
}

/** Strict decode: the whole string must be a valid genome. */
export function parseGenome(genome: string): GenomeParseResult {
  const m = GENOME_PATTERN.exec(genome)
  if (!m) return { ok: false, reason: `not a genome string: "${genome}"` }
  return {
    ok: true,
    traits: {
      body: BODY_PATTERNS[Number(m[1])],
      shell: SHELL_PATTERNS[Number(m[2])],
      limb: LIMB_SHAPES[Number(m[3])],
      color: hexToRgb(m[4]),
    },
  }
}

export function isGenome(genome: string): boolean {
  return GENOME_PATTERN.test(genome)
}
