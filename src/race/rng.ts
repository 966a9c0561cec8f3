import { createHash } from 'crypto'

export type Rng = () => number

export function makeSeededRng(seed: number): Rng {
  // xorshift128 state from one 32-bit seed
  let s0 = seed >>> 0
  let s1 = (seed ^ 0xdeadbeef) >>> 0
  let s2 = (seed ^ 0x12345678) >>> 0
  let s3 = (seed ^ 0xcafebabe) >>> 0

  return () => {
    const t = s1 << 9
    const r = s0 ^ t
    s0 = s1
    s1 = s2
    s2 = s3
    s3 = s3 ^ (s3 >>> 11) ^ (r ^ (r >>> 8))
    return (s3 >>> 0) / 0x100000000
  }
}

export function hashStringToInt(str: string): number {
  return createHash('sha256').update(str).digest().readUInt32BE(0)
}

export function randomBetween(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min)
}

/** Inclusive on both ends. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1))
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('pickOne on empty list')
  return items[Math.floor(rng() * items.length)]
}
