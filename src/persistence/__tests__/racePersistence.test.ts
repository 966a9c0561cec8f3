import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  FileRacePersistence,
  S3RacePersistence,
  createRacePersistence,
} from '../racePersistence.js'
import { Turtle } from '../../race/turtle.js'
import { PersistenceError } from '../../errors.js'

function makeTurtle(id: string) {
  return new Turtle({
    id,
    name: id.toUpperCase(),
    stats: { speed: 10, maxEnergy: 80, recovery: 5, swim: 5, climb: 5 },
  })
}

describe('FileRacePersistence', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'race-results-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('writes one file per racer and no temp files', async () => {
    const store = new FileRacePersistence(dir)
    const racer = makeTurtle('speedster')
    await store.saveRaceResult('race-1', racer, {
      rank: 1,
      finalDistance: 1500,
      finalTimeMs: 41_000,
      finished: true,
    })

    expect(await fs.readdir(join(dir, 'race-1'))).toEqual(['speedster.json'])
    const record: unknown = JSON.parse(
      await fs.readFile(join(dir, 'race-1', 'speedster.json'), 'utf8'),
    )
    expect(record).toMatchObject({
      raceId: 'race-1',
      racerId: 'speedster',
      racerName: 'SPEEDSTER',
      genome: racer.genome,
      rank: 1,
      finalDistance: 1500,
      finalTimeMs: 41_000,
      finished: true,
    })
  })

  it('accumulates races and wins per racer', async () => {
    const store = new FileRacePersistence(dir)
    const racer = makeTurtle('tank')
    const base = { finalDistance: 1500, finalTimeMs: 50_000, finished: true }
    await store.saveRaceResult('race-1', racer, { ...base, rank: 1 })
    await store.saveRaceResult('race-2', racer, { ...base, rank: 3 })

    expect(await store.readAggregate('tank')).toMatchObject({
      racerId: 'tank',
      name: 'TANK',
      totalRaces: 2,
      totalWins: 1,
      lastRaceId: 'race-2',
    })
    expect(await store.readAggregate('nobody')).toBeNull()
  })

  it('reads a race back in rank order', async () => {
    const store = new FileRacePersistence(dir)
    const result = { finalDistance: 10, finalTimeMs: 0, finished: false }
    await store.saveRaceResult('race-9', makeTurtle('a'), { ...result, rank: 2 })
    await store.saveRaceResult('race-9', makeTurtle('b'), { ...result, rank: 1 })
    const records = await store.readRaceResults('race-9')
    expect(records.map((r) => r.racerId)).toEqual(['b', 'a'])
    expect(await store.readRaceResults('race-none')).toEqual([])
  })

  it('sanitizes ids used as paths', async () => {
    const store = new FileRacePersistence(dir)
    await store.saveRaceResult('race/../x', makeTurtle('a.b'), {
      rank: 1,
      finalDistance: 1,
      finalTimeMs: 0,
      finished: false,
    })
    expect(await fs.readdir(join(dir, 'race____x'))).toEqual(['a_b.json'])
  })

  it('wraps filesystem failures in PersistenceError', async () => {
    const blocker = join(dir, 'not-a-dir')
    await fs.writeFile(blocker, 'x')
    const store = new FileRacePersistence(blocker)
    const err = await store
      .saveRaceResult('race-1', makeTurtle('a'), {
        rank: 1,
        finalDistance: 1,
        finalTimeMs: 0,
        finished: false,
      })
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(PersistenceError)
    if (!(err instanceof PersistenceError)) return
    expect(err.raceId).toBe('race-1')
    expect(err.racerId).toBe('a')
  })
})

describe('createRacePersistence', () => {
  it('uses files unless a bucket is configured', () => {
    const base = { dataDir: '/tmp/races', s3Bucket: null, s3Prefix: 'races', region: 'us-east-1' }
    const files = createRacePersistence(base)
    expect(files).toBeInstanceOf(FileRacePersistence)
    expect(files instanceof FileRacePersistence && files.baseDir).toBe('/tmp/races')
    expect(createRacePersistence({ ...base, s3Bucket: 'test-bucket' })).toBeInstanceOf(
      S3RacePersistence,
    )
  })
})
