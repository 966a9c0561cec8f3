import { promises as fs } from 'fs'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3'
import { logEvent } from '../utils/logEvent.js'
import { PersistenceError, errorMessage } from '../errors.js'
import type { Racer } from '../race/turtle.js'
import type { PersistenceSettings } from '../config.js'

export type RaceResult = Readonly<{
  rank: number
  finalDistance: number
  finalTimeMs: number // 0 when the racer never finished
  finished: boolean
}>

export type RaceResultRecord = Readonly<
  {
    raceId: string
    racerId: string
    racerName: string
    genome: string
    savedAt: string
  } & RaceResult
>

export type RacerAggregate = Readonly<{
  racerId: string
  name: string
  totalRaces: number
  totalWins: number
  lastRaceId: string
  updatedAt: string
}>

/**
 * Result-persistence collaborator. Called once per persistent racer when a
 * race ends; implementations throw PersistenceError on failure and the
 * caller decides what to do about it.
 */
export interface RacePersistence {
  saveRaceResult(raceId: string, racer: Racer, result: RaceResult): Promise<void>
}

/** Read side of a backend that can serve saved results back. */
export interface RaceResultReader {
  /** Records of one race in rank order; empty when none were saved. */
  readRaceResults(raceId: string): Promise<RaceResultRecord[]>
  readAggregate(racerId: string): Promise<RacerAggregate | null>
}

function toRecord(raceId: string, racer: Racer, result: RaceResult): RaceResultRecord {
  return Object.freeze({
    raceId,
    racerId: racer.id,
    racerName: racer.name,
    genome: racer.genome,
    ...result,
    savedAt: new Date().toISOString(),
  })
}

/**
 * File-based persistence (JSON).
 * - One file per racer per race, written atomically via temp file + rename.
 * - Per-racer aggregates under `racers/`.
 */
export class FileRacePersistence implements RacePersistence, RaceResultReader {
  readonly baseDir: string

  constructor(baseDir = defaultDataDir()) {
    this.baseDir = baseDir
  }

  async saveRaceResult(
    raceId: string,
    racer: Racer,
    result: RaceResult,
  ): Promise<void> {
    const record = toRecord(raceId, racer, result)
    const resultPath = join(this.baseDir, sanitize(raceId), `${sanitize(racer.id)}.json`)
    try {
      await writeJsonAtomic(resultPath, record)
      await this.updateAggregate(record)
    } catch (e) {
      throw new PersistenceError(
        raceId,
        racer.id,
        `failed to save result: ${errorMessage(e)}`,
        { cause: e },
      )
    }
    logEvent('persist:result-saved', {
      raceId,
      racerId: racer.id,
      rank: result.rank,
    })
  }

  async readRaceResults(raceId: string): Promise<RaceResultRecord[]> {
    const dir = join(this.baseDir, sanitize(raceId))
    let names: string[]
    try {
      names = await fs.readdir(dir)
    } catch (e) {
      if (isNotFound(e)) return []
      throw e
    }
    const records: RaceResultRecord[] = []
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      records.push(await readJson(join(dir, name), isResultRecord))
    }
    return records.sort((a, b) => a.rank - b.rank)
  }

  async readAggregate(racerId: string): Promise<RacerAggregate | null> {
    try {
      return await readJson(this.aggregatePath(racerId), isAggregate)
    } catch (e) {
      if (isNotFound(e)) return null
      throw e
    }
  }

  private aggregatePath(racerId: string): string {
    return join(this.baseDir, 'racers', `${sanitize(racerId)}.json`)
  }

  private async updateAggregate(record: RaceResultRecord): Promise<void> {
    const prev = await this.readAggregate(record.racerId)
    const next: RacerAggregate = {
      racerId: record.racerId,
      name: record.racerName,
      totalRaces: (prev?.totalRaces ?? 0) + 1,
      totalWins: (prev?.totalWins ?? 0) + (record.rank === 1 ? 1 : 0),
      lastRaceId: record.raceId,
      updatedAt: record.savedAt,
    }
    await writeJsonAtomic(this.aggregatePath(record.racerId), next)
  }
}

/**
 * S3-based persistence implementation.
 * Objects land at `<prefix>/<raceId>/<racerId>.json`.
 */
export class S3RacePersistence implements RacePersistence {
  private readonly bucket: string
  private readonly prefix: string
  private readonly s3: S3Client

  constructor(bucket: string, prefix = '', s3 = new S3Client({})) {
    this.bucket = bucket
    this.prefix = prefix
    this.s3 = s3
  }

  async saveRaceResult(
    raceId: string,
    racer: Racer,
    result: RaceResult,
  ): Promise<void> {
    const key = `${this.keyFor(raceId)}/${sanitize(racer.id)}.json`
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: JSON.stringify(toRecord(raceId, racer, result)),
          ContentType: 'application/json',
        }),
      )
    } catch (e) {
      throw new PersistenceError(raceId, racer.id, `S3 put failed: ${errorMessage(e)}`, {
        cause: e,
      })
    }
    logEvent('persist:result-saved', { raceId, racerId: racer.id, key })
  }

  private keyFor(raceId: string): string {
    const clean = sanitize(raceId)
    const p = this.prefix ? this.prefix.replace(/\/$/, '') + '/' : ''
    return `${p}${clean}`
  }
}

export function createRacePersistence(settings: PersistenceSettings): RacePersistence {
  if (settings.s3Bucket) {
    logEvent('persist:backend', { backend: 's3', bucket: settings.s3Bucket })
    return new S3RacePersistence(
      settings.s3Bucket,
      settings.s3Prefix,
      new S3Client({ region: settings.region }),
    )
  }
  const dir = settings.dataDir ?? defaultDataDir()
  logEvent('persist:backend', { backend: 'file', dir })
  return new FileRacePersistence(dir)
}

/** The S3 backend is write-only here. */
export function resultReaderFor(persistence: RacePersistence | null): RaceResultReader | null {
  return persistence instanceof FileRacePersistence ? persistence : null
}

// ---------- Helpers ----------

function defaultDataDir(): string {
  const base = fileURLToPath(new URL('.', import.meta.url))
  return join(base, '../../data/races')
}

async function writeJsonAtomic(path: string, obj: unknown): Promise<void> {
  const tmp = `${path}.tmp`
  await fs.mkdir(dirname(path), { recursive: true })
  try {
    await fs.writeFile(tmp, JSON.stringify(obj), 'utf8')
    await fs.rename(tmp, path)
  } catch (e) {
    await fs.rm(tmp, { force: true })
    throw e
  }
}

async function readJson<T>(path: string, guard: (v: unknown) => v is T): Promise<T> {
  const data: unknown = JSON.parse(await fs.readFile(path, 'utf8'))
  if (!guard(data)) throw new Error(`unexpected contents in ${path}`)
  return data
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isResultRecord(v: unknown): v is RaceResultRecord {
  return (
    isRecord(v) &&
    typeof v.raceId === 'string' &&
    typeof v.racerId === 'string' &&
    typeof v.rank === 'number' &&
    typeof v.finalDistance === 'number' &&
    typeof v.finished === 'boolean'
  )
}

function isAggregate(v: unknown): v is RacerAggregate {
  return (
    isRecord(v) &&
    typeof v.racerId === 'string' &&
    typeof v.totalRaces === 'number' &&
    typeof v.totalWins === 'number'
  )
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

function sanitize(id: string): string {
  return id.replace(/[^a-zA-Z0-9-_]/g, '_')
}
