import { logEvent } from '../utils/logEvent.js'
import { errorMessage } from '../errors.js'

type Cancel = () => void

/**
 * Owns every housekeeping timer in the process so shutdown can clear them
 * in one place. Timers are unref'd: they never keep the process alive.
 */
export class MasterTimeline {
  private readonly cancels = new Map<string, Cancel>()

  setInterval(id: string, intervalMs: number, fn: () => void): void {
    this.clear(id)
    const handle = setInterval(() => this.run(id, fn), intervalMs)
    handle.unref()
    this.cancels.set(id, () => clearInterval(handle))
  }

  clear(id: string): void {
    const cancel = this.cancels.get(id)
    if (!cancel) return
    cancel()
    this.cancels.delete(id)
  }

  has(id: string): boolean {
    return this.cancels.has(id)
  }

  shutdown(): void {
    for (const cancel of this.cancels.values()) cancel()
    this.cancels.clear()
  }

  getTimerIds(): string[] {
    return [...this.cancels.keys()]
  }

  private run(id: string, fn: () => void): void {
    try {
      fn()
    } catch (e) {
      logEvent('timeline:callback-error', { timerId: id, error: errorMessage(e) }, 'error')
    }
  }
}
