import { describe, it, expect, vi, afterEach } from 'vitest'
import { MasterTimeline } from '../masterTimeline.js'

describe('MasterTimeline', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('repeats intervals until cleared', () => {
    vi.useFakeTimers()
    const timeline = new MasterTimeline()
    const fn = vi.fn()
    timeline.setInterval('tick', 50, fn)
    expect(timeline.getTimerIds()).toEqual(['tick'])
    vi.advanceTimersByTime(160)
    expect(fn).toHaveBeenCalledTimes(3)
    timeline.clear('tick')
    expect(timeline.has('tick')).toBe(false)
    vi.advanceTimersByTime(500)
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('replaces a timer registered under the same id', () => {
    vi.useFakeTimers()
    const timeline = new MasterTimeline()
    const first = vi.fn()
    const second = vi.fn()
    timeline.setInterval('job', 100, first)
    timeline.setInterval('job', 100, second)
    vi.advanceTimersByTime(100)
    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })

  it('keeps the interval alive when a callback throws', () => {
    vi.useFakeTimers()
    const timeline = new MasterTimeline()
    const fn = vi.fn(() => {
      throw new Error('boom')
    })
    timeline.setInterval('flaky', 10, fn)
    vi.advanceTimersByTime(30)
    expect(fn).toHaveBeenCalledTimes(3)
    timeline.shutdown()
    expect(timeline.getTimerIds()).toEqual([])
  })
})
