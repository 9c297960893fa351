import { defineResource } from 'braided'

// ============================================================================
// Types
// ============================================================================

export type ProfileMetric = {
  name: string
  totalTime: number
  callCount: number
  avgTime: number
  minTime: number
  maxTime: number
  lastTime: number
}

export type ProfilerState = {
  enabled: boolean
  metrics: Map<string, ProfileMetric>
  activeTimers: Map<string, number>
}

// ============================================================================
// Pure Functions
// ============================================================================

export function createProfilerState(): ProfilerState {
  return {
    enabled: false,
    metrics: new Map<string, ProfileMetric>(),
    activeTimers: new Map<string, number>(),
  }
}

/**
 * Fold one timing sample into a metric (pure)
 */
export function updateMetric(
  existing: ProfileMetric | undefined,
  name: string,
  duration: number
): ProfileMetric {
  if (!existing) {
    return {
      name,
      totalTime: duration,
      callCount: 1,
      avgTime: duration,
      minTime: duration,
      maxTime: duration,
      lastTime: duration,
    }
  }

  const totalTime = existing.totalTime + duration
  const callCount = existing.callCount + 1
  return {
    name,
    totalTime,
    callCount,
    avgTime: totalTime / callCount,
    minTime: Math.min(existing.minTime, duration),
    maxTime: Math.max(existing.maxTime, duration),
    lastTime: duration,
  }
}

export function sortMetricsByTotalTime(
  metrics: ProfileMetric[]
): ProfileMetric[] {
  return [...metrics].sort((a, b) => b.totalTime - a.totalTime)
}

export function formatSummary(metrics: ProfileMetric[]): string {
  const lines: string[] = []

  lines.push('')
  lines.push('Section                        Total(ms)  Avg(µs)     Calls')
  lines.push('-----------------------------------------------------------')

  for (const metric of sortMetricsByTotalTime(metrics)) {
    const name = metric.name.padEnd(30).slice(0, 30)
    const total = metric.totalTime.toFixed(2).padStart(9)
    const avg = (metric.avgTime * 1000).toFixed(2).padStart(9)
    const calls = metric.callCount.toString().padStart(9)
    lines.push(`${name} ${total} ${avg} ${calls}`)
  }

  return lines.join('\n')
}

// ============================================================================
// Profiler Resource (Impure Shell)
// ============================================================================

export type Profiler = {
  enable: () => void
  start: (name: string) => void
  end: (name: string) => void
  getMetrics: () => ProfileMetric[]
  printSummary: () => void
  reset: () => void
}

export function createProfiler(
  now: () => number = () => performance.now()
): Profiler {
  const state = createProfilerState()

  const start = (name: string) => {
    if (!state.enabled) return
    state.activeTimers.set(name, now())
  }

  const end = (name: string) => {
    if (!state.enabled) return

    const startTime = state.activeTimers.get(name)
    if (startTime === undefined) {
      console.warn(`[profiler] No start time for "${name}"`)
      return
    }

    state.activeTimers.delete(name)
    const duration = now() - startTime
    state.metrics.set(name, updateMetric(state.metrics.get(name), name, duration))
  }

  const getMetrics = () => Array.from(state.metrics.values())

  return {
    enable: () => {
      state.enabled = true
      state.metrics.clear()
      console.log('[profiler] enabled')
    },
    start,
    end,
    getMetrics,
    printSummary: () => {
      if (!state.enabled) {
        console.log('[profiler] disabled, nothing to report')
        return
      }
      console.log(formatSummary(getMetrics()))
    },
    reset: () => {
      state.metrics.clear()
      state.activeTimers.clear()
    },
  }
}

export const profiler = defineResource({
  start: (): Profiler => createProfiler(),
  halt: (instance: Profiler) => {
    instance.reset()
  },
})
