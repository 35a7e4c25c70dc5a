import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability - Structured logging and metrics
 *
 * - Structured JSON logging via Pino (pretty printing for local runs)
 * - Child loggers carrying component context
 * - Basic metrics (counters, timings)
 */

export type { Logger } from 'pino'

export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

export interface ObservabilityOptions {
  pretty?: boolean
  level?: string
}

/**
 * Simple in-memory metrics (can swap for Prometheus/Datadog later)
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private timings = new Map<string, number[]>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    const samples = this.timings.get(key) ?? []
    samples.push(durationMs)
    this.timings.set(key, samples)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getTimings(name: string, labels?: Record<string, string>): number[] {
    return [...(this.timings.get(this.makeKey(name, labels)) ?? [])]
  }

  reset(): void {
    this.counters.clear()
    this.timings.clear()
  }
}

export function createLogger(options?: ObservabilityOptions): Logger {
  return pino({
    name: 'quorum-uniqueness',
    level: options?.level || process.env.LOG_LEVEL || 'info',
    ...(options?.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics

  private constructor(options?: ObservabilityOptions) {
    this.logger = createLogger(options)
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: ObservabilityOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }
}

export const obs = Observability.getInstance()
export const logger = obs.logger
export const metrics = obs.metrics
