import {
  CloudWatchClient,
  PutMetricDataCommand,
} from '@aws-sdk/client-cloudwatch'
import { logEvent } from '../utils/logEvent.js'
import { errorMessage } from '../errors.js'
import type { MetricsSettings } from '../config.js'
import type { MetricsSnapshot } from './engineMetrics.js'

export type MetricDatum = { name: string; value: number }

export interface MetricsPublisher {
  push(metrics: MetricDatum[]): Promise<void>
}

export class CloudWatchPublisher implements MetricsPublisher {
  constructor(
    private readonly namespace: string,
    private readonly cw: CloudWatchClient,
  ) {}

  async push(metrics: MetricDatum[]): Promise<void> {
    const MetricData = metrics.map((m) => ({
      MetricName: m.name,
      Value: m.value,
    }))
    try {
      await this.cw.send(
        new PutMetricDataCommand({ Namespace: this.namespace, MetricData }),
      )
    } catch (e) {
      logEvent('metrics:push-failed', { error: errorMessage(e) }, 'warn')
    }
  }
}

/** Null when no namespace is configured. */
export function initCloudWatch(settings: MetricsSettings): CloudWatchPublisher | null {
  if (!settings.cloudwatchNamespace) return null
  logEvent('metrics:cloudwatch', { namespace: settings.cloudwatchNamespace })
  return new CloudWatchPublisher(
    settings.cloudwatchNamespace,
    new CloudWatchClient({ region: settings.region }),
  )
}

export function toMetricData(m: MetricsSnapshot): MetricDatum[] {
  return [
    { name: 'TickRate', value: m.tickRate },
    { name: 'TickWallAvgMs', value: m.tickWallAvgMs },
    { name: 'TickBacklogMaxMs', value: m.tickBacklog.max },
    { name: 'ClientCount', value: m.ws.clientCount },
    { name: 'DroppedFrames', value: m.ws.droppedFrames },
    { name: 'SendFailures', value: m.ws.sendFailures },
    { name: 'ZombieEvictions', value: m.ws.zombieEvictions },
  ]
}
