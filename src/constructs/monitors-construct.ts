import { ApiObject } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { validateDurationFormat } from '../utils/validators';

/**
 * A scrape target selected by its labels
 */
export interface ScrapeTarget {
  /**
   * Labels of the Service (ServiceMonitor) or pods (PodMonitor) to scrape
   */
  readonly matchLabels: Record<string, string>;

  /**
   * Name of the port serving /metrics
   * @default "metrics"
   */
  readonly port?: string;
}

export interface MonitorsConstructProps {
  readonly namespace: kplus.Namespace;

  /**
   * Value of the `release` label the Prometheus operator selects on
   */
  readonly prometheusRelease: string;

  /**
   * @default "30s"
   */
  readonly scrapeInterval?: string;

  /**
   * Services scraped through a ServiceMonitor, keyed by monitor id
   */
  readonly services: Record<string, ScrapeTarget>;

  /**
   * Pods scraped through a PodMonitor, keyed by monitor id
   */
  readonly pods?: Record<string, ScrapeTarget>;
}

// Label whose value the operator copies into the `job` label
const JOB_LABEL = 'app.kubernetes.io/name';

/**
 * Monitors Construct - Prometheus operator scrape targets
 *
 * Creates monitoring.coreos.com/v1 ServiceMonitor and PodMonitor objects for an
 * externally run Prometheus. A ServiceMonitor takes the job name from the
 * Service's `app.kubernetes.io/name` label, so the WordPress Service yields
 * `up{job="wordpress"}`.
 */
export class MonitorsConstruct extends Construct {
  public readonly serviceMonitors: ApiObject[] = [];
  public readonly podMonitors: ApiObject[] = [];

  constructor(scope: Construct, id: string, props: MonitorsConstructProps) {
    super(scope, id);

    const interval = props.scrapeInterval ?? '30s';
    validateDurationFormat(interval, 'monitoring.scrapeInterval');

    const labels = {
      'release': props.prometheusRelease,
      'app.kubernetes.io/part-of': 'wordpress',
    };

    for (const [name, target] of Object.entries(props.services)) {
      this.serviceMonitors.push(new ApiObject(this, `${name}-servicemonitor`, {
        apiVersion: 'monitoring.coreos.com/v1',
        kind: 'ServiceMonitor',
        metadata: {
          namespace: props.namespace.name,
          labels,
        },
        spec: {
          jobLabel: JOB_LABEL,
          namespaceSelector: { matchNames: [props.namespace.name] },
          selector: { matchLabels: target.matchLabels },
          endpoints: [
            {
              port: target.port ?? 'metrics',
              path: '/metrics',
              interval,
            },
          ],
        },
      }));
    }

    for (const [name, target] of Object.entries(props.pods ?? {})) {
      this.podMonitors.push(new ApiObject(this, `${name}-podmonitor`, {
        apiVersion: 'monitoring.coreos.com/v1',
        kind: 'PodMonitor',
        metadata: {
          namespace: props.namespace.name,
          labels,
        },
        spec: {
          jobLabel: JOB_LABEL,
          namespaceSelector: { matchNames: [props.namespace.name] },
          selector: { matchLabels: target.matchLabels },
          podMetricsEndpoints: [
            {
              port: target.port ?? 'metrics',
              path: '/metrics',
              interval,
            },
          ],
        },
      }));
    }
  }
}
