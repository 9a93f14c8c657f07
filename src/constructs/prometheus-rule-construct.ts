import { ApiObject } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { AlertRuleConfig, AlertsConfig, ThresholdAlertRuleConfig } from '../config';
import { validateDurationFormat, validateThreshold } from '../utils/validators';

/**
 * A single Prometheus alerting rule as it appears in a PrometheusRule group
 */
export interface AlertRule {
  readonly alert: string;
  readonly expr: string;
  readonly for: string;
  readonly labels: { readonly severity: string };
  readonly annotations: { readonly summary: string; readonly description: string };
}

interface AlertThreshold {
  readonly default: number;

  /**
   * Threshold is a fraction between 0 and 1
   */
  readonly ratio: boolean;
}

interface AlertDefinition {
  readonly key: keyof AlertsConfig;
  readonly alert: string;
  readonly defaults: Required<Omit<AlertRuleConfig, 'enabled'>>;

  /**
   * Absent for alerts that take no threshold
   */
  readonly threshold?: AlertThreshold;
  readonly expr: (namespace: string, threshold: number) => string;
  readonly summary: string;
  readonly description: string;
}

const ALERTS: AlertDefinition[] = [
  {
    key: 'wordpressTargetDown',
    alert: 'WordPressTargetDown',
    defaults: { for: '5m', severity: 'critical' },
    expr: (ns) => `up{job="wordpress", namespace="${ns}"} == 0`,
    summary: 'WordPress scrape target is down',
    description: 'Prometheus cannot scrape WordPress pod {{ $labels.pod }} in namespace {{ $labels.namespace }}.',
  },
  {
    key: 'wordpressReplicasUnavailable',
    alert: 'WordPressReplicasUnavailable',
    defaults: { for: '10m', severity: 'warning' },
    expr: (ns) =>
      `kube_deployment_status_replicas_available{namespace="${ns}", deployment=~".*wordpress-deployment.*"}` +
      ` < kube_deployment_spec_replicas{namespace="${ns}", deployment=~".*wordpress-deployment.*"}`,
    summary: 'WordPress has unavailable replicas',
    description: 'Deployment {{ $labels.deployment }} has fewer available replicas than desired.',
  },
  {
    key: 'mysqlDown',
    alert: 'MySQLDown',
    defaults: { for: '2m', severity: 'critical' },
    expr: (ns) => `mysql_up{namespace="${ns}"} == 0`,
    summary: 'MySQL is down',
    description: 'mysqld-exporter in pod {{ $labels.pod }} cannot reach the database.',
  },
  {
    key: 'mysqlTooManyConnections',
    alert: 'MySQLTooManyConnections',
    defaults: { for: '5m', severity: 'warning' },
    threshold: { default: 0.8, ratio: true },
    expr: (ns, threshold) =>
      `max_over_time(mysql_global_status_threads_connected{namespace="${ns}"}[5m])` +
      ` / mysql_global_variables_max_connections{namespace="${ns}"} > ${threshold}`,
    summary: 'MySQL connection usage is high',
    description: 'More than {{ $value | humanizePercentage }} of max_connections are in use.',
  },
  {
    key: 'nginxDown',
    alert: 'NginxDown',
    defaults: { for: '2m', severity: 'critical' },
    expr: (ns) => `nginx_up{namespace="${ns}"} == 0`,
    summary: 'Nginx is down',
    description: 'nginx-exporter in pod {{ $labels.pod }} cannot read stub_status.',
  },
  {
    key: 'podRestarts',
    alert: 'PodRestartingTooOften',
    defaults: { for: '5m', severity: 'warning' },
    threshold: { default: 3, ratio: false },
    expr: (ns, threshold) =>
      `increase(kube_pod_container_status_restarts_total{namespace="${ns}"}[15m]) > ${threshold}`,
    summary: 'Container is restarting frequently',
    description: 'Container {{ $labels.container }} in pod {{ $labels.pod }} restarted {{ $value }} times in 15 minutes.',
  },
  {
    key: 'sharedVolumeFillingUp',
    alert: 'SharedVolumeFillingUp',
    defaults: { for: '10m', severity: 'warning' },
    threshold: { default: 0.1, ratio: true },
    expr: (ns, threshold) =>
      `kubelet_volume_stats_available_bytes{namespace="${ns}"}` +
      ` / kubelet_volume_stats_capacity_bytes{namespace="${ns}"} < ${threshold}`,
    summary: 'Persistent volume is almost full',
    description: 'PVC {{ $labels.persistentvolumeclaim }} has {{ $value | humanizePercentage }} space left.',
  },
];

/**
 * Build the alerting rules for a WordPress namespace
 *
 * Disabled alerts are left out; thresholds, durations and severities fall back
 * to the per-alert defaults.
 *
 * @throws Error if a `for` duration is malformed, a threshold is out of range,
 * or a threshold is given for an alert that takes none
 */
export function buildAlertRules(namespace: string, alerts: AlertsConfig = {}): AlertRule[] {
  return ALERTS
    .filter((def) => alerts[def.key]?.enabled !== false)
    .map((def) => {
      const overrides: ThresholdAlertRuleConfig | undefined = alerts[def.key];
      const forDuration = overrides?.for ?? def.defaults.for;
      validateDurationFormat(forDuration, `alerts.${def.key}.for`);

      let threshold = 0;
      if (def.threshold) {
        threshold = overrides?.threshold ?? def.threshold.default;
        validateThreshold(threshold, `alerts.${def.key}.threshold`, def.threshold.ratio);
      } else if (overrides?.threshold !== undefined) {
        throw new Error(`Invalid alerts.${def.key}.threshold: ${def.alert} takes no threshold`);
      }

      return {
        alert: def.alert,
        expr: def.expr(namespace, threshold),
        for: forDuration,
        labels: { severity: overrides?.severity ?? def.defaults.severity },
        annotations: { summary: def.summary, description: def.description },
      };
    });
}

export interface PrometheusRuleConstructProps {
  readonly namespace: kplus.Namespace;
  readonly targetNamespace: string;
  readonly release: string;
  readonly alerts?: AlertsConfig;
}

/**
 * PrometheusRule Construct - alerting rules for the WordPress stack
 */
export class PrometheusRuleConstruct extends Construct {
  public readonly rule: ApiObject;
  public readonly rules: AlertRule[];

  constructor(scope: Construct, id: string, props: PrometheusRuleConstructProps) {
    super(scope, id);

    this.rules = buildAlertRules(props.targetNamespace, props.alerts);

    this.rule = new ApiObject(this, 'rule', {
      apiVersion: 'monitoring.coreos.com/v1',
      kind: 'PrometheusRule',
      metadata: {
        namespace: props.namespace.name,
        labels: {
          'release': props.release,
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      spec: {
        groups: [
          {
            name: 'wordpress.rules',
            rules: this.rules,
          },
        ],
      },
    });
  }
}
