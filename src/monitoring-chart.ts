import { Chart, ChartProps } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { MonitoringChartConfig } from './config';
import { GrafanaDashboardConfigMap } from './constructs/grafana-dashboard-configmap';
import { PrometheusRuleConstruct } from './constructs/prometheus-rule-construct';
import { buildStackValues, KubePrometheusStackValues } from './utils/stack-values';
import { validateResourceName } from './utils/validators';

/**
 * Monitoring Chart
 *
 * Alerting rules and Grafana dashboards for the WordPress deployment, plus the
 * values for installing kube-prometheus-stack itself with Helm.
 *
 * @example
 * ```typescript
 * const chart = new MonitoringChart(app, 'monitoring', {
 *   targetNamespace: 'wordpress',
 *   grafana: { adminSecretName: 'grafana-admin' },
 * });
 * Yaml.save('kube-prometheus-stack.values.yaml', [chart.stackValues]);
 * ```
 */
export class MonitoringChart extends Chart {
  public readonly monitoringNamespace: kplus.Namespace;
  public readonly config: MonitoringChartConfig;
  public readonly ruleConstruct: PrometheusRuleConstruct;
  public dashboardConfigMap?: GrafanaDashboardConfigMap;

  /**
   * Values for `helm install kube-prometheus-stack -f ...`
   */
  public readonly stackValues: KubePrometheusStackValues;

  constructor(scope: Construct, id: string, config: MonitoringChartConfig = {}, props?: ChartProps) {
    super(scope, id, props);

    const namespaceName = config.namespace ?? 'monitoring';
    const targetNamespace = config.targetNamespace ?? 'wordpress';
    validateResourceName(namespaceName, 'namespace');
    validateResourceName(targetNamespace, 'targetNamespace');

    this.config = config;
    this.stackValues = buildStackValues(config);

    this.monitoringNamespace = new kplus.Namespace(this, 'namespace', {
      metadata: {
        name: namespaceName,
      },
    });

    this.ruleConstruct = new PrometheusRuleConstruct(this, 'rules', {
      namespace: this.monitoringNamespace,
      targetNamespace,
      release: config.release ?? 'kube-prometheus-stack',
      alerts: config.alerts,
    });

    if (config.grafana?.dashboards !== false) {
      this.dashboardConfigMap = new GrafanaDashboardConfigMap(this, 'dashboard', {
        namespace: this.monitoringNamespace,
        targetNamespace,
      });
    }
  }
}
