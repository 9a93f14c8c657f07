import { Chart, Testing } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { ThresholdAlertRuleConfig } from '../src/config';
import { buildAlertRules, PrometheusRuleConstruct } from '../src/constructs/prometheus-rule-construct';

describe('buildAlertRules', () => {
  it('builds every alert with defaults', () => {
    const rules = buildAlertRules('blog');

    expect(rules.map(r => r.alert)).toEqual([
      'WordPressTargetDown',
      'WordPressReplicasUnavailable',
      'MySQLDown',
      'MySQLTooManyConnections',
      'NginxDown',
      'PodRestartingTooOften',
      'SharedVolumeFillingUp',
    ]);
  });

  it('scopes expressions to the namespace', () => {
    const rules = buildAlertRules('blog');

    expect(rules[0]).toEqual({
      alert: 'WordPressTargetDown',
      expr: 'up{job="wordpress", namespace="blog"} == 0',
      for: '5m',
      labels: { severity: 'critical' },
      annotations: {
        summary: 'WordPress scrape target is down',
        description: 'Prometheus cannot scrape WordPress pod {{ $labels.pod }} in namespace {{ $labels.namespace }}.',
      },
    });
    expect(rules[2].expr).toBe('mysql_up{namespace="blog"} == 0');
    expect(rules[4].expr).toBe('nginx_up{namespace="blog"} == 0');
  });

  it('uses default thresholds', () => {
    const rules = buildAlertRules('blog');

    expect(rules[3].expr).toBe(
      'max_over_time(mysql_global_status_threads_connected{namespace="blog"}[5m])' +
      ' / mysql_global_variables_max_connections{namespace="blog"} > 0.8',
    );
    expect(rules[5].expr).toBe('increase(kube_pod_container_status_restarts_total{namespace="blog"}[15m]) > 3');
    expect(rules[6].expr).toBe(
      'kubelet_volume_stats_available_bytes{namespace="blog"}' +
      ' / kubelet_volume_stats_capacity_bytes{namespace="blog"} < 0.1',
    );
  });

  it('applies overrides', () => {
    const rules = buildAlertRules('blog', {
      podRestarts: { threshold: 5, for: '10m', severity: 'critical' },
    });
    const restarts = rules.find(r => r.alert === 'PodRestartingTooOften');

    expect(restarts?.expr).toBe('increase(kube_pod_container_status_restarts_total{namespace="blog"}[15m]) > 5');
    expect(restarts?.for).toBe('10m');
    expect(restarts?.labels.severity).toBe('critical');
  });

  it('drops disabled alerts', () => {
    const rules = buildAlertRules('blog', {
      nginxDown: { enabled: false },
      sharedVolumeFillingUp: { enabled: false },
    });

    expect(rules).toHaveLength(5);
    expect(rules.map(r => r.alert)).not.toContain('NginxDown');
    expect(rules.map(r => r.alert)).not.toContain('SharedVolumeFillingUp');
  });

  it('accepts ratio thresholds at the bounds', () => {
    const rules = buildAlertRules('blog', {
      mysqlTooManyConnections: { threshold: 1 },
      sharedVolumeFillingUp: { threshold: 0 },
    });

    expect(rules[3].expr.endsWith('> 1')).toBe(true);
    expect(rules[6].expr.endsWith('< 0')).toBe(true);
  });

  it('rejects a threshold that is not a number', () => {
    expect(() => buildAlertRules('blog', { sharedVolumeFillingUp: { threshold: NaN } })).toThrow(
      'Invalid threshold for alerts.sharedVolumeFillingUp.threshold: NaN. Expected a finite number >= 0',
    );
  });

  it('rejects a negative threshold', () => {
    expect(() => buildAlertRules('blog', { podRestarts: { threshold: -1 } })).toThrow(
      'Invalid threshold for alerts.podRestarts.threshold: -1. Expected a finite number >= 0',
    );
  });

  it('rejects a ratio above one', () => {
    expect(() => buildAlertRules('blog', { mysqlTooManyConnections: { threshold: 80 } })).toThrow(
      'Invalid threshold for alerts.mysqlTooManyConnections.threshold: 80. Expected a ratio between 0 and 1',
    );
  });

  it('rejects a threshold on an alert without one', () => {
    const overrides: ThresholdAlertRuleConfig = { threshold: 5 };

    expect(() => buildAlertRules('blog', { mysqlDown: overrides })).toThrow(
      'Invalid alerts.mysqlDown.threshold: MySQLDown takes no threshold',
    );
  });

  it('rejects an invalid duration', () => {
    expect(() => buildAlertRules('blog', { mysqlDown: { for: '2 minutes' } })).toThrow(
      'Invalid duration format for alerts.mysqlDown.for: "2 minutes"',
    );
  });
});

describe('PrometheusRuleConstruct', () => {
  let chart: Chart;
  let namespace: kplus.Namespace;

  beforeEach(() => {
    chart = Testing.chart();

    namespace = new kplus.Namespace(chart, 'test-namespace', {
      metadata: { name: 'monitoring' },
    });
  });

  test('creates a PrometheusRule in the monitoring namespace', () => {
    const construct = new PrometheusRuleConstruct(chart, 'rules', {
      namespace,
      targetNamespace: 'blog',
      release: 'kube-prometheus-stack',
    });

    const rules = Testing.synth(chart).filter(m => m.kind === 'PrometheusRule');
    expect(rules).toHaveLength(1);
    expect(rules[0].apiVersion).toBe('monitoring.coreos.com/v1');
    expect(rules[0].metadata.namespace).toBe('monitoring');
    expect(rules[0].metadata.labels.release).toBe('kube-prometheus-stack');
    expect(rules[0].spec.groups).toHaveLength(1);
    expect(rules[0].spec.groups[0].name).toBe('wordpress.rules');
    expect(rules[0].spec.groups[0].rules).toHaveLength(7);
    expect(rules[0].spec.groups[0].rules[0].expr).toBe(construct.rules[0].expr);
  });
});
