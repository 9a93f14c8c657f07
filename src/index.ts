/**
 * CDK8S WordPress - scalable WordPress on Kubernetes
 *
 * This library provides CDK8S constructs for deploying WordPress behind an
 * OpenResty proxy, with MySQL, shared storage and Prometheus monitoring.
 *
 * @packageDocumentation
 */

export * from './config';
export * from './wordpress-chart';
export * from './monitoring-chart';
export * from './constructs';
export { renderNginxConf, NginxConfOptions } from './constructs/nginx-configmap';
export { buildAlertRules, AlertRule } from './constructs/prometheus-rule-construct';
export { buildStackValues, KubePrometheusStackValues } from './utils/stack-values';
