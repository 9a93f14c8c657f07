/**
 * WordPress component constructs
 */

// Workloads
export { MysqlConstruct, MysqlConstructProps } from './mysql-construct';
export { WordpressConstruct, WordpressConstructProps } from './wordpress-construct';
export { NginxConstruct, NginxConstructProps } from './nginx-construct';

// Supporting components
export { SharedStorageConstruct, SharedStorageConstructProps } from './shared-storage-construct';
export { NginxConfigMap, NginxConfigMapProps } from './nginx-configmap';
export { IngressConstruct, IngressConstructProps } from './ingress-construct';
export { MonitorsConstruct, MonitorsConstructProps, ScrapeTarget } from './monitors-construct';

// Monitoring stack
export { PrometheusRuleConstruct, PrometheusRuleConstructProps } from './prometheus-rule-construct';
export { GrafanaDashboardConfigMap, GrafanaDashboardConfigMapProps } from './grafana-dashboard-configmap';
