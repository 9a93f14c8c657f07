/**
 * Configuration interfaces for the WordPress deployment
 */

/**
 * Resource requests and limits
 */
export interface ResourcesConfig {
  readonly requests?: {
    readonly cpu?: string;
    readonly memory?: string;
  };
  readonly limits?: {
    readonly cpu?: string;
    readonly memory?: string;
  };
}

/**
 * Probe thresholds, in seconds where applicable
 */
export interface ProbeConfig {
  readonly initialDelaySeconds?: number;
  readonly periodSeconds?: number;
  readonly timeoutSeconds?: number;
  readonly failureThreshold?: number;
}

/**
 * Liveness and readiness probe thresholds for a component
 */
export interface ProbesConfig {
  readonly liveness?: ProbeConfig;
  readonly readiness?: ProbeConfig;
}

/**
 * MySQL probes; the startup probe holds off liveness checks while the data
 * directory is initialised on first start
 */
export interface MysqlProbesConfig extends ProbesConfig {
  readonly startup?: ProbeConfig;
}

/**
 * Image configuration
 */
export interface ImageConfig {
  /**
   * WordPress image (Apache flavour)
   * @default "wordpress:6.6-php8.2-apache"
   */
  readonly wordpress?: string;

  /**
   * MySQL image
   * @default "mysql:8.0"
   */
  readonly mysql?: string;

  /**
   * OpenResty image used for the proxy tier
   * @default "openresty/openresty:1.25.3.1-alpine"
   */
  readonly nginx?: string;

  /**
   * @default "nginx/nginx-prometheus-exporter:1.1.0"
   */
  readonly nginxExporter?: string;

  /**
   * @default "prom/mysqld-exporter:v0.15.1"
   */
  readonly mysqlExporter?: string;

  /**
   * @default "lusotycoon/apache-exporter:v1.0.3"
   */
  readonly apacheExporter?: string;

  /**
   * Image pull policy
   * @default "IfNotPresent"
   */
  readonly pullPolicy?: 'Always' | 'IfNotPresent' | 'Never';
}

/**
 * NFS export backing a statically provisioned volume
 */
export interface NfsVolumeSource {
  readonly server: string;
  readonly path: string;
}

/**
 * Statically provisioned PersistentVolume for the shared WordPress content
 *
 * Exactly one of `nfs` or `hostPath` must be set.
 */
export interface SharedPersistentVolumeConfig {
  readonly nfs?: NfsVolumeSource;

  /**
   * Host path (single-node clusters only)
   */
  readonly hostPath?: string;

  /**
   * What happens to the volume once its claim is released
   * @default "Retain"
   */
  readonly reclaimPolicy?: 'Retain' | 'Delete' | 'Recycle';
}

/**
 * Shared ReadWriteMany volume mounted by every WordPress replica
 */
export interface SharedStorageConfig {
  /**
   * @default "10Gi"
   */
  readonly size?: string;

  /**
   * Storage class; must support ReadWriteMany. Falls back to `storage.storageClass`.
   */
  readonly storageClass?: string;

  /**
   * Static volume to bind the claim to. Dynamic provisioning is used when omitted.
   */
  readonly persistentVolume?: SharedPersistentVolumeConfig;
}

/**
 * Storage configuration
 */
export interface StorageConfig {
  /**
   * Default storage class for all PVCs
   * @example "nfs-client", "longhorn"
   */
  readonly storageClass?: string;

  /**
   * WordPress content volume (wp-content, uploads, plugins)
   */
  readonly shared?: SharedStorageConfig;

  /**
   * MySQL data volume
   */
  readonly mysql?: {
    /**
     * @default "10Gi"
     */
    readonly size?: string;
    readonly storageClass?: string;
  };
}

/**
 * MySQL configuration
 */
export interface MysqlConfig {
  /**
   * @default "wordpress"
   */
  readonly database?: string;

  /**
   * Application user
   * @default "wordpress"
   */
  readonly user?: string;

  /**
   * Secret name holding the root and application passwords
   */
  readonly secretName: string;

  /**
   * Keys within the secret
   * @default { rootPassword: "root-password", password: "password" }
   */
  readonly secretKeys?: {
    readonly rootPassword: string;
    readonly password: string;
  };

  readonly resources?: ResourcesConfig;
  readonly probes?: MysqlProbesConfig;
}

/**
 * CPU based autoscaling for the WordPress Deployment
 */
export interface AutoscalingConfig {
  readonly minReplicas: number;
  readonly maxReplicas: number;

  /**
   * Target average CPU utilisation in percent of the CPU request
   * @default 70
   */
  readonly targetCpuUtilization?: number;
}

/**
 * WordPress configuration
 */
export interface WordpressConfig {
  /**
   * @default 2
   */
  readonly replicas?: number;

  /**
   * @default "wp_"
   */
  readonly tablePrefix?: string;

  /**
   * Sets WORDPRESS_DEBUG
   * @default false
   */
  readonly debug?: boolean;

  /**
   * PHP appended to wp-config.php through WORDPRESS_CONFIG_EXTRA
   */
  readonly configExtra?: string;

  /**
   * Path probed over HTTP
   * @default "/wp-login.php"
   */
  readonly probePath?: string;

  readonly autoscaling?: AutoscalingConfig;
  readonly resources?: ResourcesConfig;
  readonly probes?: ProbesConfig;
}

/**
 * Lua snippets executed by OpenResty at the matching request phase
 */
export interface LuaSnippetsConfig {
  /**
   * http level, runs once when the master process loads the config
   */
  readonly init?: string;
  readonly access?: string;
  readonly headerFilter?: string;
  readonly log?: string;
}

/**
 * Nginx (OpenResty) reverse proxy configuration
 */
export interface NginxConfig {
  /**
   * @default 2
   */
  readonly replicas?: number;

  /**
   * @default "LoadBalancer"
   */
  readonly serviceType?: 'ClusterIP' | 'NodePort' | 'LoadBalancer';

  /**
   * "auto" or a positive integer
   * @default "auto"
   */
  readonly workerProcesses?: string;

  /**
   * @default 1024
   */
  readonly workerConnections?: number;

  /**
   * @default "64m"
   */
  readonly clientMaxBodySize?: string;

  /**
   * proxy_read_timeout in seconds
   * @default 60
   */
  readonly proxyReadTimeout?: number;

  /**
   * CIDRs whose X-Forwarded-For header is trusted
   * @example ["10.42.0.0/16"]
   */
  readonly trustedProxies?: string[];

  readonly lua?: LuaSnippetsConfig;
  readonly resources?: ResourcesConfig;
  readonly probes?: ProbesConfig;
}

/**
 * Ingress configuration
 */
export interface IngressConfig {
  /**
   * @default false
   */
  readonly enabled?: boolean;

  /**
   * Public hostname (FQDN)
   * @example "blog.example.com"
   */
  readonly hostname?: string;

  /**
   * @default "nginx"
   */
  readonly className?: string;

  /**
   * cert-manager ClusterIssuer; TLS is configured when set
   */
  readonly certIssuer?: string;

  /**
   * @default "wordpress-tls"
   */
  readonly tlsSecretName?: string;
}

/**
 * Scrape target generation for an external Prometheus operator
 */
export interface MonitoringConfig {
  /**
   * Adds exporter sidecars, metrics ports and ServiceMonitor/PodMonitor objects
   * @default true
   */
  readonly enabled?: boolean;

  /**
   * @default "30s"
   */
  readonly scrapeInterval?: string;

  /**
   * Value of the `release` label the Prometheus operator selects monitors by
   * @default "kube-prometheus-stack"
   */
  readonly prometheusRelease?: string;
}

/**
 * Main configuration interface for the WordPress chart
 */
export interface WordpressChartConfig {
  /**
   * Kubernetes namespace to deploy to
   * @default "wordpress"
   */
  readonly namespace?: string;

  readonly mysql: MysqlConfig;
  readonly wordpress?: WordpressConfig;
  readonly nginx?: NginxConfig;
  readonly storage?: StorageConfig;
  readonly images?: ImageConfig;
  readonly ingress?: IngressConfig;
  readonly monitoring?: MonitoringConfig;
}

/**
 * Default images, pinned to tags known to work together
 */
export const DEFAULT_IMAGES = {
  wordpress: 'wordpress:6.6-php8.2-apache',
  mysql: 'mysql:8.0',
  nginx: 'openresty/openresty:1.25.3.1-alpine',
  nginxExporter: 'nginx/nginx-prometheus-exporter:1.1.0',
  mysqlExporter: 'prom/mysqld-exporter:v0.15.1',
  apacheExporter: 'lusotycoon/apache-exporter:v1.0.3',
} as const;

/**
 * Routing settings for a single alert
 */
export interface AlertRuleConfig {
  /**
   * @default true
   */
  readonly enabled?: boolean;

  /**
   * How long the condition must hold before firing
   * @example "5m"
   */
  readonly for?: string;

  readonly severity?: 'critical' | 'warning' | 'info';
}

/**
 * Settings for an alert that compares against a threshold
 */
export interface ThresholdAlertRuleConfig extends AlertRuleConfig {
  /**
   * Comparison value; its meaning depends on the alert (ratio, count)
   */
  readonly threshold?: number;
}

/**
 * Alerting rules evaluated against the WordPress namespace
 */
export interface AlertsConfig {
  readonly wordpressTargetDown?: AlertRuleConfig;
  readonly wordpressReplicasUnavailable?: AlertRuleConfig;
  readonly mysqlDown?: AlertRuleConfig;

  /**
   * Threshold is the ratio of connected threads to max_connections, in [0, 1]
   * @default 0.8
   */
  readonly mysqlTooManyConnections?: ThresholdAlertRuleConfig;
  readonly nginxDown?: AlertRuleConfig;

  /**
   * Threshold is the number of restarts within 15 minutes
   * @default 3
   */
  readonly podRestarts?: ThresholdAlertRuleConfig;

  /**
   * Threshold is the available fraction of a volume, in [0, 1]
   * @default 0.1
   */
  readonly sharedVolumeFillingUp?: ThresholdAlertRuleConfig;
}

/**
 * Prometheus settings passed to the upstream kube-prometheus-stack chart
 */
export interface PrometheusStackConfig {
  /**
   * @default "15d"
   */
  readonly retention?: string;

  /**
   * @default "50Gi"
   */
  readonly storageSize?: string;

  readonly storageClass?: string;
}

/**
 * Grafana settings passed to the upstream kube-prometheus-stack chart
 */
export interface GrafanaConfig {
  /**
   * Existing secret with `admin-user` and `admin-password` keys.
   * The upstream chart generates a password when omitted.
   */
  readonly adminSecretName?: string;

  /**
   * Ship the WordPress overview dashboard
   * @default true
   */
  readonly dashboards?: boolean;
}

/**
 * Main configuration interface for the monitoring chart
 */
export interface MonitoringChartConfig {
  /**
   * Namespace the monitoring stack runs in
   * @default "monitoring"
   */
  readonly namespace?: string;

  /**
   * Namespace of the WordPress deployment the rules and dashboard watch
   * @default "wordpress"
   */
  readonly targetNamespace?: string;

  /**
   * Helm release name of kube-prometheus-stack; becomes the `release` label
   * @default "kube-prometheus-stack"
   */
  readonly release?: string;

  readonly alerts?: AlertsConfig;
  readonly prometheus?: PrometheusStackConfig;
  readonly grafana?: GrafanaConfig;

  /**
   * Webhook receiving every alert from Alertmanager
   */
  readonly alertWebhookUrl?: string;
}
