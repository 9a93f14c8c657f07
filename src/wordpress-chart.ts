import { Chart, ChartProps } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { WordpressChartConfig } from './config';
import { IngressConstruct } from './constructs/ingress-construct';
import { MonitorsConstruct } from './constructs/monitors-construct';
import { MysqlConstruct } from './constructs/mysql-construct';
import { NGINX_PORT, NGINX_SERVICE_LABELS, NginxConstruct } from './constructs/nginx-construct';
import { SharedStorageConstruct } from './constructs/shared-storage-construct';
import { WORDPRESS_SERVICE_LABELS, WordpressConstruct } from './constructs/wordpress-construct';
import { validateResourceName } from './utils/validators';

/**
 * PHP run before wp-settings.php so WordPress treats proxied HTTPS requests as secure
 */
const FORWARDED_PROTO_PHP = [
  "if (isset($_SERVER['HTTP_X_FORWARDED_PROTO']) && $_SERVER['HTTP_X_FORWARDED_PROTO'] === 'https') {",
  "  $_SERVER['HTTPS'] = 'on';",
  '}',
].join('\n');

/**
 * WordPress Chart
 *
 * Deploys WordPress behind an OpenResty reverse proxy, backed by a single MySQL
 * pod and a ReadWriteMany content volume, with optional Prometheus scrape targets.
 *
 * @example
 * ```typescript
 * import { App } from 'cdk8s';
 * import { WordpressChart } from 'cdk8s-wordpress';
 *
 * const app = new App();
 * new WordpressChart(app, 'wordpress', {
 *   namespace: 'wordpress',
 *   mysql: {
 *     secretName: 'mysql-credentials',
 *   },
 *   storage: {
 *     shared: { size: '20Gi', storageClass: 'nfs-client' },
 *     mysql: { size: '10Gi', storageClass: 'standard' },
 *   },
 *   wordpress: { replicas: 3 },
 * });
 * app.synth();
 * ```
 */
export class WordpressChart extends Chart {
  /**
   * The Kubernetes namespace where WordPress is deployed
   */
  public readonly wordpressNamespace: kplus.Namespace;

  /**
   * The configuration used for this deployment
   */
  public readonly config: WordpressChartConfig;

  /**
   * Environment ConfigMap consumed by the WordPress container
   */
  public readonly sharedConfigMap: kplus.ConfigMap;

  public readonly storageConstruct: SharedStorageConstruct;
  public readonly mysqlConstruct: MysqlConstruct;
  public readonly wordpressConstruct: WordpressConstruct;
  public readonly nginxConstruct: NginxConstruct;
  public ingressConstruct?: IngressConstruct;
  public monitorsConstruct?: MonitorsConstruct;

  constructor(scope: Construct, id: string, config: WordpressChartConfig, props?: ChartProps) {
    super(scope, id, props);

    const namespaceName = config.namespace ?? 'wordpress';
    validateResourceName(namespaceName, 'namespace');
    if (config.mysql.database !== undefined && config.mysql.database.trim() === '') {
      throw new Error('Invalid mysql.database: must not be empty');
    }

    this.config = config;

    this.wordpressNamespace = new kplus.Namespace(this, 'namespace', {
      metadata: {
        name: namespaceName,
      },
    });

    this.storageConstruct = new SharedStorageConstruct(this, 'storage', {
      config,
      namespace: this.wordpressNamespace,
    });

    this.mysqlConstruct = new MysqlConstruct(this, 'mysql', {
      config,
      namespace: this.wordpressNamespace,
    });

    this.sharedConfigMap = this.createSharedConfigMap();

    this.wordpressConstruct = new WordpressConstruct(this, 'wordpress', {
      config,
      namespace: this.wordpressNamespace,
      sharedConfigMap: this.sharedConfigMap,
      sharedPvc: this.storageConstruct.pvc,
      credentialsSecret: this.mysqlConstruct.credentialsSecret,
    });

    this.nginxConstruct = new NginxConstruct(this, 'nginx', {
      config,
      namespace: this.wordpressNamespace,
      wordpressService: this.wordpressConstruct.service,
    });

    if (config.ingress?.enabled) {
      this.createIngress();
    }

    if (config.monitoring?.enabled !== false) {
      this.createMonitors();
    }
  }

  /**
   * Creates the environment ConfigMap read by the official WordPress image
   */
  private createSharedConfigMap(): kplus.ConfigMap {
    const wordpress = this.config.wordpress;

    const envVars: Record<string, string> = {
      // Database connection; the password comes from the credentials secret
      WORDPRESS_DB_HOST: this.mysqlConstruct.host,
      WORDPRESS_DB_NAME: this.config.mysql.database ?? 'wordpress',
      WORDPRESS_DB_USER: this.config.mysql.user ?? 'wordpress',
      WORDPRESS_TABLE_PREFIX: wordpress?.tablePrefix ?? 'wp_',
      WORDPRESS_CONFIG_EXTRA: wordpress?.configExtra
        ? `${FORWARDED_PROTO_PHP}\n${wordpress.configExtra}`
        : FORWARDED_PROTO_PHP,
    };

    if (wordpress?.debug) {
      envVars.WORDPRESS_DEBUG = '1';
    }

    return new kplus.ConfigMap(this, 'env-config', {
      metadata: {
        namespace: this.wordpressNamespace.name,
      },
      data: envVars,
    });
  }

  /**
   * Creates the Ingress routing the public hostname to the proxy tier
   */
  private createIngress(): void {
    const ingress = this.config.ingress;
    if (!ingress?.hostname) {
      throw new Error('Cannot create ingress: ingress.hostname is required');
    }

    this.ingressConstruct = new IngressConstruct(this, 'ingress', {
      namespace: this.wordpressNamespace,
      hostname: ingress.hostname,
      backendService: this.nginxConstruct.service,
      backendPort: NGINX_PORT,
      className: ingress.className,
      certIssuer: ingress.certIssuer,
      tlsSecretName: ingress.tlsSecretName,
    });
  }

  /**
   * Creates a ServiceMonitor for WordPress and PodMonitors for Nginx and MySQL
   */
  private createMonitors(): void {
    const monitoring = this.config.monitoring;

    this.monitorsConstruct = new MonitorsConstruct(this, 'monitors', {
      namespace: this.wordpressNamespace,
      prometheusRelease: monitoring?.prometheusRelease ?? 'kube-prometheus-stack',
      scrapeInterval: monitoring?.scrapeInterval,
      services: {
        wordpress: { matchLabels: WORDPRESS_SERVICE_LABELS },
      },
      pods: {
        nginx: { matchLabels: NGINX_SERVICE_LABELS },
        mysql: {
          matchLabels: {
            'app.kubernetes.io/name': 'mysql',
            'app.kubernetes.io/component': 'database',
          },
        },
      },
    });
  }
}
