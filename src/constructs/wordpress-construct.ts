import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { WordpressChartConfig } from '../config';
import { resolveImage, resolvePullPolicy } from '../utils/images';
import {
  buildContainerResources,
  buildProbeOptions,
  DEFAULT_LIVENESS,
  DEFAULT_READINESS,
} from '../utils/resource-parser';
import { validateIntegerSetting, validateReplicaRange, validateReplicas } from '../utils/validators';

export interface WordpressConstructProps {
  readonly config: WordpressChartConfig;
  readonly namespace: kplus.Namespace;
  readonly sharedConfigMap: kplus.ConfigMap;
  readonly sharedPvc: kplus.PersistentVolumeClaim;
  readonly credentialsSecret: kplus.ISecret;
}

export const WORDPRESS_PORT = 80;
export const APACHE_EXPORTER_PORT = 9117;

/**
 * Labels shared by the WordPress Service and the monitors selecting it.
 * `app.kubernetes.io/name` doubles as the Prometheus job label.
 */
export const WORDPRESS_SERVICE_LABELS = {
  'app.kubernetes.io/name': 'wordpress',
  'app.kubernetes.io/component': 'web',
};

/**
 * WordPress Construct - horizontally scalable PHP application tier
 *
 * Components:
 * - Deployment whose replicas all mount the shared ReadWriteMany claim at /var/www/html
 * - ClusterIP Service on port 80 (plus `metrics` when monitored)
 * - Optional HorizontalPodAutoscaler on CPU utilisation
 * - Optional Apache exporter sidecar
 */
export class WordpressConstruct extends Construct {
  public readonly deployment: kplus.Deployment;
  public readonly service: kplus.Service;
  public readonly autoscaler?: kplus.HorizontalPodAutoscaler;

  constructor(scope: Construct, id: string, props: WordpressConstructProps) {
    super(scope, id);

    const { config, namespace, sharedConfigMap, sharedPvc, credentialsSecret } = props;
    const wordpress = config.wordpress ?? {};
    const autoscaling = wordpress.autoscaling;
    const monitoringEnabled = config.monitoring?.enabled !== false;
    const passwordKey = config.mysql.secretKeys?.password ?? 'password';

    if (autoscaling) {
      validateReplicaRange(autoscaling.minReplicas, autoscaling.maxReplicas, 'wordpress.autoscaling');
      validateIntegerSetting(
        autoscaling.targetCpuUtilization ?? 70,
        'wordpress.autoscaling.targetCpuUtilization',
        1,
      );
    }
    const replicas = wordpress.replicas ?? 2;
    validateReplicas(replicas, 'wordpress.replicas');

    this.deployment = new kplus.Deployment(this, 'deployment', {
      metadata: {
        namespace: namespace.name,
        labels: {
          ...WORDPRESS_SERVICE_LABELS,
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      // The autoscaler owns the replica count when enabled
      replicas: autoscaling ? undefined : replicas,
      podMetadata: {
        labels: WORDPRESS_SERVICE_LABELS,
      },
      securityContext: {
        // Apache binds port 80 as root before dropping to www-data
        ensureNonRoot: false,
      },
    });

    const probePath = wordpress.probePath ?? '/wp-login.php';
    const container = this.deployment.addContainer({
      name: 'wordpress',
      image: resolveImage(config.images, 'wordpress'),
      imagePullPolicy: resolvePullPolicy(config.images),
      ports: [{ name: 'http', number: WORDPRESS_PORT }],
      securityContext: {
        ensureNonRoot: false,
        readOnlyRootFilesystem: false,
      },
      resources: buildContainerResources(wordpress.resources, {
        requests: { cpu: '100m', memory: '256Mi' },
        limits: { cpu: '500m', memory: '512Mi' },
      }, 'wordpress.resources'),
      liveness: kplus.Probe.fromHttpGet(probePath, {
        port: WORDPRESS_PORT,
        ...buildProbeOptions(wordpress.probes?.liveness, DEFAULT_LIVENESS, 'wordpress.probes.liveness'),
      }),
      readiness: kplus.Probe.fromHttpGet(probePath, {
        port: WORDPRESS_PORT,
        ...buildProbeOptions(wordpress.probes?.readiness, DEFAULT_READINESS, 'wordpress.probes.readiness'),
      }),
    });

    container.env.copyFrom(kplus.Env.fromConfigMap(sharedConfigMap));
    container.env.addVariable(
      'WORDPRESS_DB_PASSWORD',
      kplus.EnvValue.fromSecretValue({ secret: credentialsSecret, key: passwordKey }),
    );

    // Same claim in every replica; requires ReadWriteMany
    container.mount('/var/www/html', kplus.Volume.fromPersistentVolumeClaim(this, 'content-volume', sharedPvc));

    const ports: kplus.ServicePort[] = [
      {
        name: 'http',
        port: WORDPRESS_PORT,
        targetPort: WORDPRESS_PORT,
        protocol: kplus.Protocol.TCP,
      },
    ];

    if (monitoringEnabled) {
      this.deployment.addContainer({
        name: 'apache-exporter',
        image: resolveImage(config.images, 'apacheExporter'),
        imagePullPolicy: resolvePullPolicy(config.images),
        args: [`--scrape_uri=http://localhost:${WORDPRESS_PORT}/server-status?auto`],
        ports: [{ name: 'metrics', number: APACHE_EXPORTER_PORT }],
        securityContext: {
          ensureNonRoot: false,
        },
        resources: buildContainerResources(undefined, {
          requests: { cpu: '10m', memory: '32Mi' },
          limits: { cpu: '100m', memory: '64Mi' },
        }, 'wordpress.exporter.resources'),
      });
      ports.push({
        name: 'metrics',
        port: APACHE_EXPORTER_PORT,
        targetPort: APACHE_EXPORTER_PORT,
        protocol: kplus.Protocol.TCP,
      });
    }

    this.service = new kplus.Service(this, 'service', {
      metadata: {
        namespace: namespace.name,
        labels: WORDPRESS_SERVICE_LABELS,
      },
      type: kplus.ServiceType.CLUSTER_IP,
      selector: this.deployment,
      ports,
    });

    if (autoscaling) {
      this.autoscaler = new kplus.HorizontalPodAutoscaler(this, 'hpa', {
        metadata: {
          namespace: namespace.name,
        },
        target: this.deployment,
        minReplicas: autoscaling.minReplicas,
        maxReplicas: autoscaling.maxReplicas,
        metrics: [
          kplus.Metric.resourceCpu(
            kplus.MetricTarget.averageUtilization(autoscaling.targetCpuUtilization ?? 70),
          ),
        ],
      });
    }
  }
}
