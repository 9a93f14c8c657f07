import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { NginxConfig, WordpressChartConfig } from '../config';
import { resolveImage, resolvePullPolicy } from '../utils/images';
import {
  buildContainerResources,
  buildProbeOptions,
  DEFAULT_LIVENESS,
  DEFAULT_READINESS,
} from '../utils/resource-parser';
import { validateReplicas } from '../utils/validators';
import { NGINX_CONF_PATH, NginxConfigMap } from './nginx-configmap';
import { WORDPRESS_PORT } from './wordpress-construct';

export interface NginxConstructProps {
  readonly config: WordpressChartConfig;
  readonly namespace: kplus.Namespace;

  /**
   * WordPress service every request is forwarded to
   */
  readonly wordpressService: kplus.Service;
}

export const NGINX_PORT = 80;
export const NGINX_STATUS_PORT = 8080;
export const NGINX_EXPORTER_PORT = 9113;

export const NGINX_SERVICE_LABELS = {
  'app.kubernetes.io/name': 'nginx',
  'app.kubernetes.io/component': 'proxy',
};

function serviceType(type: NginxConfig['serviceType']): kplus.ServiceType {
  switch (type) {
    case 'ClusterIP':
      return kplus.ServiceType.CLUSTER_IP;
    case 'NodePort':
      return kplus.ServiceType.NODE_PORT;
    default:
      return kplus.ServiceType.LOAD_BALANCER;
  }
}

/**
 * Nginx Construct - OpenResty reverse proxy in front of WordPress
 *
 * The proxy tier provides:
 * - proxy_pass of all inbound traffic to the WordPress Service
 * - Optional Lua request hooks (access, header filter, log)
 * - stub_status endpoint scraped by an nginx-prometheus-exporter sidecar
 *
 * Components:
 * - ConfigMap with the rendered nginx.conf
 * - Deployment with the OpenResty container
 * - Service on port 80 (LoadBalancer by default)
 * - nginx-prometheus-exporter sidecar on port 9113, reachable only through its pod
 */
export class NginxConstruct extends Construct {
  public readonly deployment: kplus.Deployment;
  public readonly service: kplus.Service;
  public readonly configMap: kplus.ConfigMap;

  constructor(scope: Construct, id: string, props: NginxConstructProps) {
    super(scope, id);

    const { config, namespace, wordpressService } = props;
    const nginx = config.nginx ?? {};
    const monitoringEnabled = config.monitoring?.enabled !== false;
    const replicas = nginx.replicas ?? 2;
    validateReplicas(replicas, 'nginx.replicas');

    const nginxConfig = new NginxConfigMap(this, 'config', {
      namespace,
      options: {
        upstreamHost: `${wordpressService.name}.${namespace.name}.svc.cluster.local`,
        upstreamPort: WORDPRESS_PORT,
        workerProcesses: nginx.workerProcesses,
        workerConnections: nginx.workerConnections,
        clientMaxBodySize: nginx.clientMaxBodySize,
        proxyReadTimeout: nginx.proxyReadTimeout,
        trustedProxies: nginx.trustedProxies,
        lua: nginx.lua,
        statusPort: monitoringEnabled ? NGINX_STATUS_PORT : undefined,
      },
    });
    this.configMap = nginxConfig.configMap;

    this.deployment = new kplus.Deployment(this, 'deployment', {
      metadata: {
        namespace: namespace.name,
        labels: {
          ...NGINX_SERVICE_LABELS,
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      replicas,
      podMetadata: {
        labels: NGINX_SERVICE_LABELS,
        annotations: {
          'checksum/config': nginxConfig.checksum,
        },
      },
      securityContext: {
        // OpenResty master binds port 80
        ensureNonRoot: false,
      },
    });

    const container = this.deployment.addContainer({
      name: 'nginx',
      image: resolveImage(config.images, 'nginx'),
      imagePullPolicy: resolvePullPolicy(config.images),
      ports: [{ name: 'http', number: NGINX_PORT }],
      securityContext: {
        ensureNonRoot: false,
        readOnlyRootFilesystem: false,
      },
      resources: buildContainerResources(nginx.resources, {
        requests: { cpu: '50m', memory: '64Mi' },
        limits: { cpu: '500m', memory: '256Mi' },
      }, 'nginx.resources'),
      liveness: kplus.Probe.fromHttpGet('/healthz', {
        port: NGINX_PORT,
        ...buildProbeOptions(nginx.probes?.liveness, DEFAULT_LIVENESS, 'nginx.probes.liveness'),
      }),
      readiness: kplus.Probe.fromHttpGet('/healthz', {
        port: NGINX_PORT,
        ...buildProbeOptions(
          nginx.probes?.readiness,
          { ...DEFAULT_READINESS, initialDelaySeconds: 5 },
          'nginx.probes.readiness',
        ),
      }),
    });

    const configVolume = kplus.Volume.fromConfigMap(this, 'config-volume', this.configMap);
    container.mount(NGINX_CONF_PATH, configVolume, {
      subPath: 'nginx.conf',
      readOnly: true,
    });

    if (monitoringEnabled) {
      this.deployment.addContainer({
        name: 'nginx-exporter',
        image: resolveImage(config.images, 'nginxExporter'),
        imagePullPolicy: resolvePullPolicy(config.images),
        args: [`--nginx.scrape-uri=http://localhost:${NGINX_STATUS_PORT}/stub_status`],
        ports: [{ name: 'metrics', number: NGINX_EXPORTER_PORT }],
        securityContext: {
          ensureNonRoot: false,
        },
        resources: buildContainerResources(undefined, {
          requests: { cpu: '10m', memory: '16Mi' },
          limits: { cpu: '100m', memory: '64Mi' },
        }, 'nginx.exporter.resources'),
      });
    }

    this.service = new kplus.Service(this, 'service', {
      metadata: {
        namespace: namespace.name,
        labels: NGINX_SERVICE_LABELS,
      },
      type: serviceType(nginx.serviceType),
      selector: this.deployment,
      // The exporter port stays off this Service; a PodMonitor scrapes it in-cluster
      ports: [
        {
          name: 'http',
          port: NGINX_PORT,
          targetPort: NGINX_PORT,
          protocol: kplus.Protocol.TCP,
        },
      ],
    });
  }
}
