import { Chart, Testing } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { WordpressChartConfig } from '../src/config';
import { WordpressConstruct } from '../src/constructs/wordpress-construct';

describe('WordpressConstruct', () => {
  let chart: Chart;
  let namespace: kplus.Namespace;
  let sharedConfigMap: kplus.ConfigMap;
  let sharedPvc: kplus.PersistentVolumeClaim;
  let credentialsSecret: kplus.ISecret;
  let config: WordpressChartConfig;

  beforeEach(() => {
    chart = Testing.chart();

    namespace = new kplus.Namespace(chart, 'test-namespace', {
      metadata: { name: 'test-wordpress' },
    });

    sharedConfigMap = new kplus.ConfigMap(chart, 'test-config', {
      metadata: { namespace: namespace.name },
      data: {
        WORDPRESS_DB_HOST: 'mysql.test-wordpress.svc.cluster.local',
        WORDPRESS_DB_NAME: 'wordpress',
      },
    });

    sharedPvc = new kplus.PersistentVolumeClaim(chart, 'test-pvc', {
      metadata: { namespace: namespace.name },
      accessModes: [kplus.PersistentVolumeAccessMode.READ_WRITE_MANY],
    });

    credentialsSecret = kplus.Secret.fromSecretName(chart, 'test-secret', 'mysql-credentials');

    config = {
      mysql: {
        secretName: 'mysql-credentials',
      },
    };
  });

  function create(): WordpressConstruct {
    return new WordpressConstruct(chart, 'wordpress', {
      config,
      namespace,
      sharedConfigMap,
      sharedPvc,
      credentialsSecret,
    });
  }

  test('creates deployment and service', () => {
    const construct = create();

    expect(construct.deployment).toBeDefined();
    expect(construct.service).toBeDefined();
    expect(construct.autoscaler).toBeUndefined();

    const manifests = Testing.synth(chart);

    const deployments = manifests.filter(m => m.kind === 'Deployment');
    expect(deployments).toHaveLength(1);
    expect(deployments[0].spec.replicas).toBe(2);
    expect(deployments[0].metadata.labels['app.kubernetes.io/name']).toBe('wordpress');

    const services = manifests.filter(m => m.kind === 'Service');
    expect(services).toHaveLength(1);
    expect(services[0].spec.type).toBe('ClusterIP');
    expect(services[0].metadata.labels['app.kubernetes.io/name']).toBe('wordpress');

    const portNames = services[0].spec.ports.map((p: { name: string }) => p.name);
    expect(portNames).toEqual(['http', 'metrics']);

    expect(manifests.filter(m => m.kind === 'HorizontalPodAutoscaler')).toHaveLength(0);
  });

  test('uses configured replica count', () => {
    config = { ...config, wordpress: { replicas: 4 } };
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    expect(deployment?.spec.replicas).toBe(4);
  });

  test('mounts the shared claim at /var/www/html', () => {
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const podSpec = deployment?.spec.template.spec;
    const container = podSpec.containers[0];

    const mount = container.volumeMounts.find(
      (vm: { mountPath: string }) => vm.mountPath === '/var/www/html',
    );
    expect(mount).toBeDefined();

    const volume = podSpec.volumes.find((v: { name: string }) => v.name === mount.name);
    expect(volume.persistentVolumeClaim.claimName).toBe(sharedPvc.name);
  });

  test('loads environment from configmap and password from secret', () => {
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const container = deployment?.spec.template.spec.containers[0];

    expect(container.envFrom).toContainEqual({ configMapRef: { name: sharedConfigMap.name } });

    const password = container.env.find((e: { name: string }) => e.name === 'WORDPRESS_DB_PASSWORD');
    expect(password.valueFrom.secretKeyRef).toEqual({ name: 'mysql-credentials', key: 'password' });
  });

  test('probes the login page by default', () => {
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const container = deployment?.spec.template.spec.containers[0];

    expect(container.livenessProbe.httpGet.path).toBe('/wp-login.php');
    expect(container.livenessProbe.httpGet.port).toBe(80);
    expect(container.readinessProbe.httpGet.path).toBe('/wp-login.php');
  });

  test('applies probe path and thresholds', () => {
    config = {
      ...config,
      wordpress: {
        probePath: '/healthz.php',
        probes: { readiness: { initialDelaySeconds: 20, failureThreshold: 6 } },
      },
    };
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const probe = deployment?.spec.template.spec.containers[0].readinessProbe;

    expect(probe.httpGet.path).toBe('/healthz.php');
    expect(probe.initialDelaySeconds).toBe(20);
    expect(probe.failureThreshold).toBe(6);
    expect(probe.periodSeconds).toBe(5);
  });

  test('applies default resource limits', () => {
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const resources = deployment?.spec.template.spec.containers[0].resources;

    expect(resources.requests.cpu).toBe('100m');
    expect(resources.requests.memory).toBe('256Mi');
    expect(resources.limits.cpu).toBe('500m');
    expect(resources.limits.memory).toBe('512Mi');
  });

  test('adds an apache exporter sidecar', () => {
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const containers = deployment?.spec.template.spec.containers;

    expect(containers).toHaveLength(2);
    expect(containers[1].name).toBe('apache-exporter');
    expect(containers[1].args).toEqual(['--scrape_uri=http://localhost:80/server-status?auto']);
  });

  test('omits metrics when monitoring is disabled', () => {
    config = { ...config, monitoring: { enabled: false } };
    create();

    const manifests = Testing.synth(chart);
    const deployment = manifests.find(m => m.kind === 'Deployment');
    const service = manifests.find(m => m.kind === 'Service');

    expect(deployment?.spec.template.spec.containers).toHaveLength(1);
    expect(service?.spec.ports).toHaveLength(1);
    expect(service?.spec.ports[0].name).toBe('http');
  });

  test('creates an autoscaler when configured', () => {
    config = {
      ...config,
      wordpress: {
        autoscaling: { minReplicas: 3, maxReplicas: 10, targetCpuUtilization: 60 },
      },
    };
    const construct = create();

    expect(construct.autoscaler).toBeDefined();

    const manifests = Testing.synth(chart);
    const hpa = manifests.find(m => m.kind === 'HorizontalPodAutoscaler');
    const deployment = manifests.find(m => m.kind === 'Deployment');

    expect(hpa?.spec.minReplicas).toBe(3);
    expect(hpa?.spec.maxReplicas).toBe(10);
    expect(hpa?.spec.scaleTargetRef.kind).toBe('Deployment');
    expect(hpa?.spec.scaleTargetRef.name).toBe(deployment?.metadata.name);
    expect(hpa?.spec.metrics[0].resource.name).toBe('cpu');
    expect(hpa?.spec.metrics[0].resource.target.averageUtilization).toBe(60);
  });

  test('rejects an inverted autoscaling range', () => {
    config = {
      ...config,
      wordpress: { autoscaling: { minReplicas: 5, maxReplicas: 2 } },
    };

    expect(() => create()).toThrow(
      'Invalid replica range for wordpress.autoscaling: minReplicas (5) is greater than maxReplicas (2)',
    );
  });

  test('rejects zero replicas', () => {
    config = { ...config, wordpress: { replicas: 0 } };

    expect(() => create()).toThrow('Invalid replica count for wordpress.replicas: 0');
  });

  test('rejects a zero CPU utilization target', () => {
    config = {
      ...config,
      wordpress: { autoscaling: { minReplicas: 2, maxReplicas: 4, targetCpuUtilization: 0 } },
    };

    expect(() => create()).toThrow(
      'Invalid value for wordpress.autoscaling.targetCpuUtilization: 0. Expected an integer >= 1',
    );
  });

  test('rejects a zero readiness failure threshold', () => {
    config = { ...config, wordpress: { probes: { readiness: { failureThreshold: 0 } } } };

    expect(() => create()).toThrow(
      'Invalid value for wordpress.probes.readiness.failureThreshold: 0. Expected an integer >= 1',
    );
  });
});
