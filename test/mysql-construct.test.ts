import { Chart, Testing } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { WordpressChartConfig } from '../src/config';
import { MysqlConstruct } from '../src/constructs/mysql-construct';

interface EnvVar {
  name: string;
  value?: string;
  valueFrom?: { secretKeyRef: { name: string; key: string } };
}

describe('MysqlConstruct', () => {
  let chart: Chart;
  let namespace: kplus.Namespace;
  let config: WordpressChartConfig;

  beforeEach(() => {
    chart = Testing.chart();

    namespace = new kplus.Namespace(chart, 'test-namespace', {
      metadata: { name: 'test-wordpress' },
    });

    config = {
      mysql: {
        database: 'blog',
        user: 'blog_user',
        secretName: 'mysql-credentials',
      },
      storage: {
        storageClass: 'standard',
        mysql: { size: '20Gi' },
      },
    };
  });

  test('creates a single-replica statefulset behind a headless service', () => {
    const construct = new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);

    const statefulSets = manifests.filter(m => m.kind === 'StatefulSet');
    expect(statefulSets).toHaveLength(1);
    expect(statefulSets[0].spec.replicas).toBe(1);
    expect(statefulSets[0].metadata.labels['app.kubernetes.io/name']).toBe('mysql');

    const services = manifests.filter(m => m.kind === 'Service');
    expect(services).toHaveLength(1);
    expect(services[0].spec.clusterIP).toBe('None');
    expect(services[0].spec.ports).toHaveLength(1);
    expect(services[0].spec.ports[0].name).toBe('mysql');
    expect(services[0].spec.ports[0].port).toBe(3306);
    expect(statefulSets[0].spec.serviceName).toBe(services[0].metadata.name);

    expect(construct.host).toBe(`${services[0].metadata.name}.test-wordpress.svc.cluster.local`);
  });

  test('reads credentials from the secret', () => {
    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const container = statefulSet?.spec.template.spec.containers[0];
    const env: EnvVar[] = container.env;

    expect(container.name).toBe('mysql');
    expect(container.image).toBe('mysql:8.0');
    expect(env.find(e => e.name === 'MYSQL_DATABASE')?.value).toBe('blog');
    expect(env.find(e => e.name === 'MYSQL_USER')?.value).toBe('blog_user');
    expect(env.find(e => e.name === 'MYSQL_ROOT_PASSWORD')?.valueFrom?.secretKeyRef).toEqual({
      name: 'mysql-credentials',
      key: 'root-password',
    });
    expect(env.find(e => e.name === 'MYSQL_PASSWORD')?.valueFrom?.secretKeyRef).toEqual({
      name: 'mysql-credentials',
      key: 'password',
    });
  });

  test('uses custom secret keys', () => {
    config = {
      ...config,
      mysql: {
        ...config.mysql,
        secretKeys: { rootPassword: 'mysql-root', password: 'mysql-app' },
      },
    };

    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const env: EnvVar[] = statefulSet?.spec.template.spec.containers[0].env;

    expect(env.find(e => e.name === 'MYSQL_ROOT_PASSWORD')?.valueFrom?.secretKeyRef.key).toBe('mysql-root');
    expect(env.find(e => e.name === 'MYSQL_PASSWORD')?.valueFrom?.secretKeyRef.key).toBe('mysql-app');
  });

  test('mounts a persistent data volume', () => {
    const construct = new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);

    const pvcs = manifests.filter(m => m.kind === 'PersistentVolumeClaim');
    expect(pvcs).toHaveLength(1);
    expect(pvcs[0].metadata.name).toBe(construct.pvc.name);
    expect(pvcs[0].spec.accessModes).toEqual(['ReadWriteOnce']);
    expect(pvcs[0].spec.resources.requests.storage).toBe('20Gi');
    expect(pvcs[0].spec.storageClassName).toBe('standard');

    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const podSpec = statefulSet?.spec.template.spec;
    const mount = podSpec.containers[0].volumeMounts.find(
      (vm: { mountPath: string }) => vm.mountPath === '/var/lib/mysql',
    );
    expect(mount).toBeDefined();

    const volume = podSpec.volumes.find((v: { name: string }) => v.name === mount.name);
    expect(volume.persistentVolumeClaim.claimName).toBe(construct.pvc.name);
  });

  test('probes with mysqladmin ping', () => {
    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const container = statefulSet?.spec.template.spec.containers[0];

    expect(container.livenessProbe.exec.command).toEqual(['mysqladmin', 'ping', '-h', '127.0.0.1']);
    expect(container.livenessProbe.initialDelaySeconds).toBe(30);
    expect(container.readinessProbe.exec.command).toEqual(['mysqladmin', 'ping', '-h', '127.0.0.1']);
    expect(container.readinessProbe.initialDelaySeconds).toBe(10);
  });

  test('waits for first-start initialisation before liveness checks', () => {
    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const startup = statefulSet?.spec.template.spec.containers[0].startupProbe;

    expect(startup.exec.command).toEqual(['mysqladmin', 'ping', '-h', '127.0.0.1']);
    expect(startup.initialDelaySeconds).toBe(10);
    expect(startup.periodSeconds).toBe(10);
    expect(startup.failureThreshold).toBe(30);
  });

  test('applies startup thresholds', () => {
    config = {
      ...config,
      mysql: { ...config.mysql, probes: { startup: { periodSeconds: 15, failureThreshold: 40 } } },
    };
    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const startup = statefulSet?.spec.template.spec.containers[0].startupProbe;

    expect(startup.periodSeconds).toBe(15);
    expect(startup.failureThreshold).toBe(40);
    expect(startup.timeoutSeconds).toBe(5);
  });

  test('selects its pods from the headless service', () => {
    const construct = new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const service = manifests.find(m => m.kind === 'Service' && m.metadata.name === construct.service.name);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const selector: Record<string, string> = service?.spec.selector ?? {};
    const labels: Record<string, string> = statefulSet?.spec.template.metadata.labels ?? {};

    expect(Object.keys(selector).length).toBeGreaterThan(0);
    for (const [key, value] of Object.entries(selector)) {
      expect(labels[key]).toBe(value);
    }
    expect(statefulSet?.spec.serviceName).toBe(construct.service.name);
  });

  test('adds a mysqld-exporter sidecar by default', () => {
    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    const containers = statefulSet?.spec.template.spec.containers;

    expect(containers).toHaveLength(2);
    expect(containers[1].name).toBe('mysqld-exporter');
    expect(containers[1].args).toEqual([
      '--mysqld.address=127.0.0.1:3306',
      '--mysqld.username=blog_user',
    ]);
    expect(containers[1].ports).toContainEqual(expect.objectContaining({ name: 'metrics', containerPort: 9104 }));

    const env: EnvVar[] = containers[1].env;
    expect(env.find(e => e.name === 'MYSQLD_EXPORTER_PASSWORD')?.valueFrom?.secretKeyRef).toEqual({
      name: 'mysql-credentials',
      key: 'password',
    });
  });

  test('omits the exporter when monitoring is disabled', () => {
    config = { ...config, monitoring: { enabled: false } };

    new MysqlConstruct(chart, 'mysql', { config, namespace });

    const manifests = Testing.synth(chart);
    const statefulSet = manifests.find(m => m.kind === 'StatefulSet');
    expect(statefulSet?.spec.template.spec.containers).toHaveLength(1);
  });

  test('rejects an invalid storage size', () => {
    config = { ...config, storage: { mysql: { size: 'lots' } } };

    expect(() => new MysqlConstruct(chart, 'mysql', { config, namespace })).toThrow(
      'Invalid size format for storage.mysql.size: "lots"',
    );
  });
});
