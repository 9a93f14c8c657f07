import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { WordpressChartConfig } from '../config';
import { resolveImage, resolvePullPolicy } from '../utils/images';
import {
  buildContainerResources,
  buildProbeOptions,
  DEFAULT_LIVENESS,
  DEFAULT_MYSQL_STARTUP,
  DEFAULT_READINESS,
  parseStorageSize,
} from '../utils/resource-parser';
import { validateSizeFormat } from '../utils/validators';

export interface MysqlConstructProps {
  readonly config: WordpressChartConfig;
  readonly namespace: kplus.Namespace;
}

export const MYSQL_PORT = 3306;
export const MYSQL_EXPORTER_PORT = 9104;

/**
 * MySQL Construct - single-writer database for WordPress
 *
 * The MySQL component provides:
 * - One database pod with a stable network identity (StatefulSet + headless Service)
 * - Persistent data volume mounted at /var/lib/mysql
 * - Optional mysqld-exporter sidecar for Prometheus
 *
 * Components:
 * - StatefulSet with exactly one replica
 * - Headless Service on port 3306
 * - PersistentVolumeClaim (ReadWriteOnce) for the data directory
 */
export class MysqlConstruct extends Construct {
  public readonly statefulSet: kplus.StatefulSet;
  public readonly service: kplus.Service;
  public readonly pvc: kplus.PersistentVolumeClaim;

  /**
   * In-cluster FQDN clients connect to
   */
  public readonly host: string;

  /**
   * Database credentials secret (referenced, never created here)
   */
  public readonly credentialsSecret: kplus.ISecret;

  constructor(scope: Construct, id: string, props: MysqlConstructProps) {
    super(scope, id);

    const { config, namespace } = props;
    const mysql = config.mysql;
    const database = mysql.database ?? 'wordpress';
    const user = mysql.user ?? 'wordpress';
    const secretKeys = mysql.secretKeys ?? { rootPassword: 'root-password', password: 'password' };
    const monitoringEnabled = config.monitoring?.enabled !== false;

    const storageSize = config.storage?.mysql?.size ?? '10Gi';
    validateSizeFormat(storageSize, 'storage.mysql.size');

    this.credentialsSecret = kplus.Secret.fromSecretName(this, 'credentials', mysql.secretName);

    this.pvc = new kplus.PersistentVolumeClaim(this, 'pvc', {
      metadata: {
        namespace: namespace.name,
      },
      accessModes: [kplus.PersistentVolumeAccessMode.READ_WRITE_ONCE],
      storage: parseStorageSize(storageSize, 'storage.mysql.size'),
      storageClassName: config.storage?.mysql?.storageClass ?? config.storage?.storageClass,
    });

    // Headless service gives the pod a stable DNS name
    this.service = new kplus.Service(this, 'service', {
      metadata: {
        namespace: namespace.name,
        labels: {
          'app.kubernetes.io/name': 'mysql',
          'app.kubernetes.io/component': 'database',
        },
      },
      clusterIP: 'None',
      ports: [
        {
          name: 'mysql',
          port: MYSQL_PORT,
          targetPort: MYSQL_PORT,
          protocol: kplus.Protocol.TCP,
        },
      ],
    });

    this.statefulSet = new kplus.StatefulSet(this, 'statefulset', {
      metadata: {
        namespace: namespace.name,
        labels: {
          'app.kubernetes.io/name': 'mysql',
          'app.kubernetes.io/component': 'database',
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      // Single writer; scaling MySQL horizontally is not supported
      replicas: 1,
      service: this.service,
      podMetadata: {
        labels: {
          'app.kubernetes.io/name': 'mysql',
          'app.kubernetes.io/component': 'database',
        },
      },
      securityContext: {
        // The entrypoint starts as root and drops to the mysql user
        ensureNonRoot: false,
      },
    });

    const container = this.statefulSet.addContainer({
      name: 'mysql',
      image: resolveImage(config.images, 'mysql'),
      imagePullPolicy: resolvePullPolicy(config.images),
      ports: [{ name: 'mysql', number: MYSQL_PORT }],
      securityContext: {
        ensureNonRoot: false,
        readOnlyRootFilesystem: false,
      },
      resources: buildContainerResources(mysql.resources, {
        requests: { cpu: '250m', memory: '512Mi' },
        limits: { cpu: '1', memory: '1Gi' },
      }, 'mysql.resources'),
      // First start initialises the data directory with networking off; liveness waits for this
      startup: kplus.Probe.fromCommand(
        ['mysqladmin', 'ping', '-h', '127.0.0.1'],
        buildProbeOptions(mysql.probes?.startup, DEFAULT_MYSQL_STARTUP, 'mysql.probes.startup'),
      ),
      // mysqladmin ping exits 0 whenever the server answers, even on access denied
      liveness: kplus.Probe.fromCommand(
        ['mysqladmin', 'ping', '-h', '127.0.0.1'],
        buildProbeOptions(mysql.probes?.liveness, DEFAULT_LIVENESS, 'mysql.probes.liveness'),
      ),
      readiness: kplus.Probe.fromCommand(
        ['mysqladmin', 'ping', '-h', '127.0.0.1'],
        buildProbeOptions(mysql.probes?.readiness, DEFAULT_READINESS, 'mysql.probes.readiness'),
      ),
    });

    container.env.addVariable('MYSQL_DATABASE', kplus.EnvValue.fromValue(database));
    container.env.addVariable('MYSQL_USER', kplus.EnvValue.fromValue(user));
    container.env.addVariable(
      'MYSQL_ROOT_PASSWORD',
      kplus.EnvValue.fromSecretValue({ secret: this.credentialsSecret, key: secretKeys.rootPassword }),
    );
    container.env.addVariable(
      'MYSQL_PASSWORD',
      kplus.EnvValue.fromSecretValue({ secret: this.credentialsSecret, key: secretKeys.password }),
    );

    container.mount('/var/lib/mysql', kplus.Volume.fromPersistentVolumeClaim(this, 'data-volume', this.pvc));

    if (monitoringEnabled) {
      const exporter = this.statefulSet.addContainer({
        name: 'mysqld-exporter',
        image: resolveImage(config.images, 'mysqlExporter'),
        imagePullPolicy: resolvePullPolicy(config.images),
        args: [
          `--mysqld.address=127.0.0.1:${MYSQL_PORT}`,
          `--mysqld.username=${user}`,
        ],
        ports: [{ name: 'metrics', number: MYSQL_EXPORTER_PORT }],
        securityContext: {
          ensureNonRoot: false,
        },
        resources: buildContainerResources(undefined, {
          requests: { cpu: '10m', memory: '32Mi' },
          limits: { cpu: '100m', memory: '64Mi' },
        }, 'mysql.exporter.resources'),
      });
      exporter.env.addVariable(
        'MYSQLD_EXPORTER_PASSWORD',
        kplus.EnvValue.fromSecretValue({ secret: this.credentialsSecret, key: secretKeys.password }),
      );
    }

    this.host = `${this.service.name}.${namespace.name}.svc.cluster.local`;
  }
}
