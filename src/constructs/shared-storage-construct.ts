import { ApiObject } from 'cdk8s';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { WordpressChartConfig } from '../config';
import { parseStorageSize } from '../utils/resource-parser';
import { validateSizeFormat } from '../utils/validators';

export interface SharedStorageConstructProps {
  readonly config: WordpressChartConfig;
  readonly namespace: kplus.Namespace;
}

/**
 * Shared Storage Construct - ReadWriteMany volume for WordPress content
 *
 * Every WordPress replica mounts the same claim so that uploads, plugins and
 * themes written by one pod are visible to all of them.
 *
 * Components:
 * - PersistentVolumeClaim with ReadWriteMany access
 * - Optional statically provisioned PersistentVolume (NFS or hostPath),
 *   retained when the namespace is deleted
 */
export class SharedStorageConstruct extends Construct {
  public readonly pvc: kplus.PersistentVolumeClaim;
  public readonly persistentVolume?: ApiObject;

  constructor(scope: Construct, id: string, props: SharedStorageConstructProps) {
    super(scope, id);

    const { config, namespace } = props;
    const shared = config.storage?.shared;
    const size = shared?.size ?? '10Gi';
    validateSizeFormat(size, 'storage.shared.size');

    let storageClassName = shared?.storageClass ?? config.storage?.storageClass;
    let volume: kplus.IPersistentVolume | undefined;

    if (shared?.persistentVolume) {
      const pvConfig = shared.persistentVolume;
      if (Boolean(pvConfig.nfs) === Boolean(pvConfig.hostPath)) {
        throw new Error(
          'Invalid storage.shared.persistentVolume: exactly one of "nfs" or "hostPath" must be set',
        );
      }

      // Static volumes need a class the claim can match without a provisioner
      storageClassName = storageClassName ?? 'manual';

      this.persistentVolume = new ApiObject(this, 'pv', {
        apiVersion: 'v1',
        kind: 'PersistentVolume',
        metadata: {
          labels: {
            'app.kubernetes.io/name': 'wordpress-content',
            'app.kubernetes.io/component': 'storage',
            'app.kubernetes.io/part-of': 'wordpress',
          },
        },
        spec: {
          capacity: { storage: size },
          accessModes: ['ReadWriteMany'],
          persistentVolumeReclaimPolicy: pvConfig.reclaimPolicy ?? 'Retain',
          storageClassName,
          ...(pvConfig.nfs
            ? { nfs: { server: pvConfig.nfs.server, path: pvConfig.nfs.path } }
            : { hostPath: { path: pvConfig.hostPath, type: 'DirectoryOrCreate' } }),
        },
      });

      volume = kplus.PersistentVolume.fromPersistentVolumeName(this, 'pv-ref', this.persistentVolume.name);
    }

    this.pvc = new kplus.PersistentVolumeClaim(this, 'pvc', {
      metadata: {
        namespace: namespace.name,
        labels: {
          'app.kubernetes.io/name': 'wordpress-content',
          'app.kubernetes.io/component': 'storage',
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      accessModes: [kplus.PersistentVolumeAccessMode.READ_WRITE_MANY],
      storage: parseStorageSize(size, 'storage.shared.size'),
      storageClassName,
      volume,
    });
  }
}
