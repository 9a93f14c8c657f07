import { MonitoringChartConfig } from '../config';
import { validateDurationFormat, validateSizeFormat } from './validators';

/**
 * Subset of the kube-prometheus-stack values this project sets
 */
export interface KubePrometheusStackValues {
  readonly prometheus: {
    readonly prometheusSpec: {
      readonly retention: string;
      readonly serviceMonitorSelectorNilUsesHelmValues: boolean;
      readonly podMonitorSelectorNilUsesHelmValues: boolean;
      readonly ruleSelectorNilUsesHelmValues: boolean;
      readonly storageSpec: {
        readonly volumeClaimTemplate: {
          readonly spec: {
            readonly storageClassName?: string;
            readonly accessModes: string[];
            readonly resources: { readonly requests: { readonly storage: string } };
          };
        };
      };
    };
  };
  readonly grafana: {
    readonly admin?: {
      readonly existingSecret: string;
      readonly userKey: string;
      readonly passwordKey: string;
    };
    readonly sidecar: {
      readonly dashboards: {
        readonly enabled: boolean;
        readonly label: string;
        readonly labelValue: string;
        readonly searchNamespace: string;
      };
    };
  };
  readonly alertmanager: {
    readonly config: {
      readonly route: {
        readonly receiver: string;
        readonly group_by: string[];
        readonly group_wait: string;
        readonly group_interval: string;
        readonly repeat_interval: string;
      };
      readonly receivers: Array<{
        readonly name: string;
        readonly webhook_configs?: Array<{ readonly url: string; readonly send_resolved: boolean }>;
      }>;
    };
  };
}

/**
 * Build the values file for the upstream kube-prometheus-stack Helm chart
 *
 * Monitor and rule selectors are opened up so the objects generated by the
 * WordPress chart are picked up even without a matching `release` label.
 *
 * @throws Error if retention or storage size is malformed
 */
export function buildStackValues(config: MonitoringChartConfig = {}): KubePrometheusStackValues {
  const retention = config.prometheus?.retention ?? '15d';
  const storageSize = config.prometheus?.storageSize ?? '50Gi';
  validateDurationFormat(retention, 'prometheus.retention');
  validateSizeFormat(storageSize, 'prometheus.storageSize');

  const storageClass = config.prometheus?.storageClass;
  const adminSecret = config.grafana?.adminSecretName;

  return {
    prometheus: {
      prometheusSpec: {
        retention,
        serviceMonitorSelectorNilUsesHelmValues: false,
        podMonitorSelectorNilUsesHelmValues: false,
        ruleSelectorNilUsesHelmValues: false,
        storageSpec: {
          volumeClaimTemplate: {
            spec: {
              ...(storageClass ? { storageClassName: storageClass } : {}),
              accessModes: ['ReadWriteOnce'],
              resources: { requests: { storage: storageSize } },
            },
          },
        },
      },
    },
    grafana: {
      ...(adminSecret
        ? { admin: { existingSecret: adminSecret, userKey: 'admin-user', passwordKey: 'admin-password' } }
        : {}),
      sidecar: {
        dashboards: {
          enabled: true,
          label: 'grafana_dashboard',
          labelValue: '1',
          searchNamespace: 'ALL',
        },
      },
    },
    alertmanager: {
      config: {
        route: {
          receiver: 'default',
          group_by: ['alertname', 'namespace'],
          group_wait: '30s',
          group_interval: '5m',
          repeat_interval: '4h',
        },
        receivers: [
          config.alertWebhookUrl
            ? { name: 'default', webhook_configs: [{ url: config.alertWebhookUrl, send_resolved: true }] }
            : { name: 'default' },
        ],
      },
    },
  };
}
