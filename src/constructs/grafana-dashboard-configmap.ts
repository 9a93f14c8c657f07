import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import wordpressOverview from '../dashboards/wordpress-overview.json';

const NAMESPACE_TOKEN = '__NAMESPACE__';

/**
 * Render the bundled WordPress overview dashboard for a namespace
 */
export function renderWordpressDashboard(targetNamespace: string): string {
  return JSON.stringify(wordpressOverview, null, 2).split(NAMESPACE_TOKEN).join(targetNamespace);
}

export interface GrafanaDashboardConfigMapProps {
  readonly namespace: kplus.Namespace;
  readonly targetNamespace: string;
}

/**
 * ConfigMap picked up by the Grafana dashboard sidecar
 *
 * The sidecar watches for the `grafana_dashboard: "1"` label and loads every
 * JSON file in the ConfigMap.
 */
export class GrafanaDashboardConfigMap extends Construct {
  public readonly configMap: kplus.ConfigMap;

  constructor(scope: Construct, id: string, props: GrafanaDashboardConfigMapProps) {
    super(scope, id);

    this.configMap = new kplus.ConfigMap(this, 'configmap', {
      metadata: {
        namespace: props.namespace.name,
        labels: {
          'grafana_dashboard': '1',
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      data: {
        'wordpress-overview.json': renderWordpressDashboard(props.targetNamespace),
      },
    });
  }
}
