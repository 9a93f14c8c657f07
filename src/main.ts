/**
 * Minimal WordPress deployment for cdk8s synth
 *
 * Synthesizes the WordPress and monitoring charts to manifests/ and writes the
 * kube-prometheus-stack values to the working directory.
 * For a complete example with all options, see examples/full-deployment.ts
 */

import { App, Yaml } from 'cdk8s';
import { MonitoringChart } from './monitoring-chart';
import { WordpressChart } from './wordpress-chart';

const outdir = 'manifests';
const app = new App({ outdir });

new WordpressChart(app, 'wordpress', {
  namespace: 'wordpress',

  mysql: {
    secretName: 'mysql-credentials',
  },

  storage: {
    shared: { size: '10Gi', storageClass: 'nfs-client' },
    mysql: { size: '10Gi', storageClass: 'standard' },
  },
});

const monitoring = new MonitoringChart(app, 'monitoring', {
  targetNamespace: 'wordpress',
});

app.synth();
const valuesFile = 'kube-prometheus-stack.values.yaml';
Yaml.save(valuesFile, [monitoring.stackValues]);

console.log(`Manifests written to ${outdir}/`);
console.log('\nNext steps:');
console.log('1. Create the database secret:');
console.log('   kubectl create namespace wordpress');
console.log('   kubectl -n wordpress create secret generic mysql-credentials \\');
console.log('     --from-literal=root-password=$(openssl rand -hex 16) --from-literal=password=$(openssl rand -hex 16)');
console.log('2. Install the monitoring stack:');
console.log(`   helm install kube-prometheus-stack prometheus-community/kube-prometheus-stack -n monitoring --create-namespace -f ${valuesFile}`);
console.log('3. Apply the manifests:');
console.log(`   kubectl apply -f ${outdir}/`);
