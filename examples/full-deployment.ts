#!/usr/bin/env ts-node

/**
 * Full WordPress deployment example
 *
 * This example demonstrates a production-style deployment with:
 * - Statically provisioned NFS volume shared by all WordPress replicas
 * - CPU based autoscaling
 * - OpenResty proxy with Lua hooks
 * - Ingress with cert-manager TLS
 * - Monitoring chart with tuned alert thresholds
 *
 * Prerequisites:
 * - An NFS export reachable from every node
 * - ingress-nginx and cert-manager installed
 * - Secrets created:
 *   - mysql-credentials: root-password and password keys
 *   - grafana-admin: admin-user and admin-password keys
 *
 * Usage:
 *   ts-node examples/full-deployment.ts
 *
 * Output:
 *   Generated manifests in manifests/
 *   Helm values for kube-prometheus-stack in kube-prometheus-stack.values.yaml
 */

import { App, Yaml } from 'cdk8s';
import { MonitoringChart, WordpressChart } from '../src';

const app = new App({ outdir: 'manifests' });
const valuesFile = 'kube-prometheus-stack.values.yaml';

new WordpressChart(app, 'full-deployment', {
  namespace: 'blog',

  // Database configuration
  mysql: {
    database: 'blog',
    user: 'blog',
    secretName: 'mysql-credentials', // Must exist before deployment
    resources: {
      requests: { cpu: '500m', memory: '1Gi' },
      limits: { cpu: '2', memory: '2Gi' },
    },
  },

  // Storage configuration
  storage: {
    storageClass: 'standard', // Used by the MySQL volume
    shared: {
      size: '50Gi',
      persistentVolume: {
        nfs: { server: 'nfs.internal.example.com', path: '/exports/blog' },
        reclaimPolicy: 'Retain', // Keep uploads when the namespace is deleted
      },
    },
    mysql: { size: '20Gi' },
  },

  // WordPress tier
  wordpress: {
    tablePrefix: 'blog_',
    autoscaling: {
      minReplicas: 3,
      maxReplicas: 10,
      targetCpuUtilization: 65,
    },
    configExtra: "define('DISALLOW_FILE_EDIT', true);",
    resources: {
      requests: { cpu: '250m', memory: '512Mi' },
      limits: { cpu: '1', memory: '1Gi' },
    },
  },

  // Reverse proxy tier
  nginx: {
    replicas: 3,
    serviceType: 'ClusterIP', // Exposed through the ingress below
    clientMaxBodySize: '128m',
    trustedProxies: ['10.42.0.0/16'], // Adjust to your pod network
    lua: {
      headerFilter: 'ngx.header["X-Frame-Options"] = "SAMEORIGIN"',
    },
  },

  // Ingress configuration (optional - requires an ingress controller)
  ingress: {
    enabled: true,
    hostname: 'blog.example.com',
    className: 'nginx',
    certIssuer: 'letsencrypt-cluster-issuer',
  },

  monitoring: {
    scrapeInterval: '15s',
    prometheusRelease: 'kube-prometheus-stack',
  },
});

const monitoring = new MonitoringChart(app, 'full-monitoring', {
  targetNamespace: 'blog',
  grafana: { adminSecretName: 'grafana-admin' },
  prometheus: { retention: '30d', storageSize: '100Gi' },
  alerts: {
    podRestarts: { threshold: 5 },
    sharedVolumeFillingUp: { threshold: 0.2, severity: 'critical' },
  },
});

app.synth();
Yaml.save(valuesFile, [monitoring.stackValues]);

console.log('Manifests generated successfully!');
console.log('Output: manifests/');
console.log(`Helm values: ${valuesFile}`);
console.log('\nNext steps:');
console.log('1. Create required secrets:');
console.log('   kubectl create namespace blog');
console.log('   kubectl -n blog create secret generic mysql-credentials \\');
console.log('     --from-literal=root-password=$(openssl rand -hex 16) --from-literal=password=$(openssl rand -hex 16)');
console.log('   kubectl create namespace monitoring');
console.log('   kubectl -n monitoring create secret generic grafana-admin \\');
console.log('     --from-literal=admin-user=admin --from-literal=admin-password=$(openssl rand -hex 16)');
console.log('\n2. Install the monitoring stack:');
console.log(`   helm install kube-prometheus-stack prometheus-community/kube-prometheus-stack -n monitoring -f ${valuesFile}`);
console.log('\n3. Deploy to Kubernetes:');
console.log('   kubectl apply -f manifests/');
console.log('\n4. Check the rollout:');
console.log('   kubectl -n blog get pods');
