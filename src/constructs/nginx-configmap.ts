import { createHash } from 'crypto';
import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { LuaSnippetsConfig } from '../config';
import { validateCidrFormat } from '../utils/validators';

/**
 * Inputs for rendering the OpenResty configuration
 */
export interface NginxConfOptions {
  /**
   * Host the proxy forwards to (WordPress service FQDN)
   */
  readonly upstreamHost: string;

  /**
   * @default 80
   */
  readonly upstreamPort?: number;

  /**
   * @default "auto"
   */
  readonly workerProcesses?: string;

  /**
   * @default 1024
   */
  readonly workerConnections?: number;

  /**
   * @default "64m"
   */
  readonly clientMaxBodySize?: string;

  /**
   * Seconds
   * @default 60
   */
  readonly proxyReadTimeout?: number;

  readonly trustedProxies?: string[];
  readonly lua?: LuaSnippetsConfig;

  /**
   * Port of the stub_status server; omitted when undefined
   */
  readonly statusPort?: number;
}

export const NGINX_CONF_PATH = '/usr/local/openresty/nginx/conf/nginx.conf';

function indent(text: string, depth: number): string[] {
  const pad = ' '.repeat(depth * 4);
  return text
    .trim()
    .split('\n')
    .map((line) => (line.trim() === '' ? '' : `${pad}${line.trimEnd()}`));
}

function luaBlock(directive: string, snippet: string | undefined, depth: number): string[] {
  if (!snippet || snippet.trim() === '') {
    return [];
  }
  const pad = ' '.repeat(depth * 4);
  return [`${pad}${directive} {`, ...indent(snippet, depth + 1), `${pad}}`];
}

/**
 * Render the complete nginx.conf for the OpenResty proxy tier
 *
 * Every request except `/healthz` is passed to the WordPress upstream.
 * Lua snippets are only emitted for the phases that have one.
 *
 * @throws Error if a trusted proxy is not a CIDR, or a size or count is malformed
 */
export function renderNginxConf(options: NginxConfOptions): string {
  const workerConnections = options.workerConnections ?? 1024;
  const clientMaxBodySize = options.clientMaxBodySize ?? '64m';
  const proxyReadTimeout = options.proxyReadTimeout ?? 60;
  const workerProcesses = options.workerProcesses ?? 'auto';
  const trustedProxies = options.trustedProxies ?? [];

  if (!/^(?:auto|[1-9]\d*)$/.test(workerProcesses)) {
    throw new Error(
      `Invalid worker processes for nginx.workerProcesses: "${workerProcesses}". ` +
      'Expected "auto" or a positive integer',
    );
  }
  if (!Number.isInteger(workerConnections) || workerConnections < 1) {
    throw new Error(`Invalid worker connections for nginx.workerConnections: ${workerConnections}`);
  }
  if (!/^\d+[kKmMgG]?$/.test(clientMaxBodySize)) {
    throw new Error(
      `Invalid size format for nginx.clientMaxBodySize: "${clientMaxBodySize}". ` +
      'Expected nginx size syntax (e.g., "64m", "1g")',
    );
  }
  if (!Number.isInteger(proxyReadTimeout) || proxyReadTimeout < 1) {
    throw new Error(`Invalid timeout for nginx.proxyReadTimeout: ${proxyReadTimeout}`);
  }
  trustedProxies.forEach((cidr, index) => validateCidrFormat(cidr, `nginx.trustedProxies[${index}]`));

  const lines: string[] = [
    `worker_processes ${workerProcesses};`,
    'error_log /dev/stderr warn;',
    '',
    'events {',
    `    worker_connections ${workerConnections};`,
    '}',
    '',
    'http {',
    '    include mime.types;',
    '    default_type application/octet-stream;',
    '    access_log /dev/stdout;',
    '    sendfile on;',
    '    keepalive_timeout 65;',
    '    server_tokens off;',
    `    client_max_body_size ${clientMaxBodySize};`,
  ];

  // X-Forwarded-Proto is only believed from a trusted proxy; everyone else gets $scheme
  if (trustedProxies.length > 0) {
    lines.push('');
    trustedProxies.forEach((cidr) => lines.push(`    set_real_ip_from ${cidr};`));
    lines.push('    real_ip_header X-Forwarded-For;');
    lines.push('    real_ip_recursive on;');
    lines.push(
      '',
      '    geo $realip_remote_addr $from_trusted_proxy {',
      '        default 0;',
      ...trustedProxies.map((cidr) => `        ${cidr} 1;`),
      '    }',
      '',
      '    map "$from_trusted_proxy:$http_x_forwarded_proto" $forwarded_proto {',
      '        default $scheme;',
      '        "~^1:(?<proto>https?)$" $proto;',
      '    }',
    );
  }
  const forwardedProto = trustedProxies.length > 0 ? '$forwarded_proto' : '$scheme';

  const init = luaBlock('init_by_lua_block', options.lua?.init, 1);
  if (init.length > 0) {
    lines.push('', ...init);
  }

  lines.push(
    '',
    '    upstream wordpress {',
    `        server ${options.upstreamHost}:${options.upstreamPort ?? 80};`,
    '        keepalive 32;',
    '    }',
    '',
    '    server {',
    '        listen 80 default_server;',
    '',
    '        location = /healthz {',
    '            access_log off;',
    '            default_type text/plain;',
    '            return 200 "ok\\n";',
    '        }',
    '',
    '        location / {',
    '            proxy_pass http://wordpress;',
    '            proxy_http_version 1.1;',
    '            proxy_set_header Connection "";',
    '            proxy_set_header Host $host;',
    '            proxy_set_header X-Real-IP $remote_addr;',
    '            proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    `            proxy_set_header X-Forwarded-Proto ${forwardedProto};`,
    `            proxy_read_timeout ${proxyReadTimeout}s;`,
    ...luaBlock('access_by_lua_block', options.lua?.access, 3),
    ...luaBlock('header_filter_by_lua_block', options.lua?.headerFilter, 3),
    ...luaBlock('log_by_lua_block', options.lua?.log, 3),
    '        }',
    '    }',
  );

  if (options.statusPort !== undefined) {
    lines.push(
      '',
      '    server {',
      `        listen ${options.statusPort};`,
      '',
      '        location = /stub_status {',
      '            stub_status;',
      '            access_log off;',
      '        }',
      '    }',
    );
  }

  lines.push('}', '');
  return lines.join('\n');
}

export interface NginxConfigMapProps {
  readonly namespace: kplus.Namespace;
  readonly options: NginxConfOptions;
}

/**
 * ConfigMap holding the rendered OpenResty nginx.conf
 *
 * `checksum` changes whenever the rendered file does; the proxy Deployment
 * puts it on its pod template so a config change rolls the pods.
 */
export class NginxConfigMap extends Construct {
  public readonly configMap: kplus.ConfigMap;
  public readonly checksum: string;

  constructor(scope: Construct, id: string, props: NginxConfigMapProps) {
    super(scope, id);

    const nginxConf = renderNginxConf(props.options);
    this.checksum = createHash('sha256').update(nginxConf).digest('hex');

    this.configMap = new kplus.ConfigMap(this, 'configmap', {
      metadata: {
        namespace: props.namespace.name,
        labels: {
          'app.kubernetes.io/name': 'nginx-config',
          'app.kubernetes.io/component': 'configuration',
          'app.kubernetes.io/part-of': 'wordpress',
        },
      },
      data: {
        'nginx.conf': nginxConf,
      },
    });
  }
}
